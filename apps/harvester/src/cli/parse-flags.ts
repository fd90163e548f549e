export type Flags = Record<string, string | boolean>

export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === undefined || !token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    for (let next = argv[j]; next !== undefined && !next.startsWith('--'); next = argv[++j]) {
      valueTokens.push(next)
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

/**
 * Positive integer flag. `undefined` when absent, `null` when present but invalid.
 */
export function asPositiveInt(value: string | boolean | undefined): number | undefined | null {
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return null
  }
  const parsed = Number.parseInt(value, 10)
  return parsed > 0 ? parsed : null
}
