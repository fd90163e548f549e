import { raceWithSignal } from '../utils/sleep.js'

/**
 * Promise-chain mutex keyed by string (one lane per domain).
 *
 * Callers on the same key run strictly one after another, in arrival order.
 * A caller cancelled while queued leaves the queue without breaking the
 * ordering of those behind it.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    try {
      await raceWithSignal(previous, signal)
      return await fn()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}
