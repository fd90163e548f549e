import type { OffPeakWindow } from '../types.js'

const CLOCK_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/

/**
 * Parse "HH:MM" into minutes after midnight.
 * @throws Error on malformed input
 */
export function parseClock(value: string): number {
  const match = CLOCK_PATTERN.exec(value.trim())
  if (!match) {
    throw new Error(`Invalid clock time '${value}', expected HH:MM`)
  }
  return Number.parseInt(match[1], 10) * 60 + Number.parseInt(match[2], 10)
}

/**
 * Whether `at` (local time) falls inside the window. Both ends are inclusive.
 * A window whose start is after its end wraps midnight (23:00-06:00).
 */
export function isWithinOffPeak(window: OffPeakWindow, at: Date): boolean {
  const start = parseClock(window.start)
  const end = parseClock(window.end)
  const minutes = at.getHours() * 60 + at.getMinutes()

  if (start > end) {
    return minutes >= start || minutes <= end
  }
  return minutes >= start && minutes <= end
}
