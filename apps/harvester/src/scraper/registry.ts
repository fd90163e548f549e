/**
 * Portal Registry
 *
 * Portals must be explicitly registered; no auto-discovery. Owned by one
 * orchestrator and immutable once runs start.
 */

import type { PortalRunner } from './types.js'

export interface PortalEntry {
  runner: PortalRunner
  displayName: string
  /** Lower runs first in listings */
  priority: number
}

export class PortalRegistry {
  private readonly portals = new Map<string, PortalEntry>()

  /**
   * Register a portal.
   * @throws Error if a portal with the same name is already registered
   */
  register(runner: PortalRunner, meta: { displayName?: string; priority?: number } = {}): void {
    if (this.portals.has(runner.name)) {
      throw new Error(`Portal '${runner.name}' is already registered`)
    }

    this.portals.set(runner.name, {
      runner,
      displayName: meta.displayName ?? runner.name,
      priority: meta.priority ?? 100,
    })
  }

  get(name: string): PortalRunner | undefined {
    return this.portals.get(name)?.runner
  }

  entry(name: string): PortalEntry | undefined {
    return this.portals.get(name)
  }

  has(name: string): boolean {
    return this.portals.has(name)
  }

  /**
   * Registered names, by priority then name.
   */
  list(): string[] {
    return Array.from(this.portals.values())
      .sort((a, b) => a.priority - b.priority || a.runner.name.localeCompare(b.runner.name))
      .map((entry) => entry.runner.name)
  }

  size(): number {
    return this.portals.size
  }
}
