/**
 * In-memory opportunity store.
 *
 * Stands in for the persistence collaborator in CLI dry runs, the status
 * server and tests. Upserts by (portal, externalId).
 */

import { randomUUID } from 'node:crypto'
import type { Opportunity, OpportunityFilters, OpportunityStore, RawRecord, StoreOutcome } from './types.js'

export class InMemoryOpportunityStore implements OpportunityStore {
  private readonly opportunities = new Map<string, Opportunity>()

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async store(portalName: string, records: RawRecord[]): Promise<StoreOutcome> {
    const now = this.clock()
    const opportunityIds: string[] = []

    for (const record of records) {
      const key = `${portalName}:${record.externalId}`
      const existing = this.opportunities.get(key)

      const opportunity: Opportunity = {
        id: existing?.id ?? randomUUID(),
        portal: portalName,
        title: record.title,
        externalId: record.externalId,
        issuingEntity: record.issuingEntity,
        postedAt: record.postedAt,
        dueAt: record.dueAt,
        description: record.description,
        documentUrls: [...record.documentUrls],
        url: record.url,
        sourceStrategy: record.sourceStrategy,
        firstSeenAt: existing?.firstSeenAt ?? now,
        lastSeenAt: now,
      }

      this.opportunities.set(key, opportunity)
      opportunityIds.push(opportunity.id)
    }

    return { storedCount: opportunityIds.length, opportunityIds }
  }

  async query(filters: OpportunityFilters = {}): Promise<Opportunity[]> {
    const text = filters.text?.toLowerCase()

    const matches = Array.from(this.opportunities.values()).filter((opportunity) => {
      if (filters.portal && opportunity.portal !== filters.portal) return false
      if (text) {
        const haystack = [opportunity.title, opportunity.description ?? '', opportunity.issuingEntity]
          .join(' ')
          .toLowerCase()
        if (!haystack.includes(text)) return false
      }
      if (filters.dueAfter && (!opportunity.dueAt || opportunity.dueAt < filters.dueAfter)) return false
      if (filters.dueBefore && (!opportunity.dueAt || opportunity.dueAt > filters.dueBefore)) return false
      return true
    })

    // Soonest deadline first; undated last
    matches.sort((a, b) => (a.dueAt?.getTime() ?? Infinity) - (b.dueAt?.getTime() ?? Infinity))

    return filters.limit !== undefined ? matches.slice(0, filters.limit) : matches
  }

  get size(): number {
    return this.opportunities.size
  }
}
