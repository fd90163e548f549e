import { describe, it, expect } from 'vitest'
import { StrategyChain } from '../chain.js'
import { PortalScraper, computeCompleteness } from '../portal-scraper.js'
import { FakeStrategy, makeRecord, makeRecords } from './fakes.js'

const target = { name: 'city', baseUrl: 'https://bids.example.gov/portal/', searchUrl: 'https://bids.example.gov/open' }

function scraperWith(...strategies: FakeStrategy[]): PortalScraper {
  return new PortalScraper(target, new StrategyChain(strategies), { displayName: 'City of Example' })
}

describe('computeCompleteness', () => {
  it('scores a fully populated record as 1', () => {
    expect(computeCompleteness(makeRecord({ portal: 'city' }))).toBe(1)
  })

  it('weighs required fields at 0.7', () => {
    const record = makeRecord({
      portal: 'city',
      issuingEntity: '',
      dueAt: undefined,
      description: undefined,
      url: undefined,
    })
    expect(computeCompleteness(record)).toBeCloseTo(0.7)
  })

  it('counts half of the optional fields', () => {
    const record = makeRecord({ portal: 'city', description: undefined, url: undefined })
    expect(computeCompleteness(record)).toBeCloseTo(0.85)
  })
})

describe('PortalScraper', () => {
  it('exposes portal identity', () => {
    const scraper = scraperWith(new FakeStrategy('export', async () => []))

    expect(scraper.name).toBe('city')
    expect(scraper.baseUrl).toBe('https://bids.example.gov/portal/')
    expect(scraper.displayName).toBe('City of Example')
    expect(scraper.strategyNames).toEqual(['export'])
  })

  it('attaches portal identity and cleans records', async () => {
    const scraper = scraperWith(
      new FakeStrategy('export', async () => [
        makeRecord({ externalId: 'A', title: '  Paving  ', documentUrls: ['files/a.pdf', '/files/a.pdf'] }),
        makeRecord({ externalId: 'B', title: '   ' }),
        makeRecord({ externalId: 'A', title: 'Paving (duplicate)' }),
        makeRecord({ externalId: 'C', title: 'Mowing', url: '/bids/c' }),
      ])
    )

    const records = await scraper.run(10)

    expect(records.map((record) => [record.externalId, record.title, record.portal])).toEqual([
      ['A', 'Paving', 'city'],
      ['C', 'Mowing', 'city'],
    ])
    expect(records[0].documentUrls).toEqual([
      'https://bids.example.gov/portal/files/a.pdf',
      'https://bids.example.gov/files/a.pdf',
    ])
    expect(records[1].url).toBe('https://bids.example.gov/bids/c')
    expect(records[0].sourceStrategy).toBe('export')
  })

  it('truncates to the limit', async () => {
    const scraper = scraperWith(new FakeStrategy('export', async () => makeRecords(8)))

    const records = await scraper.run(3)

    expect(records.map((record) => record.externalId)).toEqual(['RFP-1', 'RFP-2', 'RFP-3'])
  })

  it('returns nothing for a zero limit even when the strategy ignores it', async () => {
    const scraper = scraperWith(new FakeStrategy('export', async () => makeRecords(4)))

    const records = await scraper.run(0)

    expect(records).toEqual([])
  })

  it('records run statistics', async () => {
    const scraper = scraperWith(
      new FakeStrategy('graphql', async () => {
        throw new Error('schema changed')
      }, 10),
      new FakeStrategy('export', async () => makeRecords(4), 20)
    )

    await scraper.run(10)
    await scraper.run(10)

    const stats = scraper.getStats()
    expect(stats).toMatchObject({ recordsFound: 4, lastStrategy: 'export', averageCompleteness: 1, runs: 2 })
    expect(stats.lastRunDurationMs).toBeGreaterThanOrEqual(0)

    const performance = scraper.getPerformanceSummary()
    expect(Object.keys(performance).sort()).toEqual(['export', 'graphql'])
    expect(performance.export.count).toBe(2)
    expect(performance.graphql.count).toBe(2)
    expect(scraper.getLastOutcomes().map((outcome) => outcome.status)).toEqual(['failed', 'records'])
  })

  it('returns an empty list when every strategy comes back empty', async () => {
    const scraper = scraperWith(new FakeStrategy('export', async () => []))

    expect(await scraper.run(10)).toEqual([])
    expect(scraper.getStats()).toMatchObject({ recordsFound: 0, lastStrategy: null, averageCompleteness: null })
  })
})
