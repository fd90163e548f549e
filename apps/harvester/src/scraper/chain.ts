/**
 * Strategy Chain
 *
 * Tries a portal's strategies in priority order and keeps the first
 * non-empty result. A strategy that throws (in its availability check or
 * its run) or yields nothing is logged at warn and the next one runs.
 * Only cancellation escapes.
 */

import type { ILogger } from '@bidwatch/logger'
import { loggers } from '../config/logger.js'
import { classifyError, isCancellation } from './errors.js'
import { sortByPriority } from './strategies/index.js'
import type {
  AcquireResult,
  AcquisitionStrategy,
  PortalTarget,
  RawRecord,
  StrategyOutcome,
} from './types.js'
import { throwIfCancelled } from './utils/sleep.js'

export class StrategyChain {
  readonly strategies: readonly AcquisitionStrategy[]
  private readonly log: ILogger

  constructor(strategies: AcquisitionStrategy[], logger: ILogger = loggers.chain) {
    this.strategies = sortByPriority(strategies)
    this.log = logger
  }

  /**
   * @throws CancelledError when the signal aborts; nothing else
   */
  async acquire(portal: PortalTarget, limit: number, signal?: AbortSignal): Promise<AcquireResult> {
    const outcomes: StrategyOutcome[] = []
    const log = this.log.child(portal.name)

    for (const strategy of this.strategies) {
      throwIfCancelled(signal)

      let available: boolean
      try {
        available = strategy.isAvailable()
      } catch (error) {
        outcomes.push(this.failed(portal, strategy, error, 0, log))
        continue
      }

      if (!available) {
        log.debug('Strategy unavailable, skipping', { strategy: strategy.name })
        outcomes.push({ strategy: strategy.name, status: 'unavailable', recordCount: 0, durationMs: 0 })
        continue
      }

      const startedAt = Date.now()
      let records: RawRecord[]

      try {
        log.info('Attempting strategy', { strategy: strategy.name, type: strategy.type })
        records = await strategy.execute(portal, limit, { signal, logger: log.child(strategy.name) })
      } catch (error) {
        if (isCancellation(error) || signal?.aborted) {
          throw error
        }

        outcomes.push(this.failed(portal, strategy, error, Date.now() - startedAt, log))
        continue
      }

      const durationMs = Date.now() - startedAt

      if (records.length === 0) {
        outcomes.push({ strategy: strategy.name, status: 'empty', recordCount: 0, durationMs })
        log.warn('STRATEGY_EMPTY', {
          event_name: 'STRATEGY_EMPTY',
          portal: portal.name,
          strategy: strategy.name,
          durationMs,
        })
        continue
      }

      outcomes.push({ strategy: strategy.name, status: 'records', recordCount: records.length, durationMs })
      log.info('Strategy succeeded', { strategy: strategy.name, recordCount: records.length, durationMs })

      return {
        records: records.map((record) => ({ ...record, sourceStrategy: strategy.name })),
        strategyUsed: strategy.name,
        outcomes,
      }
    }

    log.warn('All strategies exhausted', {
      event_name: 'STRATEGY_CHAIN_EXHAUSTED',
      portal: portal.name,
      tried: outcomes.map((outcome) => `${outcome.strategy}:${outcome.status}`),
    })
    return { records: [], strategyUsed: null, outcomes }
  }

  private failed(
    portal: PortalTarget,
    strategy: AcquisitionStrategy,
    error: unknown,
    durationMs: number,
    log: ILogger
  ): StrategyOutcome {
    const classified = classifyError(error)
    log.warn('STRATEGY_FAILED', {
      event_name: 'STRATEGY_FAILED',
      portal: portal.name,
      strategy: strategy.name,
      errorKind: classified.kind,
      reason: classified.message,
      durationMs,
    })
    return {
      strategy: strategy.name,
      status: 'failed',
      recordCount: 0,
      durationMs,
      errorKind: classified.kind,
      error: classified.message,
    }
  }
}
