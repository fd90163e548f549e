import { CancelledError } from '../errors.js'

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

/**
 * Throw CancelledError if the signal has fired.
 * Called at every suspension point re-entry.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(describeReason(signal.reason))
  }
}

function describeReason(reason: unknown): string | undefined {
  if (typeof reason === 'string') return reason
  if (reason instanceof Error) return reason.message
  return undefined
}

/**
 * Sleep that rejects with CancelledError as soon as the signal aborts.
 */
export const sleep: SleepFn = (ms, signal) => {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(describeReason(signal.reason)))
      return
    }

    const onAbort = (): void => {
      clearTimeout(timer)
      reject(new CancelledError(describeReason(signal?.reason)))
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, Math.max(0, ms))

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Race a promise against cancellation. The underlying work is not stopped;
 * callers that own the work should pass the signal down as well.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise
  throwIfCancelled(signal)

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new CancelledError(describeReason(signal.reason)))
    }
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}

/**
 * Child controller that aborts when the parent signal aborts or the timeout
 * elapses. `dispose()` must be called once the guarded work settles.
 */
export function linkedTimeout(
  timeoutMs: number,
  parent?: AbortSignal
): { signal: AbortSignal; timedOut: () => boolean; dispose: () => void } {
  const controller = new AbortController()
  let didTimeout = false

  const timer = setTimeout(() => {
    didTimeout = true
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`))
  }, timeoutMs)

  const onParentAbort = (): void => {
    controller.abort(parent?.reason)
  }

  if (parent?.aborted) {
    controller.abort(parent.reason)
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true })
  }

  return {
    signal: controller.signal,
    timedOut: () => didTimeout,
    dispose: () => {
      clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
    },
  }
}
