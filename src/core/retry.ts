import { AbortOperationError } from './errors.ts'

const ASYNC_WAIT_STEPS_MS = [100, 300, 600]
export const ASYNC_MAX_WAIT_MS = 1000

/** Polling delays for async operations: a short ramp, then a fixed cap. */
export function* asyncWaitTimes(): Generator<number, never, unknown> {
  for (const step of ASYNC_WAIT_STEPS_MS) yield step
  while (true) yield ASYNC_MAX_WAIT_MS
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortOperationError())
      return
    }

    let onAbort: (() => void) | undefined

    const timeoutId = setTimeout(() => {
      if (onAbort) signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    timeoutId.unref()

    if (signal) {
      onAbort = () => {
        clearTimeout(timeoutId)
        reject(new AbortOperationError())
      }
      signal.addEventListener('abort', onAbort, { once: true })
    }
  })
}
