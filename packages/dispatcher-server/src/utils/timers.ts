// setTimeout fires after 1ms for anything above a signed 32-bit delay
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

/**
 * Runs `fn` once after `ms`, chaining timers when the delay exceeds what a single
 * setTimeout can hold. Returns a function that cancels the pending call.
 */
export function startTimer(fn: () => void, ms: number): () => void {
  let remaining = Math.max(0, ms)
  let handle: ReturnType<typeof setTimeout> | undefined

  const schedule = () => {
    const step = Math.min(remaining, MAX_TIMER_DELAY_MS)
    remaining -= step
    handle = setTimeout(() => {
      if (remaining > 0) {
        schedule()
        return
      }
      handle = undefined
      fn()
    }, step)
  }
  schedule()

  return () => {
    if (handle !== undefined) clearTimeout(handle)
    handle = undefined
  }
}

/**
 * Resolves after `ms`, or rejects with the signal's reason once it aborts.
 * Uses the global timer functions so tests can drive it with fake timers.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal))
      return
    }
    const onAbort = () => {
      cancel()
      reject(abortReason(signal))
    }
    const cancel = startTimer(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason
  if (reason instanceof Error) return reason
  return new Error(typeof reason === 'string' ? reason : 'Aborted')
}
