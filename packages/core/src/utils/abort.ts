export interface TimeoutSignal {
  signal: AbortSignal
  /** Detaches from the caller signal; call once the request has settled */
  dispose: () => void
}

/**
 * Combine an optional caller signal with a per-request timeout.
 *
 * The caller signal usually outlives many requests, so the listener added to
 * it must be released through `dispose`.
 */
export function timeoutSignal(timeoutMs: number, signal?: AbortSignal): TimeoutSignal {
  const timeout = AbortSignal.timeout(timeoutMs)
  if (!signal) return { signal: timeout, dispose: () => undefined }

  const controller = new AbortController()
  if (signal.aborted) {
    controller.abort(signal.reason)
    return { signal: controller.signal, dispose: () => undefined }
  }

  const onCallerAbort = (): void => controller.abort(signal.reason)
  signal.addEventListener('abort', onCallerAbort, { once: true })
  timeout.addEventListener('abort', () => controller.abort(timeout.reason), { once: true })

  return {
    signal: controller.signal,
    dispose: () => signal.removeEventListener('abort', onCallerAbort),
  }
}
