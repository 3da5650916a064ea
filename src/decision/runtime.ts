export const bindExternalAbort = (params: {
  controller: AbortController
  abortSignal?: AbortSignal
  onAbort?: () => void
}): (() => void) => {
  const { abortSignal, controller, onAbort } = params
  if (!abortSignal) return () => undefined
  const abort = () => {
    onAbort?.()
    if (!controller.signal.aborted) controller.abort(abortSignal.reason)
  }
  if (abortSignal.aborted) abort()
  else abortSignal.addEventListener('abort', abort, { once: true })
  return () => abortSignal.removeEventListener('abort', abort)
}

export const createTimeoutGuard = (params: {
  controller: AbortController
  timeoutMs: number
  onTimeout?: () => void
}) => {
  const { controller, timeoutMs, onTimeout } = params
  let timer: ReturnType<typeof setTimeout> | undefined
  const clear = (): void => {
    clearTimeout(timer)
  }
  const arm = (): void => {
    if (timeoutMs <= 0) return
    clearTimeout(timer)
    timer = setTimeout(() => {
      onTimeout?.()
      if (!controller.signal.aborted) controller.abort()
    }, timeoutMs)
  }
  return { arm, clear }
}

/** Settles with `work`, or rejects as soon as `signal` aborts. */
export const raceAbort = <T>(work: Promise<T>, signal: AbortSignal): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(
        signal.reason instanceof Error ? signal.reason : new Error('aborted'),
      )
    }
    if (signal.aborted) {
      onAbort()
      return
    }
    signal.addEventListener('abort', onAbort, { once: true })
    void work
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort))
  })

export class CallTimeoutError extends Error {
  readonly timeoutMs: number

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`)
    this.name = 'CallTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/**
 * Runs `run` with a signal that aborts after `timeoutMs` or when the external
 * signal fires. A timeout rejects with {@link CallTimeoutError} even when
 * `run` ignores its signal.
 */
export const withDeadline = async <T>(params: {
  label: string
  timeoutMs: number
  signal?: AbortSignal
  run: (signal: AbortSignal) => Promise<T>
}): Promise<T> => {
  const controller = new AbortController()
  let timedOut = false
  const release = bindExternalAbort({
    controller,
    ...(params.signal ? { abortSignal: params.signal } : {}),
  })
  const guard = createTimeoutGuard({
    controller,
    timeoutMs: params.timeoutMs,
    onTimeout: () => {
      timedOut = true
    },
  })
  guard.arm()
  try {
    return await raceAbort(params.run(controller.signal), controller.signal)
  } catch (error) {
    if (timedOut) throw new CallTimeoutError(params.label, params.timeoutMs)
    throw error
  } finally {
    guard.clear()
    release()
  }
}
