import { appendLog } from './append.js'

type SafeErrorInfo = {
  message: string
  name?: string
  stack?: string
}

export type SafeOptions<T> = {
  logPath?: string
  meta?: Record<string, unknown>
  fallback?: (error: unknown) => T
}

export type SafeLogOptions = Omit<SafeOptions<unknown>, 'fallback'>

let defaultLogPath: string | null = null

export const setDefaultLogPath = (path?: string | null): void => {
  const trimmed = typeof path === 'string' ? path.trim() : ''
  defaultLogPath = trimmed.length > 0 ? trimmed : null
}

const trimStack = (stack?: string, lines = 6): string | undefined => {
  if (!stack) return undefined
  return stack.split(/\r?\n/).slice(0, lines).join('\n')
}

const normalizeError = (error: unknown): SafeErrorInfo => {
  if (!(error instanceof Error)) return { message: String(error) }
  const stack = trimStack(error.stack)
  return {
    message: error.message,
    name: error.name,
    ...(stack ? { stack } : {}),
  }
}

export const logSafeError = async (
  context: string,
  error: unknown,
  options?: SafeLogOptions,
): Promise<void> => {
  const info = normalizeError(error)
  const payload = {
    event: 'error',
    context,
    error: info.message,
    ...(info.name ? { errorName: info.name } : {}),
    ...(info.stack ? { errorStack: info.stack } : {}),
    ...(options?.meta ? { meta: options.meta } : {}),
  }
  const logPath = options?.logPath ?? defaultLogPath
  if (logPath) {
    try {
      await appendLog(logPath, payload)
      return
    } catch (appendError) {
      console.error(`[safe] failed to append log for ${context}`, appendError)
    }
  }
  console.error(`[safe] ${context}`, payload)
}

export const safe = async <T>(
  context: string,
  fn: () => T | Promise<T>,
  options: SafeOptions<T> = {},
): Promise<T> => {
  try {
    return await fn()
  } catch (error) {
    await logSafeError(context, error, options)
    if (!options.fallback) throw error
    return options.fallback(error)
  }
}

export const bestEffort = async (
  context: string,
  fn: () => unknown,
  options: SafeLogOptions = {},
): Promise<void> => {
  await safe<unknown>(context, fn, {
    ...options,
    fallback: () => undefined,
  })
}
