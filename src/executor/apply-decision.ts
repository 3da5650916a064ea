import { CallTimeoutError, withDeadline } from '../decision/runtime.js'
import { appendLog } from '../log/append.js'
import { bestEffort } from '../log/safe.js'
import { errorMessage, sleep } from '../shared/utils.js'

import type {
  DeviceCapability,
  DevicePrimitive,
  SwipeDirection,
} from '../device/types.js'
import type { Decision, ExecutionFailure } from '../types/index.js'

export type ExecutionOutcome =
  | { success: true; error: null }
  | { success: false; error: string; failure: ExecutionFailure }

export type ExecutorOptions = {
  deviceTimeoutMs: number
  logPath?: string
  signal?: AbortSignal
  logContext?: Record<string, unknown>
  delay?: (ms: number) => Promise<unknown>
}

const MAX_WAIT_SECONDS = 30
const DEFAULT_WAIT_SECONDS = 1
const DECLARED_ERROR_FALLBACK = 'Unknown error from decision service'
const SWIPE_DIRECTIONS = new Set<string>(['up', 'down', 'left', 'right'])

const ok = (): ExecutionOutcome => ({ success: true, error: null })

const fail = (failure: ExecutionFailure, error: string): ExecutionOutcome => ({
  success: false,
  error,
  failure,
})

const readNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : undefined
  }
  return undefined
}

const readText = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined

const isSwipeDirection = (value: string): value is SwipeDirection =>
  SWIPE_DIRECTIONS.has(value)

export const waitSeconds = (params: Record<string, unknown>): number => {
  const seconds = readNumber(params['seconds']) ?? DEFAULT_WAIT_SECONDS
  return Math.min(MAX_WAIT_SECONDS, Math.max(0, seconds))
}

export const declaredErrorMessage = (decision: Decision): string =>
  readText(decision.params['message']) ??
  (decision.reasoning.trim() || DECLARED_ERROR_FALLBACK)

/** Maps a device-bound decision to its primitive, or explains why it can't. */
export const toPrimitive = (
  decision: Decision,
): DevicePrimitive | { invalid: string } | { unsupported: string } => {
  const { params } = decision
  switch (decision.action) {
    case 'tap': {
      const x = readNumber(params['x'])
      const y = readNumber(params['y'])
      if (x === undefined || y === undefined)
        return { invalid: 'tap requires x and y parameters' }
      return { kind: 'tap', x, y }
    }
    case 'type': {
      const text = readText(params['text'])
      if (!text) return { invalid: 'type requires text parameter' }
      return { kind: 'type', text }
    }
    case 'swipe': {
      const raw = readText(params['direction'])?.toLowerCase() ?? 'up'
      if (!isSwipeDirection(raw))
        return {
          invalid: `Invalid direction: ${raw}. Use up/down/left/right.`,
        }
      return { kind: 'swipe', direction: raw }
    }
    case 'press_key': {
      const key = readText(params['key'])
      if (!key) return { invalid: 'press_key requires key parameter' }
      return { kind: 'press_key', key }
    }
    default:
      return { unsupported: `${decision.action} has no device primitive` }
  }
}

export const applyDecision = async (
  decision: Decision,
  device: DeviceCapability,
  options: ExecutorOptions,
): Promise<ExecutionOutcome> => {
  const record = (entry: Record<string, unknown>): void => {
    const { logPath } = options
    if (!logPath) return
    void bestEffort('executor: append log', () =>
      appendLog(logPath, { ...options.logContext, ...entry }),
    )
  }

  switch (decision.action) {
    case 'done':
      return ok()
    case 'error':
      return fail('declared', declaredErrorMessage(decision))
    case 'wait': {
      const delay = options.delay ?? sleep
      await delay(waitSeconds(decision.params) * 1000)
      return ok()
    }
    default:
      break
  }

  const primitive = toPrimitive(decision)
  if ('unsupported' in primitive)
    return fail('unsupported', primitive.unsupported)
  if ('invalid' in primitive) {
    record({
      event: 'executor_invalid_params',
      action: decision.action,
      params: decision.params,
      error: primitive.invalid,
    })
    return fail('invalid_params', primitive.invalid)
  }

  try {
    const result = await withDeadline({
      label: `device ${primitive.kind}`,
      timeoutMs: options.deviceTimeoutMs,
      ...(options.signal ? { signal: options.signal } : {}),
      run: (signal) => device.applyPrimitive(primitive, signal),
    })
    if (result.success) return ok()
    const error = result.error ?? `device ${primitive.kind} failed`
    record({
      event: 'executor_device_failed',
      action: decision.action,
      error,
    })
    return fail('device', error)
  } catch (error) {
    const timedOut = error instanceof CallTimeoutError
    const message = errorMessage(error)
    record({
      event: 'executor_device_failed',
      action: decision.action,
      error: message,
      timedOut,
    })
    return fail(timedOut ? 'timeout' : 'device', message)
  }
}
