import { appendLog } from '../log/append.js'
import { bestEffort } from '../log/safe.js'
import { isRecord } from '../shared/utils.js'

export type AuditEventName =
  | 'runner_step'
  | 'runner_action_failed'
  | 'runner_complete'
  | 'runner_max_steps'
  | 'runner_aborted'
  | 'runner_exception'
  | 'runner_cancelled'

export type AuditEvent = {
  event: AuditEventName
  goal: string
  success: boolean
  tokensUsed: number
  durationMs: number
  step?: number
  error?: string
  details?: Record<string, unknown>
}

/** Fire-and-forget: callers never await it and its failures stay inside. */
export type AuditSink = (event: AuditEvent) => void

export const REDACTED = '<redacted>'

const SECRET_KEYS = new Set(['api_key', 'apikey', 'password', 'secret', 'token'])
const PAYLOAD_KEYS = new Set([
  'screenshot',
  'screenshot_base64',
  'screenshotbase64',
  'xml',
  'uidump',
])

const redactValue = (key: string, value: unknown): unknown => {
  const normalized = key.toLowerCase()
  if (SECRET_KEYS.has(normalized)) return REDACTED
  if (PAYLOAD_KEYS.has(normalized))
    return typeof value === 'string' ? `<${value.length} chars>` : '<binary data>'
  if (Array.isArray(value))
    return value.map((item) => (isRecord(item) ? redactAuditDetails(item) : item))
  return isRecord(value) ? redactAuditDetails(value) : value
}

/** Masks credentials and replaces screen payloads with their size, at any depth. */
export const redactAuditDetails = (
  details: Record<string, unknown>,
): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(details).map(([key, value]) => [key, redactValue(key, value)]),
  )

export type AuditWriter = (entry: Record<string, unknown>) => Promise<void>

export const createAuditSink =
  (write: AuditWriter, meta: Record<string, unknown> = {}): AuditSink =>
  (event) => {
    const { details, ...rest } = event
    void bestEffort(`audit: ${event.event}`, () =>
      write({
        ...meta,
        ...rest,
        ...(details ? { details: redactAuditDetails(details) } : {}),
      }),
    )
  }

export const createFileAuditSink = (
  path: string,
  meta: Record<string, unknown> = {},
): AuditSink => createAuditSink((entry) => appendLog(path, entry), meta)
