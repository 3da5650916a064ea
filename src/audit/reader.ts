import read from 'fire-keeper/read'
import { z } from 'zod'

export const DEFAULT_AUDIT_LIMIT = 100
export const MAX_AUDIT_LIMIT = 500

const auditEntrySchema = z.object({
  time: z.string().optional(),
  event: z.string(),
  goal: z.string().optional(),
  taskId: z.string().optional(),
  success: z.boolean(),
  tokensUsed: z.number(),
  durationMs: z.number().optional(),
  step: z.number().optional(),
  error: z.string().optional(),
  details: z.record(z.unknown()).optional(),
})

export type AuditEntry = z.infer<typeof auditEntrySchema>

export type AuditQuery = {
  limit?: number
  event?: string
  action?: string
}

export type AuditStats = {
  totalEvents: number
  successfulEvents: number
  failedEvents: number
  stepsRecorded: number
  totalTokensUsed: number
  eventsByName: Record<string, number>
  actionsByType: Record<string, number>
}

export type AuditReport = {
  entries: AuditEntry[]
  stats: AuditStats
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

const readAuditText = async (path: string): Promise<string> => {
  try {
    const content = await read(path, { raw: true, echo: false })
    if (!content) return ''
    if (Buffer.isBuffer(content)) return content.toString('utf8')
    return typeof content === 'string' ? content : ''
  } catch (error) {
    if (isMissingFile(error)) return ''
    throw error
  }
}

const parseLine = (line: string): AuditEntry | null => {
  let value: unknown
  try {
    value = JSON.parse(line)
  } catch {
    return null
  }
  const parsed = auditEntrySchema.safeParse(value)
  return parsed.success ? parsed.data : null
}

/** Entries in file order; blank, malformed and non-audit lines are skipped. */
export const parseAuditLog = (text: string): AuditEntry[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .flatMap((line) => {
      const entry = parseLine(line)
      return entry ? [entry] : []
    })

export const entryAction = (entry: AuditEntry): string | null => {
  const action = entry.details?.['action']
  return typeof action === 'string' ? action : null
}

const increment = (counts: Record<string, number>, key: string): void => {
  counts[key] = (counts[key] ?? 0) + 1
}

/** Token totals come from `runner_step` entries only; run-level events repeat the running sum. */
export const summarizeAudit = (entries: AuditEntry[]): AuditStats => {
  const stats: AuditStats = {
    totalEvents: 0,
    successfulEvents: 0,
    failedEvents: 0,
    stepsRecorded: 0,
    totalTokensUsed: 0,
    eventsByName: {},
    actionsByType: {},
  }
  for (const entry of entries) {
    stats.totalEvents += 1
    if (entry.success) stats.successfulEvents += 1
    else stats.failedEvents += 1
    increment(stats.eventsByName, entry.event)
    if (entry.event !== 'runner_step') continue
    stats.stepsRecorded += 1
    stats.totalTokensUsed += entry.tokensUsed
    increment(stats.actionsByType, entryAction(entry) ?? 'unknown')
  }
  return stats
}

export const clampAuditLimit = (limit?: number): number => {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_AUDIT_LIMIT
  return Math.min(MAX_AUDIT_LIMIT, Math.max(1, Math.floor(limit)))
}

export const selectRecentEntries = (
  entries: AuditEntry[],
  query: AuditQuery = {},
): AuditEntry[] =>
  entries
    .filter((entry) => !query.event || entry.event === query.event)
    .filter((entry) => !query.action || entryAction(entry) === query.action)
    .reverse()
    .slice(0, clampAuditLimit(query.limit))

export const readAuditReport = async (
  path: string,
  query: AuditQuery = {},
): Promise<AuditReport> => {
  const entries = parseAuditLog(await readAuditText(path))
  return {
    entries: selectRecentEntries(entries, query),
    stats: summarizeAudit(entries),
  }
}
