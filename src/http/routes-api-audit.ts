import { readAuditReport } from '../audit/reader.js'

import { auditQuerySchema, parseWith } from './schemas.js'

import type { FastifyInstance } from 'fastify'

/** Recent audit entries, newest first, plus totals over the whole current log file. */
export const registerAuditRoute = (
  app: FastifyInstance,
  auditLogPath: string,
): void => {
  app.get('/api/audit', async (request) => {
    const query = parseWith(auditQuerySchema, request.query)
    return readAuditReport(auditLogPath, {
      ...(query.limit !== undefined ? { limit: query.limit } : {}),
      ...(query.event ? { event: query.event } : {}),
      ...(query.action ? { action: query.action } : {}),
    })
  })
}
