import { z } from 'zod'

import { ValidationError } from '../errors.js'

export const MAX_STEPS_LIMIT = 100
export const MAX_LIST_LIMIT = 100

export const startTaskBodySchema = z
  .object({
    goal: z.string().trim().min(1, 'goal is required'),
    app: z.string().trim().min(1).optional(),
    parameters: z.record(z.unknown()).optional(),
    maxSteps: z.number().int().min(1).max(MAX_STEPS_LIMIT).optional(),
  })
  .strict()

export const listTasksQuerySchema = z.object({
  status: z
    .enum(['pending', 'running', 'completed', 'failed', 'cancelled', 'active'])
    .optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).optional(),
})

export const auditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).optional(),
  event: z.string().trim().min(1).optional(),
  action: z.string().trim().min(1).optional(),
})

export type StartTaskBody = z.infer<typeof startTaskBodySchema>
export type ListTasksQuery = z.infer<typeof listTasksQuerySchema>
export type AuditQueryParams = z.infer<typeof auditQuerySchema>

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join('.') || '<body>'}: ${issue.message}`)
    .join('; ')

export const parseWith = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T => {
  const parsed = schema.safeParse(value ?? {})
  if (!parsed.success) throw new ValidationError(formatIssues(parsed.error))
  return parsed.data
}
