import { z } from 'zod'

import type { ActionType, Decision } from '../types/index.js'

const ACTIONS = [
  'tap',
  'type',
  'swipe',
  'press_key',
  'wait',
  'done',
  'error',
] as const satisfies readonly ActionType[]

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i

const decisionWireSchema = z.object({
  action: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(ACTIONS),
  ),
  params: z
    .record(z.unknown())
    .nullish()
    .transform((value) => value ?? {}),
  done: z
    .boolean()
    .nullish()
    .transform((value) => value ?? false),
  reasoning: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
})

export type DecisionParseResult =
  | { ok: true; decision: Decision }
  | { ok: false; reason: 'empty' | 'malformed'; message: string }

export const extractJsonText = (raw: string): string => {
  const fenced = FENCE_PATTERN.exec(raw)
  if (fenced?.[1] !== undefined) return fenced[1].trim()
  const trimmed = raw.trim()
  if (trimmed.startsWith('{')) return trimmed
  const start = trimmed.indexOf('{')
  const end = trimmed.lastIndexOf('}')
  if (start >= 0 && end > start) return trimmed.slice(start, end + 1)
  return trimmed
}

export const parseDecisionText = (raw: string): DecisionParseResult => {
  if (!raw.trim()) return { ok: false, reason: 'empty', message: 'empty output' }
  const jsonText = extractJsonText(raw)
  let parsed: unknown
  try {
    parsed = JSON.parse(jsonText)
  } catch {
    return {
      ok: false,
      reason: 'malformed',
      message: `not valid JSON: ${jsonText.slice(0, 200)}`,
    }
  }
  const validated = decisionWireSchema.safeParse(parsed)
  if (!validated.success) {
    const issues = validated.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    return { ok: false, reason: 'malformed', message: issues }
  }
  return { ok: true, decision: validated.data }
}

export const isTerminalDecision = (decision: Decision): boolean =>
  decision.action === 'done' || decision.done
