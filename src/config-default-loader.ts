import { existsSync, readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

import { parse as parseYaml } from 'yaml'
import { z } from 'zod'

const positiveInt = z.number().int().positive()
const nonNegativeInt = z.number().int().nonnegative()
const url = z.string().url()

const decisionSchema = z
  .object({
    model: z.string().min(1),
    timeoutMs: positiveInt,
    temperature: z.number().min(0).max(2),
    maxOutputTokens: positiveInt,
    imageDetail: z.enum(['low', 'high', 'auto']),
    openai: z.object({ baseUrl: url }).strict(),
    anthropic: z.object({ baseUrl: url, version: z.string().min(1) }).strict(),
    ollama: z.object({ host: url }).strict(),
  })
  .strict()

const runnerSchema = z
  .object({
    maxSteps: positiveInt,
    stepDelayMs: nonNegativeInt,
    maxConcurrent: positiveInt,
    context: z
      .object({
        maxUiDumpChars: positiveInt,
        maxLabeledElements: nonNegativeInt,
        maxUnlabeledElements: nonNegativeInt,
      })
      .strict(),
  })
  .strict()

const pricingSchema = z
  .object({
    inputPer1k: z.number().finite().nonnegative(),
    outputPer1k: z.number().finite().nonnegative(),
    decimals: z.number().int().min(0).max(12),
  })
  .strict()

const deviceSchema = z
  .object({
    adbPath: z.string().min(1),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    timeoutMs: positiveInt,
    healthTtlMs: nonNegativeInt,
    swipe: z
      .object({
        centerX: nonNegativeInt,
        centerY: nonNegativeInt,
        distance: positiveInt,
        durationMs: positiveInt,
      })
      .strict(),
  })
  .strict()

const tasksSchema = z
  .object({
    maxTasks: positiveInt,
    evictionHeadroom: nonNegativeInt,
    listLimit: positiveInt,
  })
  .strict()

export const defaultConfigSchema = z
  .object({
    decision: decisionSchema,
    runner: runnerSchema,
    pricing: pricingSchema,
    device: deviceSchema,
    tasks: tasksSchema,
  })
  .strict()

export type AppDefaults = z.infer<typeof defaultConfigSchema>

const CONFIG_CANDIDATES = [
  '../config/default.yaml',
  '../../config/default.yaml',
].map((relative) => fileURLToPath(new URL(relative, import.meta.url)))

export const DEFAULT_CONFIG_PATH =
  CONFIG_CANDIDATES.find((path) => existsSync(path)) ?? CONFIG_CANDIDATES[0]

export const parseDefaultConfigYaml = (source: string): AppDefaults => {
  const parsed: unknown = parseYaml(source)
  const validated = defaultConfigSchema.safeParse(parsed)
  if (validated.success) {
    if (validated.data.tasks.evictionHeadroom >= validated.data.tasks.maxTasks) {
      throw new Error(
        '[config] invalid yaml defaults: tasks.evictionHeadroom must be < tasks.maxTasks',
      )
    }
    return validated.data
  }

  const issues = validated.error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ')
  throw new Error(`[config] invalid yaml defaults: ${issues}`)
}

export const loadDefaultConfigFromYaml = (
  path = DEFAULT_CONFIG_PATH,
): AppDefaults => {
  if (!path) throw new Error('[config] default.yaml not found')
  return parseDefaultConfigYaml(readFileSync(path, 'utf8'))
}
