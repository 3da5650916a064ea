import { join } from 'node:path'

import { loadDefaultConfigFromYaml, type AppDefaults } from './config-default-loader.js'

export type DecisionConfig = AppDefaults['decision'] & {
  apiKey?: string
}

export type AppConfig = Omit<AppDefaults, 'decision'> & {
  stateDir: string
  decision: DecisionConfig
}

export type StatePaths = {
  root: string
  log: string
  audit: string
}

type Overrides<T> = {
  [K in keyof T]?: T[K] extends Record<string, unknown> ? Overrides<T[K]> : T[K]
}

export type ConfigOverrides = Overrides<Omit<AppConfig, 'stateDir'>>

let cachedDefaults: AppDefaults | undefined

const loadDefaults = (): AppDefaults => {
  cachedDefaults ??= loadDefaultConfigFromYaml()
  return structuredClone(cachedDefaults)
}

export const defaultConfig = (params: {
  stateDir: string
  overrides?: ConfigOverrides
}): AppConfig => {
  const base = loadDefaults()
  const patch = params.overrides ?? {}
  return {
    stateDir: params.stateDir,
    decision: {
      ...base.decision,
      ...patch.decision,
      openai: { ...base.decision.openai, ...patch.decision?.openai },
      anthropic: { ...base.decision.anthropic, ...patch.decision?.anthropic },
      ollama: { ...base.decision.ollama, ...patch.decision?.ollama },
    },
    runner: {
      ...base.runner,
      ...patch.runner,
      context: { ...base.runner.context, ...patch.runner?.context },
    },
    pricing: { ...base.pricing, ...patch.pricing },
    device: {
      ...base.device,
      ...patch.device,
      swipe: { ...base.device.swipe, ...patch.device?.swipe },
    },
    tasks: { ...base.tasks, ...patch.tasks },
  }
}

export const buildPaths = (stateDir: string): StatePaths => ({
  root: stateDir,
  log: join(stateDir, 'log.jsonl'),
  audit: join(stateDir, 'audit.jsonl'),
})
