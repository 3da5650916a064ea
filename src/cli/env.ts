import { selectBackend } from '../decision/select.js'

import type { AppConfig } from '../config.js'

type Env = Record<string, string | undefined>

const envString = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim()
  return value ? value : undefined
}

const parseEnvPositiveInteger = (
  env: Env,
  name: string,
): number | undefined => {
  const value = envString(env, name)
  if (!value) return undefined
  const parsed = Number(value)
  if (Number.isInteger(parsed) && parsed > 0) return parsed
  console.warn(`[cli] invalid ${name}:`, value)
  return undefined
}

const parseEnvNonNegativeInteger = (
  env: Env,
  name: string,
): number | undefined => {
  const value = envString(env, name)
  if (!value) return undefined
  const parsed = Number(value)
  if (Number.isInteger(parsed) && parsed >= 0) return parsed
  console.warn(`[cli] invalid ${name}:`, value)
  return undefined
}

const parseEnvPrice = (env: Env, name: string): number | undefined => {
  const value = envString(env, name)
  if (!value) return undefined
  const parsed = Number(value)
  if (Number.isFinite(parsed) && parsed >= 0) return parsed
  console.warn(`[cli] invalid ${name}:`, value)
  return undefined
}

const resolveApiKey = (env: Env, model: string): string | undefined => {
  const explicit = envString(env, 'DROIDLOOP_LLM_API_KEY')
  if (explicit) return explicit
  const backend = selectBackend(model)
  if (backend === 'anthropic') return envString(env, 'ANTHROPIC_API_KEY')
  if (backend === 'openai-chat') return envString(env, 'OPENAI_API_KEY')
  return undefined
}

const applyDecisionEnv = (config: AppConfig, env: Env): void => {
  const model = envString(env, 'DROIDLOOP_MODEL')
  if (model) config.decision.model = model
  const apiKey = resolveApiKey(env, config.decision.model)
  if (apiKey) config.decision.apiKey = apiKey
  const openAiBaseUrl = envString(env, 'OPENAI_BASE_URL')
  if (openAiBaseUrl) config.decision.openai.baseUrl = openAiBaseUrl
  const ollamaHost = envString(env, 'DROIDLOOP_OLLAMA_HOST')
  if (ollamaHost) config.decision.ollama.host = ollamaHost
  const timeoutMs = parseEnvPositiveInteger(env, 'DROIDLOOP_DECISION_TIMEOUT_MS')
  if (timeoutMs !== undefined) config.decision.timeoutMs = timeoutMs
}

const applyRunnerEnv = (config: AppConfig, env: Env): void => {
  const maxSteps = parseEnvPositiveInteger(env, 'DROIDLOOP_MAX_STEPS')
  if (maxSteps !== undefined) config.runner.maxSteps = maxSteps
  const maxConcurrent = parseEnvPositiveInteger(env, 'DROIDLOOP_MAX_CONCURRENT')
  if (maxConcurrent !== undefined) config.runner.maxConcurrent = maxConcurrent
  const stepDelayMs = parseEnvNonNegativeInteger(env, 'DROIDLOOP_STEP_DELAY_MS')
  if (stepDelayMs !== undefined) config.runner.stepDelayMs = stepDelayMs
  const maxTasks = parseEnvPositiveInteger(env, 'DROIDLOOP_MAX_TASKS')
  if (maxTasks !== undefined && maxTasks > config.tasks.evictionHeadroom)
    config.tasks.maxTasks = maxTasks
}

const applyPricingEnv = (config: AppConfig, env: Env): void => {
  const input = parseEnvPrice(env, 'DROIDLOOP_PRICE_INPUT_PER_1K')
  if (input !== undefined) config.pricing.inputPer1k = input
  const output = parseEnvPrice(env, 'DROIDLOOP_PRICE_OUTPUT_PER_1K')
  if (output !== undefined) config.pricing.outputPer1k = output
}

const applyDeviceEnv = (config: AppConfig, env: Env): void => {
  const adbPath = envString(env, 'DROIDLOOP_ADB_PATH')
  if (adbPath) config.device.adbPath = adbPath
  const host = envString(env, 'DROIDLOOP_ADB_HOST')
  if (host) config.device.host = host
  const port = parseEnvPositiveInteger(env, 'DROIDLOOP_ADB_PORT')
  if (port !== undefined && port <= 65535) config.device.port = port
  const timeoutMs = parseEnvPositiveInteger(env, 'DROIDLOOP_DEVICE_TIMEOUT_MS')
  if (timeoutMs !== undefined) config.device.timeoutMs = timeoutMs
}

export const applyCliEnvOverrides = (
  config: AppConfig,
  env: Env = process.env,
): void => {
  applyDecisionEnv(config, env)
  applyRunnerEnv(config, env)
  applyPricingEnv(config, env)
  applyDeviceEnv(config, env)
}
