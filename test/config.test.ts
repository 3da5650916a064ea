import { afterEach, expect, test, vi } from 'vitest'

import { applyCliEnvOverrides } from '../src/cli/env.js'
import { parseDefaultConfigYaml } from '../src/config-default-loader.js'
import { buildPaths, defaultConfig } from '../src/config.js'

afterEach(() => {
  vi.restoreAllMocks()
})

test('loads the shipped defaults', () => {
  const config = defaultConfig({ stateDir: '/tmp/droidloop-state' })
  expect(config.stateDir).toBe('/tmp/droidloop-state')
  expect(config.decision.temperature).toBe(0.3)
  expect(config.decision.maxOutputTokens).toBe(1000)
  expect(config.runner.maxSteps).toBe(20)
  expect(config.runner.context.maxUiDumpChars).toBe(4000)
  expect(config.pricing).toEqual({ inputPer1k: 0.005, outputPer1k: 0.015, decimals: 6 })
  expect(config.tasks.maxTasks).toBe(100)
  expect(config.device.healthTtlMs).toBe(30000)
})

test('overrides merge into nested sections', () => {
  const config = defaultConfig({
    stateDir: '/tmp/droidloop-state',
    overrides: { runner: { maxSteps: 5, context: { maxLabeledElements: 3 } } },
  })
  expect(config.runner.maxSteps).toBe(5)
  expect(config.runner.context).toEqual({
    maxUiDumpChars: 4000,
    maxLabeledElements: 3,
    maxUnlabeledElements: 10,
  })
  expect(defaultConfig({ stateDir: '/tmp/x' }).runner.maxSteps).toBe(20)
})

test('rejects unknown keys and inconsistent retention', () => {
  expect(() => parseDefaultConfigYaml('decision: {}\nextra: 1\n')).toThrow(
    /^\[config\] invalid yaml defaults: /,
  )
  const source = [
    'decision:',
    '  model: gpt-4o-mini',
    '  timeoutMs: 1000',
    '  temperature: 0.3',
    '  maxOutputTokens: 100',
    '  imageDetail: low',
    '  openai: { baseUrl: "https://api.openai.com/v1" }',
    '  anthropic: { baseUrl: "https://api.anthropic.com", version: "2023-06-01" }',
    '  ollama: { host: "http://127.0.0.1:11434" }',
    'runner:',
    '  maxSteps: 20',
    '  stepDelayMs: 0',
    '  maxConcurrent: 1',
    '  context: { maxUiDumpChars: 100, maxLabeledElements: 1, maxUnlabeledElements: 1 }',
    'pricing: { inputPer1k: 0, outputPer1k: 0, decimals: 6 }',
    'device:',
    '  adbPath: adb',
    '  host: 127.0.0.1',
    '  port: 5555',
    '  timeoutMs: 1000',
    '  healthTtlMs: 0',
    '  swipe: { centerX: 1, centerY: 1, distance: 1, durationMs: 1 }',
    'tasks: { maxTasks: 2, evictionHeadroom: 2, listLimit: 20 }',
  ].join('\n')
  expect(() => parseDefaultConfigYaml(source)).toThrow(
    '[config] invalid yaml defaults: tasks.evictionHeadroom must be < tasks.maxTasks',
  )
  expect(
    parseDefaultConfigYaml(source.replace('evictionHeadroom: 2', 'evictionHeadroom: 1'))
      .tasks.evictionHeadroom,
  ).toBe(1)
})

test('state paths live under the state dir', () => {
  expect(buildPaths('/tmp/state')).toEqual({
    root: '/tmp/state',
    log: '/tmp/state/log.jsonl',
    audit: '/tmp/state/audit.jsonl',
  })
})

test('environment overrides pick the key matching the backend', () => {
  const config = defaultConfig({ stateDir: '/tmp/x' })
  applyCliEnvOverrides(config, {
    DROIDLOOP_MODEL: 'claude-3-5-haiku-latest',
    ANTHROPIC_API_KEY: 'test-secret',
    OPENAI_API_KEY: 'other-secret',
    DROIDLOOP_MAX_STEPS: '8',
    DROIDLOOP_STEP_DELAY_MS: '0',
    DROIDLOOP_ADB_PORT: '5557',
    DROIDLOOP_PRICE_INPUT_PER_1K: '0.003',
  })
  expect(config.decision.model).toBe('claude-3-5-haiku-latest')
  expect(config.decision.apiKey).toBe('test-secret')
  expect(config.runner.maxSteps).toBe(8)
  expect(config.runner.stepDelayMs).toBe(0)
  expect(config.device.port).toBe(5557)
  expect(config.pricing.inputPer1k).toBe(0.003)
})

test('invalid environment values warn and keep the defaults', () => {
  const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  const config = defaultConfig({ stateDir: '/tmp/x' })
  applyCliEnvOverrides(config, {
    DROIDLOOP_MAX_STEPS: 'many',
    DROIDLOOP_MAX_CONCURRENT: '0',
    DROIDLOOP_PRICE_OUTPUT_PER_1K: '-1',
  })
  expect(config.runner.maxSteps).toBe(20)
  expect(config.runner.maxConcurrent).toBe(4)
  expect(config.pricing.outputPer1k).toBe(0.015)
  expect(warn).toHaveBeenCalledWith('[cli] invalid DROIDLOOP_MAX_STEPS:', 'many')
  expect(warn).toHaveBeenCalledTimes(3)
})

test('an explicit key wins over provider keys', () => {
  const config = defaultConfig({ stateDir: '/tmp/x' })
  applyCliEnvOverrides(config, {
    DROIDLOOP_LLM_API_KEY: 'test-secret',
    OPENAI_API_KEY: 'other-secret',
  })
  expect(config.decision.apiKey).toBe('test-secret')
})
