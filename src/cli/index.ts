#!/usr/bin/env node
import { resolve } from 'node:path'
import { parseArgs } from 'node:util'

import getPort, { portNumbers } from 'get-port'

import { createRuntime } from '../bootstrap.js'
import { buildPaths, defaultConfig } from '../config.js'
import { createHttpServer } from '../http/index.js'
import { closeLogs } from '../log/append.js'
import { bestEffort, setDefaultLogPath } from '../log/safe.js'

import { applyCliEnvOverrides } from './env.js'

const { values } = parseArgs({
  options: {
    port: { type: 'string', short: 'p', default: '8787' },
    host: { type: 'string', default: '127.0.0.1' },
    'state-dir': { type: 'string', default: '.droidloop' },
  },
})

const resolvedStateDir = resolve(values['state-dir'])
setDefaultLogPath(buildPaths(resolvedStateDir).log)

const parsePort = (value: string): number => {
  const num = Number(value)
  if (!Number.isInteger(num) || num <= 0 || num > 65535) {
    console.error(`[cli] invalid port: ${value}`)
    process.exit(1)
  }
  return num
}

const requestedPort = parsePort(values.port)

const config = defaultConfig({ stateDir: resolvedStateDir })
applyCliEnvOverrides(config)

console.log('[cli] config:', {
  ...config,
  decision: { ...config.decision, apiKey: config.decision.apiKey ? '***' : undefined },
})

const runtime = await createRuntime(config)

const resolveHttpPort = async (target: number): Promise<number> => {
  const max = Math.min(65535, target + 20)
  const port = await getPort({ port: portNumbers(target, max) })
  if (port !== target)
    console.warn(`[cli] port ${target} is in use, fallback to ${port}`)
  return port
}

const shutdown = async (reason: string, code = 0): Promise<never> => {
  console.log(`\n[cli] ${reason}`)
  await bestEffort('cli:stop_orchestrator', () => runtime.orchestrator.stop(), {
    meta: { reason },
  })
  await bestEffort('cli:close_logs', () => closeLogs(), { meta: { reason } })
  process.exit(code)
}

try {
  const listenPort = await resolveHttpPort(requestedPort)
  createHttpServer({
    orchestrator: runtime.orchestrator,
    health: runtime.health,
    auditLogPath: runtime.paths.audit,
    port: listenPort,
    host: values.host,
  })
} catch (error) {
  const message = error instanceof Error ? error.message : String(error)
  await shutdown(`startup failed: ${message}`, 1)
}

process.on('SIGINT', () => {
  void shutdown('shutting down...')
})

process.on('SIGTERM', () => {
  void shutdown('received SIGTERM, shutting down...')
})
