import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, expect, test } from 'vitest'

import { DeviceHealthMonitor } from '../src/device/health.js'
import { buildHttpApp } from '../src/http/index.js'

import { decision, gatedDecide, scriptedDecide } from './helpers/fakes.js'
import { createTestOrchestrator } from './helpers/orchestrator.js'

import type { DecideFn } from '../src/decision/types.js'
import type { AppConfig } from '../src/config.js'

const apps: Array<ReturnType<typeof buildHttpApp>> = []

const createApp = (
  decide: DecideFn,
  configure?: (config: AppConfig) => void,
  auditLogPath?: string,
) => {
  const { orchestrator, store } = createTestOrchestrator({
    decide,
    ...(configure ? { configure } : {}),
  })
  const health = new DeviceHealthMonitor(
    async () => ({
      connected: true,
      serial: '127.0.0.1:5555',
      deviceModel: 'Pixel 7',
      androidVersion: '14',
      batteryLevel: 64,
      error: null,
    }),
    30_000,
    '127.0.0.1:5555',
  )
  const app = buildHttpApp({
    orchestrator,
    health,
    ...(auditLogPath ? { auditLogPath } : {}),
  })
  apps.push(app)
  return { app, orchestrator, store }
}

const dirs: string[] = []

afterEach(async () => {
  await Promise.all(apps.splice(0).map((app) => app.close()))
  await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })))
})

test('POST /api/tasks accepts a goal with 202', async () => {
  const { decide } = scriptedDecide([decision('done', {}, { done: true })])
  const { app, orchestrator } = createApp(decide)

  const response = await app.inject({
    method: 'POST',
    url: '/api/tasks',
    payload: { goal: 'open settings', parameters: { section: 'wifi' } },
  })

  expect(response.statusCode).toBe(202)
  const body = response.json()
  expect(body.status).toBe('pending')
  expect(typeof body.taskId).toBe('string')

  await orchestrator.onIdle()
  const task = await app.inject({ method: 'GET', url: `/api/tasks/${body.taskId}` })
  expect(task.statusCode).toBe(200)
  expect(task.json()).toMatchObject({ id: body.taskId, status: 'completed' })
})

test('POST /api/tasks rejects invalid bodies', async () => {
  const { decide } = scriptedDecide([decision('done')])
  const { app, store } = createApp(decide)

  const missing = await app.inject({ method: 'POST', url: '/api/tasks', payload: {} })
  expect(missing.statusCode).toBe(400)
  expect(missing.json().code).toBe('validation_failed')
  expect(missing.json().error).toMatch(/^goal: /)

  const extra = await app.inject({
    method: 'POST',
    url: '/api/tasks',
    payload: { goal: 'x', priority: 'high' },
  })
  expect(extra.statusCode).toBe(400)

  const budget = await app.inject({
    method: 'POST',
    url: '/api/tasks',
    payload: { goal: 'x', maxSteps: 500 },
  })
  expect(budget.statusCode).toBe(400)

  const malformed = await app.inject({
    method: 'POST',
    url: '/api/tasks',
    headers: { 'content-type': 'application/json' },
    payload: '{"goal":',
  })
  expect(malformed.statusCode).toBe(400)
  expect(store.size).toBe(0)
})

test('POST /api/tasks answers 503 when the store is full of live tasks', async () => {
  const gated = gatedDecide(decision('tap', { x: 1, y: 1 }))
  const { app, orchestrator } = createApp(gated.decide, (config) => {
    config.tasks.maxTasks = 1
  })

  const first = await app.inject({ method: 'POST', url: '/api/tasks', payload: { goal: 'a' } })
  expect(first.statusCode).toBe(202)
  await gated.entered

  const second = await app.inject({ method: 'POST', url: '/api/tasks', payload: { goal: 'b' } })
  expect(second.statusCode).toBe(503)
  expect(second.json()).toEqual({
    error: 'task store is full: 1 live tasks',
    code: 'store_at_capacity',
  })

  const stopping = orchestrator.stop()
  gated.release()
  await stopping
})

test('GET /api/tasks lists summaries with filters', async () => {
  const gated = gatedDecide(decision('tap', { x: 1, y: 1 }))
  const { app, orchestrator } = createApp(gated.decide, (config) => {
    config.runner.maxConcurrent = 1
  })
  orchestrator.start({ goal: 'first' })
  orchestrator.start({ goal: 'second' })
  await gated.entered

  const all = await app.inject({ method: 'GET', url: '/api/tasks' })
  expect(all.json().tasks.map((task: { goal: string }) => task.goal)).toEqual([
    'second',
    'first',
  ])

  const limited = await app.inject({ method: 'GET', url: '/api/tasks?status=running&limit=5' })
  expect(limited.json().tasks).toHaveLength(1)
  expect(limited.json().tasks[0].goal).toBe('first')

  const invalid = await app.inject({ method: 'GET', url: '/api/tasks?status=paused' })
  expect(invalid.statusCode).toBe(400)

  const stopping = orchestrator.stop()
  gated.release()
  await stopping
})

test('GET /api/tasks/:id answers 404 for unknown ids', async () => {
  const { decide } = scriptedDecide([decision('done')])
  const { app } = createApp(decide)

  const response = await app.inject({ method: 'GET', url: '/api/tasks/missing' })

  expect(response.statusCode).toBe(404)
  expect(response.json()).toEqual({
    error: 'task not found: missing',
    code: 'task_not_found',
  })
})

test('POST /api/tasks/:id/cancel cancels a live task', async () => {
  const gated = gatedDecide(decision('tap', { x: 1, y: 1 }))
  const { app, orchestrator } = createApp(gated.decide)
  const task = orchestrator.start({ goal: 'open settings' })
  await gated.entered

  const response = await app.inject({ method: 'POST', url: `/api/tasks/${task.id}/cancel` })

  expect(response.statusCode).toBe(200)
  expect(response.json()).toMatchObject({
    cancelled: true,
    message: 'Task cancelled',
    task: { id: task.id, status: 'cancelled', error: 'Cancelled by user' },
  })
  gated.release()
  await orchestrator.onIdle()

  const again = await app.inject({ method: 'POST', url: `/api/tasks/${task.id}/cancel` })
  expect(again.json()).toMatchObject({ cancelled: false, message: 'Task already cancelled' })

  const unknown = await app.inject({ method: 'POST', url: '/api/tasks/missing/cancel' })
  expect(unknown.statusCode).toBe(404)
})

test('GET /api/status and /api/device/health report the service state', async () => {
  const { decide } = scriptedDecide([decision('done', {}, { done: true })])
  const { app, orchestrator } = createApp(decide)
  orchestrator.start({ goal: 'go home' })
  await orchestrator.onIdle()

  const status = await app.inject({ method: 'GET', url: '/api/status' })
  expect(status.json()).toEqual({
    ok: true,
    backend: 'openai-chat',
    model: 'gpt-4o-mini',
    tasks: { pending: 0, running: 0, completed: 1, failed: 0, cancelled: 0 },
    queue: { waiting: 0, running: 0, concurrency: 4 },
    maxTasks: 100,
  })

  const health = await app.inject({ method: 'GET', url: '/api/device/health' })
  expect(health.json()).toMatchObject({
    connected: true,
    serial: '127.0.0.1:5555',
    deviceModel: 'Pixel 7',
    batteryLevel: 64,
    error: null,
  })
  expect(typeof health.json().checkedAt).toBe('string')
})

test('POST /api/tasks answers 503 once the service is stopping', async () => {
  const { decide } = scriptedDecide([decision('done')])
  const { app, orchestrator } = createApp(decide)
  await orchestrator.stop()

  const response = await app.inject({
    method: 'POST',
    url: '/api/tasks',
    payload: { goal: 'open settings' },
  })

  expect(response.statusCode).toBe(503)
  expect(response.json()).toEqual({
    error: 'service is stopping and accepts no new tasks',
    code: 'service_stopped',
  })
})

test('GET /api/audit returns recent entries and totals', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'droidloop-http-audit-'))
  dirs.push(dir)
  const auditLogPath = join(dir, 'audit.jsonl')
  await writeFile(
    auditLogPath,
    [
      { event: 'runner_step', step: 1, success: true, tokensUsed: 120, details: { action: 'tap' } },
      { event: 'runner_step', step: 2, success: true, tokensUsed: 90, details: { action: 'done' } },
      { event: 'runner_complete', step: 2, success: true, tokensUsed: 210 },
    ]
      .map((entry) => JSON.stringify(entry))
      .join('\n'),
    'utf8',
  )
  const { decide } = scriptedDecide([decision('done')])
  const { app } = createApp(decide, undefined, auditLogPath)

  const filtered = await app.inject({ method: 'GET', url: '/api/audit?action=tap&limit=5' })
  expect(filtered.statusCode).toBe(200)
  expect(filtered.json().entries).toEqual([
    { event: 'runner_step', step: 1, success: true, tokensUsed: 120, details: { action: 'tap' } },
  ])
  expect(filtered.json().stats).toMatchObject({
    totalEvents: 3,
    stepsRecorded: 2,
    totalTokensUsed: 210,
    actionsByType: { tap: 1, done: 1 },
  })

  const invalid = await app.inject({ method: 'GET', url: '/api/audit?limit=0' })
  expect(invalid.statusCode).toBe(400)
})

test('unknown routes answer 404', async () => {
  const { decide } = scriptedDecide([decision('done')])
  const { app } = createApp(decide)
  const response = await app.inject({ method: 'GET', url: '/api/nothing' })
  expect(response.statusCode).toBe(404)
  expect(response.json()).toEqual({ error: 'not found' })
})
