import { expect, test } from 'vitest'

import {
  ServiceStoppedError,
  StoreNotFoundError,
  ValidationError,
} from '../src/errors.js'
import { SHUTDOWN_MESSAGE } from '../src/orchestrator/orchestrator-service.js'

import { decision, gatedDecide, scriptedDecide } from './helpers/fakes.js'
import { createTestOrchestrator } from './helpers/orchestrator.js'

test('start returns a pending task and runs it in the background', async () => {
  const { decide } = scriptedDecide([
    decision('done', { temperature: 21 }, { done: true }),
  ])
  const { orchestrator } = createTestOrchestrator({ decide })

  const task = orchestrator.start({ goal: 'read the thermostat', app: 'home' })
  expect(task.status).toBe('pending')
  expect(task.app).toBe('home')

  await orchestrator.onIdle()
  const finished = orchestrator.getStatus(task.id)
  expect(finished.status).toBe('completed')
  expect(finished.error).toBeNull()
  expect(finished.currentStep).toBeNull()
  expect(finished.stepsTaken).toBe(1)
  expect(finished.tokensUsed).toBe(120)
  expect(finished.estimatedCost).toBe(0.0008)
  expect(finished.completedAt).not.toBeNull()
  expect(finished.result).toMatchObject({
    success: true,
    finalAction: 'done',
    extractedData: { temperature: 21 },
    steps: [{ step: 1, action: 'done', success: true, inputTokens: 100 }],
  })
})

test('cancelling a running task keeps it cancelled and skips the device', async () => {
  const gated = gatedDecide(decision('tap', { x: 1, y: 1 }))
  const { orchestrator, applied } = createTestOrchestrator({ decide: gated.decide })

  const task = orchestrator.start({ goal: 'open settings' })
  await gated.entered
  expect(orchestrator.getStatus(task.id).status).toBe('running')

  const outcome = orchestrator.cancel(task.id)
  expect(outcome.cancelled).toBe(true)
  expect(outcome.message).toBe('Task cancelled')
  expect(outcome.task.status).toBe('cancelled')

  gated.release()
  await orchestrator.onIdle()

  const final = orchestrator.getStatus(task.id)
  expect(final.status).toBe('cancelled')
  expect(final.error).toBe('Cancelled by user')
  expect(applied).toEqual([])
})

test('cancelling a finished task reports its status', async () => {
  const { decide } = scriptedDecide([decision('done', {}, { done: true })])
  const { orchestrator } = createTestOrchestrator({ decide })
  const task = orchestrator.start({ goal: 'go home' })
  await orchestrator.onIdle()

  const outcome = orchestrator.cancel(task.id)
  expect(outcome.cancelled).toBe(false)
  expect(outcome.message).toBe('Task already completed')
  expect(outcome.task.status).toBe('completed')
})

test('a failing run marks the task failed with its error', async () => {
  const { decide } = scriptedDecide([new Error('[decision:openai-chat] aborted')])
  const { orchestrator } = createTestOrchestrator({ decide })
  const task = orchestrator.start({ goal: 'go home' })
  await orchestrator.onIdle()

  const final = orchestrator.getStatus(task.id)
  expect(final.status).toBe('failed')
  expect(final.error).toBe('[decision:openai-chat] aborted')
  expect(final.result?.success).toBe(false)
  expect(final.result?.finalAction).toBe('error')
})

test('an exhausted budget fails the task', async () => {
  const { decide } = scriptedDecide([decision('swipe', { direction: 'up' })])
  const { orchestrator } = createTestOrchestrator({ decide })
  const task = orchestrator.start({ goal: 'scroll forever', maxSteps: 2 })
  await orchestrator.onIdle()

  const final = orchestrator.getStatus(task.id)
  expect(final.status).toBe('failed')
  expect(final.error).toBe('Task did not complete within 2 steps')
  expect(final.result?.finalAction).toBe('max_steps_reached')
  expect(final.stepsTaken).toBe(2)
})

test('goals naming a template run with the substituted prompt', async () => {
  const { decide, calls } = scriptedDecide([decision('done', {}, { done: true })])
  const { orchestrator } = createTestOrchestrator({ decide })
  orchestrator.start({ goal: 'open-app', parameters: { app: 'Clock' } })
  await orchestrator.onIdle()

  const expectedLine = 'Open the app named "Clock" from the home screen or the app drawer.'
  expect(calls[0]?.systemPrompt).toContain(`# Current Task\n\n${expectedLine}`)
  expect(calls[0]?.userText).toContain(`Task: ${expectedLine}`)
})

test('runs wait in the queue beyond the concurrency limit', async () => {
  const gated = gatedDecide(decision('done', {}, { done: true }))
  const { orchestrator } = createTestOrchestrator({
    decide: gated.decide,
    configure: (config) => {
      config.runner.maxConcurrent = 1
    },
  })

  const first = orchestrator.start({ goal: 'first' })
  const second = orchestrator.start({ goal: 'second' })
  await gated.entered

  expect(orchestrator.getStatus(first.id).status).toBe('running')
  expect(orchestrator.getStatus(second.id).status).toBe('pending')
  const overview = orchestrator.getOverview()
  expect(overview.queue).toEqual({ waiting: 1, running: 1, concurrency: 1 })
  expect(overview.tasks.pending).toBe(1)
  expect(overview.tasks.running).toBe(1)

  gated.release()
  await orchestrator.onIdle()
  expect(orchestrator.list().map((task) => task.status)).toEqual([
    'completed',
    'completed',
  ])
})

test('cancelling a queued task means it never runs', async () => {
  const gated = gatedDecide(decision('done', {}, { done: true }))
  const { orchestrator } = createTestOrchestrator({
    decide: gated.decide,
    configure: (config) => {
      config.runner.maxConcurrent = 1
    },
  })
  orchestrator.start({ goal: 'first' })
  const queued = orchestrator.start({ goal: 'second' })
  await gated.entered

  orchestrator.cancel(queued.id)
  gated.release()
  await orchestrator.onIdle()

  expect(gated.calls).toHaveLength(1)
  expect(orchestrator.getStatus(queued.id).status).toBe('cancelled')
  expect(orchestrator.getStatus(queued.id).startedAt).toBeNull()
})

test('stop fails in-flight tasks, cancels queued ones and refuses new ones', async () => {
  const gated = gatedDecide(decision('tap', { x: 1, y: 1 }))
  const { orchestrator } = createTestOrchestrator({
    decide: gated.decide,
    configure: (config) => {
      config.runner.maxConcurrent = 1
    },
  })
  const task = orchestrator.start({ goal: 'open settings' })
  const queued = orchestrator.start({ goal: 'open camera' })
  await gated.entered

  const stopping = orchestrator.stop()
  gated.release()
  await stopping

  const final = orchestrator.getStatus(task.id)
  expect(final.status).toBe('failed')
  expect(final.error).toBe(SHUTDOWN_MESSAGE)
  const neverStarted = orchestrator.getStatus(queued.id)
  expect(neverStarted.status).toBe('cancelled')
  expect(neverStarted.error).toBe(SHUTDOWN_MESSAGE)
  expect(neverStarted.startedAt).toBeNull()
  expect(neverStarted.completedAt).not.toBeNull()
  expect(gated.calls).toHaveLength(1)
  expect(orchestrator.getOverview().ok).toBe(false)
  expect(() => orchestrator.start({ goal: 'again' })).toThrow(ServiceStoppedError)
})

test('rejects invalid input and unknown ids', () => {
  const { decide } = scriptedDecide([decision('done')])
  const { orchestrator } = createTestOrchestrator({ decide })
  expect(() => orchestrator.start({ goal: '   ' })).toThrow(ValidationError)
  expect(() => orchestrator.start({ goal: 'x', maxSteps: 0 })).toThrow(
    'maxSteps must be a positive integer',
  )
  expect(() => orchestrator.getStatus('nope')).toThrow(StoreNotFoundError)
  expect(() => orchestrator.cancel('nope')).toThrow('task not found: nope')
})
