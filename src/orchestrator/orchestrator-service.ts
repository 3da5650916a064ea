import PQueue from 'p-queue'

import {
  ServiceStoppedError,
  StoreNotFoundError,
  ValidationError,
} from '../errors.js'
import { appendLog } from '../log/append.js'
import { bestEffort } from '../log/safe.js'
import { resolveTaskPrompt } from '../prompts/loader.js'
import { runGoal, type StepProgress } from '../runner/loop.js'
import { summarizeRunResult } from '../runner/summary.js'
import { elapsedMsSince, errorMessage, isRecord } from '../shared/utils.js'
import { isTerminalStatus, type TaskStore } from '../tasks/store.js'
import { toTaskSummary } from '../tasks/views.js'

import type { AuditSink } from '../audit/sink.js'
import type { AppConfig } from '../config.js'
import type { DecideFn, DecisionBackendKind } from '../decision/types.js'
import type { DeviceCapability } from '../device/types.js'
import type {
  RunResult,
  Task,
  TaskStatus,
  TaskStatusFilter,
  TaskSummary,
} from '../types/index.js'

export type StartTaskInput = {
  goal: string
  app?: string
  parameters?: Record<string, unknown>
  maxSteps?: number
}

export type CancelOutcome = {
  task: Task
  cancelled: boolean
  message: string
}

export type OrchestratorStatus = {
  ok: boolean
  backend: DecisionBackendKind
  model: string
  tasks: Record<TaskStatus, number>
  queue: { waiting: number; running: number; concurrency: number }
  maxTasks: number
}

export type OrchestratorDeps = {
  config: AppConfig
  store: TaskStore
  device: DeviceCapability
  decide: DecideFn
  backend: DecisionBackendKind
  audit?: AuditSink
  logPath?: string
  promptsRoot?: string
}

export const SHUTDOWN_MESSAGE = 'Service stopped before the task finished'

const finalStatus = (result: RunResult): TaskStatus => {
  if (result.outcome === 'cancelled') return 'cancelled'
  return result.success ? 'completed' : 'failed'
}

const validateStartInput = (input: StartTaskInput): void => {
  if (typeof input.goal !== 'string' || !input.goal.trim())
    throw new ValidationError('goal must be a non-empty string')
  if (
    input.maxSteps !== undefined &&
    (!Number.isInteger(input.maxSteps) || input.maxSteps < 1)
  )
    throw new ValidationError('maxSteps must be a positive integer')
  if (input.parameters !== undefined && !isRecord(input.parameters))
    throw new ValidationError('parameters must be an object')
}

export class Orchestrator {
  private readonly deps: OrchestratorDeps
  private readonly queue: PQueue
  private readonly runningControllers = new Map<string, AbortController>()
  private stopped = false

  constructor(deps: OrchestratorDeps) {
    this.deps = deps
    this.queue = new PQueue({
      concurrency: deps.config.runner.maxConcurrent,
    })
  }

  start(input: StartTaskInput): Task {
    if (this.stopped) throw new ServiceStoppedError()
    validateStartInput(input)
    const task = this.deps.store.create(input.goal, input.app ?? null)
    this.log({
      event: 'task_created',
      taskId: task.id,
      goalChars: task.goal.length,
      ...(task.app ? { app: task.app } : {}),
    })
    void this.queue
      .add(() => this.runQueuedTask(task.id, input))
      .catch((error: unknown) => this.reportQueueError(task.id, error))
    return task
  }

  getStatus(taskId: string): Task {
    const task = this.deps.store.get(taskId.trim())
    if (!task) throw new StoreNotFoundError(taskId)
    return task
  }

  list(filter?: TaskStatusFilter, limit?: number): TaskSummary[] {
    return this.deps.store.list(filter, limit).map(toTaskSummary)
  }

  cancel(taskId: string): CancelOutcome {
    const id = taskId.trim()
    const before = this.deps.store.get(id)
    if (!before) throw new StoreNotFoundError(taskId)
    if (isTerminalStatus(before.status))
      return {
        task: before,
        cancelled: false,
        message: `Task already ${before.status}`,
      }
    const task = this.deps.store.requestCancel(id) ?? before
    this.log({ event: 'task_cancel_requested', taskId: id, from: before.status })
    return { task, cancelled: true, message: 'Task cancelled' }
  }

  getOverview(): OrchestratorStatus {
    const { config, store, backend } = this.deps
    return {
      ok: !this.stopped,
      backend,
      model: config.decision.model,
      tasks: store.countByStatus(),
      queue: {
        waiting: this.queue.size,
        running: this.queue.pending,
        concurrency: this.queue.concurrency,
      },
      maxTasks: config.tasks.maxTasks,
    }
  }

  /** Resolves once every queued and running task has settled. */
  onIdle(): Promise<void> {
    return this.queue.onIdle()
  }

  async stop(): Promise<void> {
    if (this.stopped) return
    this.stopped = true
    this.queue.clear()
    for (const task of this.deps.store.list('active', Number.MAX_SAFE_INTEGER))
      this.abandon(task, SHUTDOWN_MESSAGE)
    for (const controller of this.runningControllers.values())
      if (!controller.signal.aborted) controller.abort()
    await this.queue.onIdle()
  }

  private log(entry: Record<string, unknown>): void {
    const { logPath } = this.deps
    if (!logPath) return
    void bestEffort(`appendLog: ${String(entry['event'])}`, () =>
      appendLog(logPath, entry),
    )
  }

  /** A task that never started can only be cancelled; a running one fails. */
  private abandon(task: Task, error: string): void {
    if (isTerminalStatus(task.status)) return
    this.deps.store.update(task.id, {
      status: task.status === 'pending' ? 'cancelled' : 'failed',
      currentStep: null,
      error,
    })
  }

  private reportQueueError(taskId: string, error: unknown): void {
    const task = this.deps.store.get(taskId)
    if (task) this.abandon(task, errorMessage(error))
    this.log({ event: 'task_queue_error', taskId, error: errorMessage(error) })
  }

  private recordProgress(taskId: string, progress: StepProgress): void {
    this.deps.store.update(taskId, {
      currentStep: progress.description,
      stepsTaken: progress.stepsTaken,
      tokensUsed: progress.inputTokens + progress.outputTokens,
      estimatedCost: progress.totalCost,
    })
  }

  private async runQueuedTask(
    taskId: string,
    input: StartTaskInput,
  ): Promise<void> {
    const { store, config } = this.deps
    const queued = store.get(taskId)
    if (!queued || queued.status !== 'pending') return
    if (this.runningControllers.has(taskId)) return

    const controller = new AbortController()
    this.runningControllers.set(taskId, controller)
    store.registerController(taskId, controller)
    store.update(taskId, { status: 'running', currentStep: 'Starting' })
    const startedAt = Date.now()
    this.log({ event: 'task_start', taskId })

    try {
      const parameters = input.parameters ?? {}
      const prompt = await resolveTaskPrompt({
        goal: queued.goal,
        parameters,
        ...(this.deps.promptsRoot ? { root: this.deps.promptsRoot } : {}),
      })
      const result = await runGoal(
        {
          goal: prompt.taskPrompt,
          systemPrompt: prompt.systemPrompt,
          parameters,
          ...(input.maxSteps !== undefined ? { maxSteps: input.maxSteps } : {}),
        },
        {
          device: this.deps.device,
          decide: this.deps.decide,
          settings: {
            runner: config.runner,
            pricing: config.pricing,
            deviceTimeoutMs: config.device.timeoutMs,
          },
          ...(this.deps.audit ? { audit: this.deps.audit } : {}),
          ...(this.deps.logPath ? { logPath: this.deps.logPath } : {}),
          logContext: { taskId },
          signal: controller.signal,
          shouldStop: () => store.isCancelRequested(taskId),
          onStep: (progress) => this.recordProgress(taskId, progress),
        },
      )
      const status = finalStatus(result)
      const finished = store.update(taskId, {
        status,
        currentStep: null,
        result: summarizeRunResult(result),
        error: result.error,
        stepsTaken: result.stepsTaken,
        tokensUsed: result.totalTokensUsed,
        estimatedCost: result.totalCost,
      })
      this.log({
        event: status === 'completed' ? 'task_completed' : `task_${status}`,
        taskId,
        outcome: result.outcome,
        finalStatus: finished?.status ?? status,
        stepsTaken: result.stepsTaken,
        totalTokensUsed: result.totalTokensUsed,
        totalCost: result.totalCost,
        durationMs: elapsedMsSince(startedAt),
        ...(result.error ? { error: result.error } : {}),
      })
    } catch (error) {
      const message = errorMessage(error)
      store.update(taskId, { status: 'failed', currentStep: null, error: message })
      this.log({
        event: 'task_exception',
        taskId,
        error: message,
        durationMs: elapsedMsSince(startedAt),
      })
    } finally {
      this.runningControllers.delete(taskId)
      store.releaseController(taskId)
    }
  }
}
