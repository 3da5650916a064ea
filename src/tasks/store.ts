import { StoreCapacityError, ValidationError } from '../errors.js'
import { shortId } from '../shared/utils.js'

import type {
  Task,
  TaskResultSummary,
  TaskStatus,
  TaskStatusFilter,
} from '../types/index.js'

export type TaskPatch = {
  status?: TaskStatus
  currentStep?: string | null
  result?: TaskResultSummary | null
  error?: string | null
  stepsTaken?: number
  tokensUsed?: number
  estimatedCost?: number
}

export type TaskStoreOptions = {
  maxTasks: number
  evictionHeadroom?: number
  listLimit?: number
  clock?: () => number
  idFactory?: () => string
}

type TaskEntry = {
  task: Task
  seq: number
  cancelRequested: boolean
  createdAtMs: number
  completedAtMs: number | null
}

export const CANCELLED_BY_USER = 'Cancelled by user'

const TERMINAL_STATUSES = new Set<TaskStatus>(['completed', 'failed', 'cancelled'])

const TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  pending: ['running', 'cancelled'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
}

export const isTerminalStatus = (status: TaskStatus): boolean =>
  TERMINAL_STATUSES.has(status)

export const canTransition = (from: TaskStatus, to: TaskStatus): boolean =>
  from === to ? !isTerminalStatus(from) : TRANSITIONS[from].includes(to)

const matchesFilter = (task: Task, filter?: TaskStatusFilter): boolean => {
  if (!filter) return true
  if (filter === 'active')
    return task.status === 'pending' || task.status === 'running'
  return task.status === filter
}

const snapshot = (task: Task): Task => structuredClone(task)

/**
 * In-memory registry of task lifecycles. Every read returns a copy and every
 * write goes through {@link TaskStore.update} or {@link TaskStore.requestCancel},
 * so a terminal task is never changed again.
 */
export class TaskStore {
  private readonly entries = new Map<string, TaskEntry>()
  private readonly controllers = new Map<string, AbortController>()
  private readonly maxTasks: number
  private readonly evictionHeadroom: number
  private readonly listLimit: number
  private readonly clock: () => number
  private readonly idFactory: () => string
  private seq = 0

  constructor(options: TaskStoreOptions) {
    this.maxTasks = options.maxTasks
    this.evictionHeadroom = options.evictionHeadroom ?? 0
    this.listLimit = options.listLimit ?? 20
    this.clock = options.clock ?? Date.now
    this.idFactory = options.idFactory ?? shortId
  }

  get size(): number {
    return this.entries.size
  }

  create(goal: string, app?: string | null): Task {
    const normalizedGoal = goal.trim()
    if (!normalizedGoal) throw new ValidationError('goal must not be empty')
    if (this.entries.size >= this.maxTasks) this.sweep()
    if (this.entries.size >= this.maxTasks)
      throw new StoreCapacityError(this.maxTasks)

    const nowMs = this.clock()
    const now = new Date(nowMs).toISOString()
    const id = this.nextId()
    const normalizedApp = app?.trim()
    const task: Task = {
      id,
      goal: normalizedGoal,
      status: 'pending',
      app: normalizedApp ? normalizedApp : null,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      completedAt: null,
      currentStep: null,
      result: null,
      error: null,
      stepsTaken: 0,
      tokensUsed: 0,
      estimatedCost: 0,
    }
    this.seq += 1
    this.entries.set(id, {
      task,
      seq: this.seq,
      cancelRequested: false,
      createdAtMs: nowMs,
      completedAtMs: null,
    })
    return snapshot(task)
  }

  get(id: string): Task | null {
    const entry = this.entries.get(id)
    return entry ? snapshot(entry.task) : null
  }

  list(filter?: TaskStatusFilter, limit?: number): Task[] {
    const max = Math.max(0, limit ?? this.listLimit)
    return [...this.entries.values()]
      .filter((entry) => matchesFilter(entry.task, filter))
      .sort((a, b) => b.seq - a.seq)
      .slice(0, max)
      .map((entry) => snapshot(entry.task))
  }

  update(id: string, patch: TaskPatch): Task | null {
    const entry = this.entries.get(id)
    if (!entry) return null
    const { task } = entry
    if (isTerminalStatus(task.status)) return snapshot(task)
    if (patch.status !== undefined && !canTransition(task.status, patch.status))
      return snapshot(task)

    const nowMs = this.clock()
    const now = new Date(nowMs).toISOString()
    if (patch.status !== undefined && patch.status !== task.status) {
      task.status = patch.status
      if (patch.status === 'running' && task.startedAt === null)
        task.startedAt = now
      if (isTerminalStatus(patch.status) && task.completedAt === null) {
        task.completedAt = now
        entry.completedAtMs = nowMs
      }
    }
    if (patch.currentStep !== undefined) task.currentStep = patch.currentStep
    if (patch.result !== undefined) task.result = structuredClone(patch.result)
    if (patch.error !== undefined) task.error = patch.error
    if (patch.stepsTaken !== undefined)
      task.stepsTaken = Math.max(task.stepsTaken, patch.stepsTaken)
    if (patch.tokensUsed !== undefined)
      task.tokensUsed = Math.max(task.tokensUsed, patch.tokensUsed)
    if (patch.estimatedCost !== undefined)
      task.estimatedCost = Math.max(task.estimatedCost, patch.estimatedCost)
    task.updatedAt = now
    return snapshot(task)
  }

  requestCancel(id: string): Task | null {
    const entry = this.entries.get(id)
    if (!entry) return null
    if (isTerminalStatus(entry.task.status)) return snapshot(entry.task)
    entry.cancelRequested = true
    const controller = this.controllers.get(id)
    if (controller && !controller.signal.aborted) controller.abort()
    return this.update(id, { status: 'cancelled', error: CANCELLED_BY_USER })
  }

  isCancelRequested(id: string): boolean {
    return this.entries.get(id)?.cancelRequested ?? false
  }

  registerController(id: string, controller: AbortController): void {
    if (!this.entries.has(id)) return
    this.controllers.set(id, controller)
  }

  releaseController(id: string): void {
    this.controllers.delete(id)
  }

  countByStatus(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    }
    for (const { task } of this.entries.values()) counts[task.status] += 1
    return counts
  }

  private nextId(): string {
    for (;;) {
      const id = this.idFactory()
      if (!this.entries.has(id)) return id
    }
  }

  /** Evicts the oldest terminal tasks; live tasks are never touched. */
  private sweep(): void {
    const excess = this.entries.size - this.maxTasks + 1 + this.evictionHeadroom
    if (excess <= 0) return
    const candidates = [...this.entries.values()]
      .filter((entry) => isTerminalStatus(entry.task.status))
      .sort(
        (a, b) =>
          (a.completedAtMs ?? a.createdAtMs) - (b.completedAtMs ?? b.createdAtMs) ||
          a.seq - b.seq,
      )
      .slice(0, excess)
    for (const entry of candidates) {
      this.entries.delete(entry.task.id)
      this.controllers.delete(entry.task.id)
    }
  }
}
