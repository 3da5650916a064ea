export type ISODate = string
export type Id = string

export type ActionType =
  | 'tap'
  | 'type'
  | 'swipe'
  | 'press_key'
  | 'wait'
  | 'done'
  | 'error'

export type Decision = {
  action: ActionType
  params: Record<string, unknown>
  done: boolean
  reasoning: string
}

export type ExecutionFailure =
  | 'invalid_params'
  | 'device'
  | 'timeout'
  | 'declared'
  | 'unsupported'

export type StepRecord = {
  readonly step: number
  readonly decision: Decision
  readonly success: boolean
  readonly error: string | null
  readonly failure?: ExecutionFailure
  readonly inputTokens: number
  readonly outputTokens: number
  readonly elapsedMs: number
}

export type RunOutcome = 'succeeded' | 'exhausted' | 'aborted' | 'cancelled'

export type FinalAction = ActionType | 'max_steps_reached' | 'cancelled'

export type RunResult = {
  readonly success: boolean
  readonly outcome: RunOutcome
  readonly finalAction: FinalAction
  readonly stepsTaken: number
  readonly inputTokens: number
  readonly outputTokens: number
  readonly totalTokensUsed: number
  readonly totalCost: number
  readonly steps: readonly StepRecord[]
  readonly error: string | null
  readonly extractedData: Record<string, unknown> | null
}

export type TaskStatus =
  | 'pending'
  | 'running'
  | 'completed'
  | 'failed'
  | 'cancelled'

export type TaskStatusFilter = TaskStatus | 'active'

export type TaskStepSummary = {
  step: number
  action: ActionType
  params: Record<string, unknown>
  success: boolean
  error: string | null
  inputTokens: number
  outputTokens: number
  elapsedMs: number
}

export type TaskResultSummary = {
  success: boolean
  finalAction: FinalAction
  stepsTaken: number
  inputTokens: number
  outputTokens: number
  totalTokensUsed: number
  totalCost: number
  extractedData: Record<string, unknown> | null
  steps: TaskStepSummary[]
}

export type Task = {
  id: Id
  goal: string
  status: TaskStatus
  app: string | null
  createdAt: ISODate
  updatedAt: ISODate
  startedAt: ISODate | null
  completedAt: ISODate | null
  currentStep: string | null
  result: TaskResultSummary | null
  error: string | null
  stepsTaken: number
  tokensUsed: number
  estimatedCost: number
}

export type TaskSummary = Pick<
  Task,
  'id' | 'goal' | 'status' | 'app' | 'createdAt' | 'stepsTaken' | 'estimatedCost'
>
