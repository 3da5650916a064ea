import { isTerminalDecision } from '../decision/parse.js'
import { applyDecision } from '../executor/apply-decision.js'
import { appendLog } from '../log/append.js'
import { bestEffort, logSafeError } from '../log/safe.js'
import { elapsedMsSince, errorMessage, sleep } from '../shared/utils.js'

import { renderStepContext, type PreviousStep } from './context.js'
import { estimateCost } from './cost.js'

import type { AuditEvent, AuditSink } from '../audit/sink.js'
import type { AppConfig } from '../config.js'
import type { DecideFn } from '../decision/types.js'
import type { DeviceCapability } from '../device/types.js'
import type {
  Decision,
  FinalAction,
  RunOutcome,
  RunResult,
  StepRecord,
} from '../types/index.js'

export type RunInput = {
  goal: string
  systemPrompt: string
  parameters?: Record<string, unknown>
  maxSteps?: number
}

export type RunSettings = {
  runner: AppConfig['runner']
  pricing: AppConfig['pricing']
  deviceTimeoutMs: number
}

export type StepProgress = {
  step: number
  maxSteps: number
  description: string
  stepsTaken: number
  inputTokens: number
  outputTokens: number
  totalCost: number
}

export type RunDeps = {
  device: DeviceCapability
  decide: DecideFn
  settings: RunSettings
  audit?: AuditSink
  logPath?: string
  logContext?: Record<string, unknown>
  signal?: AbortSignal
  shouldStop?: () => boolean
  onStep?: (progress: StepProgress) => void
  delay?: (ms: number) => Promise<unknown>
}

export const CANCELLED_MESSAGE = 'Cancelled by user'

export const budgetExhaustedMessage = (maxSteps: number): string =>
  `Task did not complete within ${maxSteps} steps`

const syntheticErrorDecision = (message: string): Decision => ({
  action: 'error',
  params: {},
  done: false,
  reasoning: message,
})

export const runGoal = async (
  input: RunInput,
  deps: RunDeps,
): Promise<RunResult> => {
  const { settings } = deps
  const maxSteps = input.maxSteps ?? settings.runner.maxSteps
  const parameters = input.parameters ?? {}
  const delay = deps.delay ?? sleep
  const runStartedAt = Date.now()
  const steps: StepRecord[] = []
  let inputTokens = 0
  let outputTokens = 0

  const totalCost = () => estimateCost(inputTokens, outputTokens, settings.pricing)

  const stopRequested = (): boolean =>
    Boolean(deps.signal?.aborted) || (deps.shouldStop?.() ?? false)

  const emit = (event: AuditEvent): void => {
    if (!deps.audit) return
    try {
      deps.audit(event)
    } catch (error) {
      void logSafeError('runner: audit sink', error, {
        ...(deps.logPath ? { logPath: deps.logPath } : {}),
      })
    }
  }

  const log = (entry: Record<string, unknown>): void => {
    const { logPath } = deps
    if (!logPath) return
    void bestEffort('runner: append log', () =>
      appendLog(logPath, { ...deps.logContext, ...entry }),
    )
  }

  const report = (step: number, description: string): void => {
    if (!deps.onStep) return
    try {
      deps.onStep({
        step,
        maxSteps,
        description,
        stepsTaken: steps.length,
        inputTokens,
        outputTokens,
        totalCost: totalCost(),
      })
    } catch (error) {
      void logSafeError('runner: onStep', error, {
        ...(deps.logPath ? { logPath: deps.logPath } : {}),
      })
    }
  }

  const finish = (params: {
    outcome: RunOutcome
    finalAction: FinalAction
    error: string | null
    extractedData?: Record<string, unknown> | null
  }): RunResult => {
    const result: RunResult = {
      success: params.outcome === 'succeeded',
      outcome: params.outcome,
      finalAction: params.finalAction,
      stepsTaken: steps.length,
      inputTokens,
      outputTokens,
      totalTokensUsed: inputTokens + outputTokens,
      totalCost: totalCost(),
      steps: [...steps],
      error: params.error,
      extractedData: params.extractedData ?? null,
    }
    log({
      event: 'runner_finished',
      outcome: result.outcome,
      stepsTaken: result.stepsTaken,
      totalTokensUsed: result.totalTokensUsed,
      totalCost: result.totalCost,
      elapsedMs: elapsedMsSince(runStartedAt),
      ...(result.error ? { error: result.error } : {}),
    })
    return result
  }

  const cancelled = (step: number): RunResult => {
    emit({
      event: 'runner_cancelled',
      goal: input.goal,
      step,
      success: false,
      tokensUsed: inputTokens + outputTokens,
      durationMs: elapsedMsSince(runStartedAt),
      error: CANCELLED_MESSAGE,
    })
    return finish({
      outcome: 'cancelled',
      finalAction: 'cancelled',
      error: CANCELLED_MESSAGE,
    })
  }

  log({ event: 'runner_start', maxSteps, goalChars: input.goal.length })

  let previous: PreviousStep | null = null

  for (let step = 1; step <= maxSteps; step += 1) {
    if (stopRequested()) return cancelled(step)
    const stepStartedAt = Date.now()
    let stepInput = 0
    let stepOutput = 0
    let recorded = false
    try {
      report(step, `Step ${step}/${maxSteps}: capturing screen`)
      const snapshot = await deps.device.captureState(deps.signal)

      const userText = renderStepContext({
        goal: input.goal,
        step,
        maxSteps,
        parameters,
        previous,
        snapshot,
        limits: settings.runner.context,
      })

      report(step, `Step ${step}/${maxSteps}: deciding`)
      const reply = await deps.decide({
        systemPrompt: input.systemPrompt,
        userText,
        ...(snapshot.screenshotBase64
          ? { screenshotBase64: snapshot.screenshotBase64 }
          : {}),
        ...(deps.signal ? { signal: deps.signal } : {}),
        logContext: { ...deps.logContext, step },
      })
      stepInput = reply.inputTokens
      stepOutput = reply.outputTokens
      inputTokens += stepInput
      outputTokens += stepOutput
      const { decision } = reply

      let success = true
      let error: string | null = null
      let failure: StepRecord['failure']
      let extractedData: Record<string, unknown> | null = null

      if (decision.action === 'done') {
        if (Object.keys(decision.params).length > 0)
          extractedData = decision.params
      } else {
        if (stopRequested()) {
          steps.push({
            step,
            decision,
            success: false,
            error: CANCELLED_MESSAGE,
            inputTokens: stepInput,
            outputTokens: stepOutput,
            elapsedMs: elapsedMsSince(stepStartedAt),
          })
          return cancelled(step)
        }
        report(step, `Step ${step}/${maxSteps}: ${decision.action}`)
        const outcome = await applyDecision(decision, deps.device, {
          deviceTimeoutMs: settings.deviceTimeoutMs,
          delay,
          ...(deps.signal ? { signal: deps.signal } : {}),
          ...(deps.logPath ? { logPath: deps.logPath } : {}),
          logContext: { ...deps.logContext, step },
        })
        success = outcome.success
        error = outcome.error
        if (!outcome.success) failure = outcome.failure
      }

      const elapsedMs = elapsedMsSince(stepStartedAt)
      steps.push({
        step,
        decision,
        success,
        error,
        ...(failure ? { failure } : {}),
        inputTokens: stepInput,
        outputTokens: stepOutput,
        elapsedMs,
      })
      recorded = true

      emit({
        event: 'runner_step',
        goal: input.goal,
        step,
        success,
        tokensUsed: stepInput + stepOutput,
        durationMs: elapsedMs,
        ...(error ? { error } : {}),
        details: {
          action: decision.action,
          done: decision.done,
          params: decision.params,
          elementCount: snapshot.elementCount,
          screenshotBytes: snapshot.screenshotBase64
            ? Buffer.byteLength(snapshot.screenshotBase64, 'base64')
            : 0,
        },
      })
      report(step, `Step ${step}/${maxSteps}: ${decision.action} ${success ? 'ok' : 'failed'}`)

      if (decision.action === 'error') {
        const message = error ?? decision.reasoning
        emit({
          event: 'runner_aborted',
          goal: input.goal,
          step,
          success: false,
          tokensUsed: inputTokens + outputTokens,
          durationMs: elapsedMsSince(runStartedAt),
          error: message,
        })
        return finish({ outcome: 'aborted', finalAction: 'error', error: message })
      }

      if (isTerminalDecision(decision)) {
        emit({
          event: 'runner_complete',
          goal: input.goal,
          step,
          success: true,
          tokensUsed: inputTokens + outputTokens,
          durationMs: elapsedMsSince(runStartedAt),
          details: { elementCount: snapshot.elementCount },
        })
        return finish({
          outcome: 'succeeded',
          finalAction: decision.action,
          error: null,
          extractedData,
        })
      }

      if (!success && error) {
        previous = { step, action: decision.action, error }
        emit({
          event: 'runner_action_failed',
          goal: input.goal,
          step,
          success: false,
          tokensUsed: stepInput + stepOutput,
          durationMs: elapsedMs,
          error,
          details: { action: decision.action, params: decision.params },
        })
      } else {
        previous = null
      }

      if (step < maxSteps && settings.runner.stepDelayMs > 0)
        await delay(settings.runner.stepDelayMs)
    } catch (error) {
      const message = errorMessage(error)
      // tokens already attached to this iteration's record must not count twice
      const unrecordedInput = recorded ? 0 : stepInput
      const unrecordedOutput = recorded ? 0 : stepOutput
      if (stopRequested()) {
        if (unrecordedInput + unrecordedOutput > 0) {
          steps.push({
            step,
            decision: syntheticErrorDecision(message),
            success: false,
            error: CANCELLED_MESSAGE,
            inputTokens: unrecordedInput,
            outputTokens: unrecordedOutput,
            elapsedMs: elapsedMsSince(stepStartedAt),
          })
        }
        return cancelled(step)
      }
      steps.push({
        step,
        decision: syntheticErrorDecision(message),
        success: false,
        error: message,
        inputTokens: unrecordedInput,
        outputTokens: unrecordedOutput,
        elapsedMs: elapsedMsSince(stepStartedAt),
      })
      emit({
        event: 'runner_exception',
        goal: input.goal,
        step,
        success: false,
        tokensUsed: inputTokens + outputTokens,
        durationMs: elapsedMsSince(stepStartedAt),
        error: message,
      })
      return finish({ outcome: 'aborted', finalAction: 'error', error: message })
    }
  }

  const message = budgetExhaustedMessage(maxSteps)
  emit({
    event: 'runner_max_steps',
    goal: input.goal,
    success: false,
    tokensUsed: inputTokens + outputTokens,
    durationMs: elapsedMsSince(runStartedAt),
    error: message,
    details: { maxSteps },
  })
  return finish({
    outcome: 'exhausted',
    finalAction: 'max_steps_reached',
    error: message,
  })
}
