import type { RunResult, TaskResultSummary } from '../types/index.js'

export const summarizeRunResult = (result: RunResult): TaskResultSummary => ({
  success: result.success,
  finalAction: result.finalAction,
  stepsTaken: result.stepsTaken,
  inputTokens: result.inputTokens,
  outputTokens: result.outputTokens,
  totalTokensUsed: result.totalTokensUsed,
  totalCost: result.totalCost,
  extractedData: result.extractedData,
  steps: result.steps.map((step) => ({
    step: step.step,
    action: step.decision.action,
    params: step.decision.params,
    success: step.success,
    error: step.error,
    inputTokens: step.inputTokens,
    outputTokens: step.outputTokens,
    elapsedMs: step.elapsedMs,
  })),
})
