import type { DecisionBackendKind } from './types.js'

export type DecisionErrorCode =
  | 'decision_timeout'
  | 'decision_aborted'
  | 'decision_preflight_failed'
  | 'decision_http_failure'
  | 'decision_empty_output'
  | 'decision_malformed_output'

export class DecisionServiceError extends Error {
  readonly code: DecisionErrorCode
  readonly backend: DecisionBackendKind

  constructor(params: {
    code: DecisionErrorCode
    backend: DecisionBackendKind
    message: string
    cause?: unknown
  }) {
    super(
      params.message,
      params.cause === undefined ? undefined : { cause: params.cause },
    )
    this.name = 'DecisionServiceError'
    this.code = params.code
    this.backend = params.backend
  }
}

const backendTag = (backend: DecisionBackendKind): string =>
  `[decision:${backend}]`

const withTag = (backend: DecisionBackendKind, label: string, message: string) => {
  const normalized = message.trim()
  const prefix = backendTag(backend)
  if (normalized.startsWith(prefix)) return normalized
  return `${prefix} ${label}: ${normalized}`
}

export const buildDecisionTimeoutError = (
  backend: DecisionBackendKind,
  timeoutMs: number,
): DecisionServiceError =>
  new DecisionServiceError({
    code: 'decision_timeout',
    backend,
    message: `${backendTag(backend)} timed out after ${timeoutMs}ms`,
  })

export const buildDecisionAbortedError = (
  backend: DecisionBackendKind,
): DecisionServiceError =>
  new DecisionServiceError({
    code: 'decision_aborted',
    backend,
    message: `${backendTag(backend)} aborted`,
  })

export const buildDecisionPreflightError = (
  backend: DecisionBackendKind,
  message: string,
): DecisionServiceError =>
  new DecisionServiceError({
    code: 'decision_preflight_failed',
    backend,
    message: withTag(backend, 'preflight failed', message),
  })

export const buildDecisionHttpError = (
  backend: DecisionBackendKind,
  error: unknown,
): DecisionServiceError => {
  const message = error instanceof Error ? error.message : String(error)
  return new DecisionServiceError({
    code: 'decision_http_failure',
    backend,
    message: withTag(backend, 'request failed', message),
    cause: error,
  })
}

export const buildDecisionOutputError = (
  backend: DecisionBackendKind,
  code: 'decision_empty_output' | 'decision_malformed_output',
  message: string,
): DecisionServiceError =>
  new DecisionServiceError({
    code,
    backend,
    message: withTag(backend, 'invalid output', message),
  })
