import { bestEffort } from '../log/safe.js'
import { appendLog } from '../log/append.js'
import { elapsedMsSince } from '../shared/utils.js'

import { anthropicBackend } from './anthropic-backend.js'
import {
  DecisionServiceError,
  buildDecisionAbortedError,
  buildDecisionHttpError,
  buildDecisionOutputError,
  buildDecisionTimeoutError,
} from './decision-error.js'
import { ollamaBackend } from './ollama-backend.js'
import { openAiChatBackend } from './openai-chat-backend.js'
import { parseDecisionText } from './parse.js'
import { bindExternalAbort, createTimeoutGuard, raceAbort } from './runtime.js'
import { resolveBackendModel, selectBackend } from './select.js'

import type {
  ChatMessage,
  DecideFn,
  DecisionBackend,
  DecisionBackendKind,
  DecisionRequest,
} from './types.js'
import type { DecisionConfig } from '../config.js'

const defaultBackends: Record<DecisionBackendKind, DecisionBackend> = {
  'openai-chat': openAiChatBackend,
  anthropic: anthropicBackend,
  ollama: ollamaBackend,
}

export const buildDecisionMessages = (
  request: DecisionRequest,
): ChatMessage[] => [
  { role: 'system', content: request.systemPrompt },
  {
    role: 'user',
    content: [
      ...(request.screenshotBase64
        ? [
            {
              type: 'image' as const,
              mediaType: 'image/png' as const,
              base64: request.screenshotBase64,
            },
          ]
        : []),
      { type: 'text' as const, text: request.userText },
    ],
  },
]

export type DecisionAdapterOptions = {
  logPath?: string
  backends?: Partial<Record<DecisionBackendKind, DecisionBackend>>
}

export type DecisionAdapter = {
  backend: DecisionBackendKind
  model: string
  decide: DecideFn
}

export const createDecisionAdapter = (
  settings: DecisionConfig,
  options: DecisionAdapterOptions = {},
): DecisionAdapter => {
  const kind = selectBackend(settings.model)
  const backend = options.backends?.[kind] ?? defaultBackends[kind]
  const model = resolveBackendModel(settings.model)

  const record = (entry: Record<string, unknown>): void => {
    const { logPath } = options
    if (!logPath) return
    void bestEffort('decision: append log', () => appendLog(logPath, entry))
  }

  const decide: DecideFn = async (request) => {
    const startedAt = Date.now()
    const controller = new AbortController()
    let timedOut = false
    let aborted = false
    const release = bindExternalAbort({
      controller,
      ...(request.signal ? { abortSignal: request.signal } : {}),
      onAbort: () => {
        aborted = true
      },
    })
    const guard = createTimeoutGuard({
      controller,
      timeoutMs: settings.timeoutMs,
      onTimeout: () => {
        timedOut = true
      },
    })
    guard.arm()
    try {
      const reply = await raceAbort(
        backend.call({
          model,
          messages: buildDecisionMessages(request),
          settings,
          signal: controller.signal,
        }),
        controller.signal,
      )
      const parsed = parseDecisionText(reply.text)
      if (!parsed.ok) {
        throw buildDecisionOutputError(
          kind,
          parsed.reason === 'empty'
            ? 'decision_empty_output'
            : 'decision_malformed_output',
          parsed.message,
        )
      }
      const elapsedMs = elapsedMsSince(startedAt)
      record({
        event: 'decision_completed',
        backend: kind,
        model,
        action: parsed.decision.action,
        inputTokens: reply.inputTokens,
        outputTokens: reply.outputTokens,
        elapsedMs,
        ...request.logContext,
      })
      return {
        decision: parsed.decision,
        inputTokens: reply.inputTokens,
        outputTokens: reply.outputTokens,
        elapsedMs,
      }
    } catch (error) {
      const mapped =
        error instanceof DecisionServiceError
          ? error
          : timedOut
            ? buildDecisionTimeoutError(kind, settings.timeoutMs)
            : aborted
              ? buildDecisionAbortedError(kind)
              : buildDecisionHttpError(kind, error)
      record({
        event: 'decision_failed',
        backend: kind,
        model,
        code: mapped.code,
        error: mapped.message,
        elapsedMs: elapsedMsSince(startedAt),
        ...request.logContext,
      })
      throw mapped
    } finally {
      guard.clear()
      release()
    }
  }

  return { backend: kind, model, decide }
}
