import type { DecisionConfig } from '../config.js'
import type { Decision } from '../types/index.js'

export type DecisionBackendKind = 'openai-chat' | 'anthropic' | 'ollama'

export type MessagePart =
  | { type: 'text'; text: string }
  | { type: 'image'; mediaType: 'image/png'; base64: string }

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: MessagePart[] }

export type DecisionRequest = {
  systemPrompt: string
  userText: string
  screenshotBase64?: string
  signal?: AbortSignal
  logContext?: Record<string, unknown>
}

export type DecisionReply = {
  decision: Decision
  inputTokens: number
  outputTokens: number
  elapsedMs: number
}

export type DecideFn = (request: DecisionRequest) => Promise<DecisionReply>

export type BackendCall = {
  model: string
  messages: ChatMessage[]
  settings: DecisionConfig
  signal: AbortSignal
}

export type BackendReply = {
  text: string
  inputTokens: number
  outputTokens: number
}

export type DecisionBackend = {
  id: DecisionBackendKind
  call: (params: BackendCall) => Promise<BackendReply>
}
