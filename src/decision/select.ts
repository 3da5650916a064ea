import type { DecisionBackendKind } from './types.js'

const OLLAMA_PREFIX = 'ollama/'

export const selectBackend = (model: string): DecisionBackendKind => {
  const normalized = model.trim().toLowerCase()
  if (normalized.startsWith('claude')) return 'anthropic'
  if (normalized.startsWith(OLLAMA_PREFIX)) return 'ollama'
  return 'openai-chat'
}

export const resolveBackendModel = (model: string): string => {
  const trimmed = model.trim()
  if (trimmed.toLowerCase().startsWith(OLLAMA_PREFIX))
    return trimmed.slice(OLLAMA_PREFIX.length)
  return trimmed
}
