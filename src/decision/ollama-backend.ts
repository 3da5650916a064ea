import { Ollama, type Message } from 'ollama'

import type {
  BackendCall,
  BackendReply,
  ChatMessage,
  DecisionBackend,
} from './types.js'

export const toOllamaMessages = (messages: ChatMessage[]): Message[] =>
  messages.map((message) => {
    if (message.role === 'system')
      return { role: 'system', content: message.content }
    const text = message.content
      .flatMap((part) => (part.type === 'text' ? [part.text] : []))
      .join('\n\n')
    const images = message.content.flatMap((part) =>
      part.type === 'image' ? [part.base64] : [],
    )
    return {
      role: 'user',
      content: text,
      ...(images.length > 0 ? { images } : {}),
    }
  })

const callOllama = async ({
  model,
  messages,
  settings,
  signal,
}: BackendCall): Promise<BackendReply> => {
  const client = new Ollama({
    host: settings.ollama.host,
    fetch: (input, init) => fetch(input, { ...init, signal }),
  })
  const response = await client.chat({
    model,
    messages: toOllamaMessages(messages),
    format: 'json',
    stream: false,
    options: {
      temperature: settings.temperature,
      num_predict: settings.maxOutputTokens,
    },
  })
  return {
    text: response.message.content,
    inputTokens: response.prompt_eval_count ?? 0,
    outputTokens: response.eval_count ?? 0,
  }
}

export const ollamaBackend: DecisionBackend = {
  id: 'ollama',
  call: callOllama,
}
