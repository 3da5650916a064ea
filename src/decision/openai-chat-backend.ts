import { z } from 'zod'

import { buildDecisionPreflightError } from './decision-error.js'
import { normalizeBaseUrl, postJson } from './http.js'

import type {
  BackendCall,
  BackendReply,
  ChatMessage,
  DecisionBackend,
} from './types.js'

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().nonnegative().optional(),
      completion_tokens: z.number().nonnegative().optional(),
    })
    .nullish(),
})

type ImageDetail = BackendCall['settings']['imageDetail']

const toOpenAiMessage = (message: ChatMessage, detail: ImageDetail) => {
  if (message.role === 'system')
    return { role: 'system', content: message.content }
  return {
    role: 'user',
    content: message.content.map((part) =>
      part.type === 'text'
        ? { type: 'text', text: part.text }
        : {
            type: 'image_url',
            image_url: {
              url: `data:${part.mediaType};base64,${part.base64}`,
              detail,
            },
          },
    ),
  }
}

const callOpenAiChat = async ({
  model,
  messages,
  settings,
  signal,
}: BackendCall): Promise<BackendReply> => {
  if (!settings.apiKey)
    throw buildDecisionPreflightError('openai-chat', 'missing API key')
  const raw = await postJson({
    url: `${normalizeBaseUrl(settings.openai.baseUrl, '/v1')}/chat/completions`,
    headers: { Authorization: `Bearer ${settings.apiKey}` },
    payload: {
      model,
      messages: messages.map((message) =>
        toOpenAiMessage(message, settings.imageDetail),
      ),
      response_format: { type: 'json_object' },
      temperature: settings.temperature,
      max_completion_tokens: settings.maxOutputTokens,
    },
    signal,
  })
  const parsed = chatCompletionSchema.safeParse(raw)
  if (!parsed.success) throw new Error('unexpected chat completion shape')
  return {
    text: parsed.data.choices[0]?.message.content ?? '',
    inputTokens: parsed.data.usage?.prompt_tokens ?? 0,
    outputTokens: parsed.data.usage?.completion_tokens ?? 0,
  }
}

export const openAiChatBackend: DecisionBackend = {
  id: 'openai-chat',
  call: callOpenAiChat,
}
