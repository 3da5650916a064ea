import { z } from 'zod'

import { buildDecisionPreflightError } from './decision-error.js'
import { normalizeBaseUrl, postJson } from './http.js'

import type {
  BackendCall,
  BackendReply,
  ChatMessage,
  DecisionBackend,
  MessagePart,
} from './types.js'

const messagesResponseSchema = z.object({
  content: z.array(
    z.object({ type: z.string(), text: z.string().optional() }),
  ),
  usage: z
    .object({
      input_tokens: z.number().nonnegative().optional(),
      output_tokens: z.number().nonnegative().optional(),
    })
    .nullish(),
})

const toAnthropicPart = (part: MessagePart) =>
  part.type === 'text'
    ? { type: 'text', text: part.text }
    : {
        type: 'image',
        source: { type: 'base64', media_type: part.mediaType, data: part.base64 },
      }

/** System messages are hoisted into the top-level `system` field. */
export const toAnthropicRequest = (messages: ChatMessage[]) => {
  const system: string[] = []
  const converted: Array<{ role: 'user'; content: ReturnType<typeof toAnthropicPart>[] }> = []
  for (const message of messages) {
    if (message.role === 'system') {
      system.push(message.content)
      continue
    }
    converted.push({ role: 'user', content: message.content.map(toAnthropicPart) })
  }
  return { system: system.join('\n\n'), messages: converted }
}

const callAnthropic = async ({
  model,
  messages,
  settings,
  signal,
}: BackendCall): Promise<BackendReply> => {
  if (!settings.apiKey)
    throw buildDecisionPreflightError('anthropic', 'missing API key')
  const request = toAnthropicRequest(messages)
  const raw = await postJson({
    url: `${normalizeBaseUrl(settings.anthropic.baseUrl)}/v1/messages`,
    headers: {
      'x-api-key': settings.apiKey,
      'anthropic-version': settings.anthropic.version,
    },
    payload: {
      model,
      max_tokens: settings.maxOutputTokens,
      temperature: settings.temperature,
      ...(request.system ? { system: request.system } : {}),
      messages: request.messages,
    },
    signal,
  })
  const parsed = messagesResponseSchema.safeParse(raw)
  if (!parsed.success) throw new Error('unexpected messages response shape')
  const text =
    parsed.data.content.find((block) => block.type === 'text')?.text ?? ''
  return {
    text,
    inputTokens: parsed.data.usage?.input_tokens ?? 0,
    outputTokens: parsed.data.usage?.output_tokens ?? 0,
  }
}

export const anthropicBackend: DecisionBackend = {
  id: 'anthropic',
  call: callAnthropic,
}
