const SNIPPET_LIMIT = 500

export const normalizeBaseUrl = (value: string, suffix = ''): string => {
  const trimmed = value.replace(/\/+$/, '')
  if (!suffix) return trimmed
  return trimmed.endsWith(suffix) ? trimmed : `${trimmed}${suffix}`
}

export const postJson = async (params: {
  url: string
  headers: Record<string, string>
  payload: unknown
  signal: AbortSignal
}): Promise<unknown> => {
  const response = await fetch(params.url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...params.headers },
    body: JSON.stringify(params.payload),
    signal: params.signal,
  })
  const body = await response.text()
  if (!response.ok) {
    const snippet =
      body.length > SNIPPET_LIMIT ? `${body.slice(0, SNIPPET_LIMIT)}...` : body
    throw new Error(`HTTP ${response.status}: ${snippet}`)
  }
  try {
    return JSON.parse(body)
  } catch {
    throw new Error(`invalid_json: ${body.slice(0, 200)}`)
  }
}
