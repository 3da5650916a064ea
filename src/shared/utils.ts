export const newId = (): string => crypto.randomUUID().replace(/-/g, '')

export const shortId = (): string => newId().slice(0, 8)

export const nowIso = (): string => new Date().toISOString()

export const sleep = (ms: number) =>
  new Promise((resolve) => setTimeout(resolve, ms))

export const elapsedMsSince = (startedAt: number): number =>
  Math.max(0, Date.now() - startedAt)

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value)

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

export const truncateText = (text: string, limit: number): string => {
  if (text.length <= limit) return text
  return `${text.slice(0, limit)}...`
}
