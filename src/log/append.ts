import { once } from 'node:events'
import { basename, dirname } from 'node:path'

import mkdir from 'fire-keeper/mkdir'
import pino, { type Logger } from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

const MAX_FILE_MB = 10
const MAX_FILES = 30

export type LogLevel = 'info' | 'warn' | 'error'

type LoggerBundle = {
  logger: Logger
  stream: RotatingFileStream
}

const bundles = new Map<string, Promise<LoggerBundle>>()

const buildBundle = async (path: string): Promise<LoggerBundle> => {
  const dir = dirname(path)
  await mkdir(dir, { echo: false })
  const stream = createStream(basename(path), {
    size: `${MAX_FILE_MB}M`,
    interval: '1d',
    path: dir,
    compress: 'gzip',
    maxFiles: MAX_FILES,
  })
  stream.on('error', (error) => {
    console.error('[log] stream error', error)
  })
  const logger = pino(
    {
      base: { schema: 'droidloop.log.v1' },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    stream,
  )
  return { logger, stream }
}

const getBundle = (path: string): Promise<LoggerBundle> => {
  const existing = bundles.get(path)
  if (existing) return existing
  const pending = buildBundle(path)
  bundles.set(path, pending)
  pending.catch(() => bundles.delete(path))
  return pending
}

export const resolveLevel = (entry: Record<string, unknown>): LogLevel => {
  const explicit = entry['level']
  if (explicit === 'info' || explicit === 'warn' || explicit === 'error')
    return explicit
  const event = typeof entry['event'] === 'string' ? entry['event'] : ''
  if (event === 'error' || event.endsWith('_exception')) return 'error'
  if (/fail|cancel|timeout|invalid|abort|max_steps/i.test(event)) return 'warn'
  return 'info'
}

export const appendLog = async (
  path: string,
  entry: Record<string, unknown>,
): Promise<void> => {
  const { logger, stream } = await getBundle(path)
  const level = resolveLevel(entry)
  const { level: _ignoredLevel, ...payload } = entry
  logger[level](payload)
  if (stream.writableNeedDrain) await once(stream, 'drain')
}

export const closeLogs = async (): Promise<void> => {
  const pending = [...bundles.values()]
  bundles.clear()
  for (const bundle of pending) {
    const { stream } = await bundle
    stream.end()
  }
}
