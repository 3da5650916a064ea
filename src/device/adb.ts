import { spawn } from 'node:child_process'

import { shortId } from '../shared/utils.js'
import { dominantPackage, parseUiNodes, selectInteractive } from './ui-dump.js'

import type {
  DeviceCapability,
  DeviceProbe,
  DevicePrimitive,
  PrimitiveResult,
  StateSnapshot,
  SwipeDirection,
} from './types.js'
import type { AppConfig } from '../config.js'

export type AdbSettings = AppConfig['device']

type AdbResult = {
  stdout: Buffer
  stderr: string
  code: number
  timedOut: boolean
}

/** Each capture dumps to its own file so concurrent runs on one device never share it. */
export const remoteDumpPath = (id: string = shortId()): string =>
  `/sdcard/droidloop_ui_dump_${id}.xml`

export const KEY_CODES: Readonly<Record<string, string>> = {
  home: 'KEYCODE_HOME',
  back: 'KEYCODE_BACK',
  enter: 'KEYCODE_ENTER',
  recent: 'KEYCODE_APP_SWITCH',
  volume_up: 'KEYCODE_VOLUME_UP',
  volume_down: 'KEYCODE_VOLUME_DOWN',
  power: 'KEYCODE_POWER',
  tab: 'KEYCODE_TAB',
  delete: 'KEYCODE_DEL',
  search: 'KEYCODE_SEARCH',
}

/** `input text` treats spaces as separators; `%s` is its literal space. */
export const escapeInputText = (text: string): string =>
  text.replace(/ /g, '%s').replace(/'/g, "\\'").replace(/"/g, '\\"')

export const swipeCoordinates = (
  direction: SwipeDirection,
  swipe: AdbSettings['swipe'],
): [number, number, number, number] => {
  const { centerX: cx, centerY: cy, distance: d } = swipe
  switch (direction) {
    case 'up':
      return [cx, cy + d, cx, cy - d]
    case 'down':
      return [cx, cy - d, cx, cy + d]
    case 'left':
      return [cx + d, cy, cx - d, cy]
    case 'right':
      return [cx - d, cy, cx + d, cy]
  }
}

export const primitiveArgs = (
  primitive: DevicePrimitive,
  settings: AdbSettings,
): string[] | { error: string } => {
  switch (primitive.kind) {
    case 'tap':
      return [
        'shell',
        'input',
        'tap',
        String(Math.round(primitive.x)),
        String(Math.round(primitive.y)),
      ]
    case 'type':
      return ['shell', 'input', 'text', escapeInputText(primitive.text)]
    case 'swipe':
      return [
        'shell',
        'input',
        'swipe',
        ...swipeCoordinates(primitive.direction, settings.swipe).map(String),
        String(settings.swipe.durationMs),
      ]
    case 'press_key': {
      const keycode = KEY_CODES[primitive.key.toLowerCase()]
      if (!keycode) {
        return {
          error: `Unknown key: ${primitive.key}. Available: ${Object.keys(KEY_CODES).join(', ')}`,
        }
      }
      return ['shell', 'input', 'keyevent', keycode]
    }
  }
}

const failureText = (result: AdbResult, timeoutMs: number): string => {
  if (result.timedOut) return `adb command timed out after ${timeoutMs}ms`
  const stderr = result.stderr.trim()
  return stderr || `adb command failed with code ${result.code}`
}

export const createAdbDevice = (settings: AdbSettings) => {
  const serial = `${settings.host}:${settings.port}`

  const runAdb = (args: string[], signal?: AbortSignal): Promise<AdbResult> =>
    new Promise((resolve) => {
      const child = spawn(settings.adbPath, ['-s', serial, ...args], {
        stdio: ['ignore', 'pipe', 'pipe'],
      })
      const chunks: Buffer[] = []
      let stderr = ''
      let settled = false
      let timedOut = false

      const finish = (code: number) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
        resolve({ stdout: Buffer.concat(chunks), stderr, code, timedOut })
      }
      const onAbort = () => {
        child.kill()
        finish(-1)
      }

      const timer = setTimeout(() => {
        timedOut = true
        child.kill()
        finish(-1)
      }, settings.timeoutMs)
      if (signal?.aborted) onAbort()
      else signal?.addEventListener('abort', onAbort, { once: true })

      child.stdout.on('data', (data: Buffer) => chunks.push(data))
      child.stderr.on('data', (data: Buffer) => (stderr += data.toString()))
      child.on('error', (error) => {
        stderr += error.message
        finish(-1)
      })
      child.on('close', (code) => finish(code ?? -1))
    })

  const connect = async (signal?: AbortSignal): Promise<PrimitiveResult> => {
    const result = await runAdb(['connect', serial], signal)
    const output = result.stdout.toString('utf8').toLowerCase()
    if (output.includes('already connected') || output.includes('connected to'))
      return { success: true, error: null }
    if (result.code === 0 && !output.includes('failed'))
      return { success: true, error: null }
    return {
      success: false,
      error: failureText(result, settings.timeoutMs) || output.trim(),
    }
  }

  const expectSuccess = async (
    label: string,
    args: string[],
    signal?: AbortSignal,
  ): Promise<Buffer> => {
    const result = await runAdb(args, signal)
    if (result.code !== 0)
      throw new Error(`${label}: ${failureText(result, settings.timeoutMs)}`)
    return result.stdout
  }

  const readUiDump = async (signal?: AbortSignal): Promise<string> => {
    const remotePath = remoteDumpPath()
    await expectSuccess(
      'ui dump failed',
      ['shell', 'uiautomator', 'dump', remotePath],
      signal,
    )
    const xml = await expectSuccess(
      'ui dump read failed',
      ['shell', 'cat', remotePath],
      signal,
    )
    await runAdb(['shell', 'rm', '-f', remotePath], signal)
    return xml.toString('utf8')
  }

  const captureState = async (signal?: AbortSignal): Promise<StateSnapshot> => {
    const connection = await connect(signal)
    if (!connection.success)
      throw new Error(`Failed to connect to device: ${connection.error}`)
    const png = await expectSuccess(
      'Failed to capture screenshot',
      ['exec-out', 'screencap', '-p'],
      signal,
    )
    const uiDump = await readUiDump(signal)
    const nodes = parseUiNodes(uiDump)
    return {
      screenshotBase64: png.length > 0 ? png.toString('base64') : null,
      uiDump,
      elementCount: nodes.length,
      elements: selectInteractive(nodes),
      dominantPackage: dominantPackage(nodes),
    }
  }

  const applyPrimitive = async (
    primitive: DevicePrimitive,
    signal?: AbortSignal,
  ): Promise<PrimitiveResult> => {
    const args = primitiveArgs(primitive, settings)
    if (!Array.isArray(args)) return { success: false, error: args.error }
    const connection = await connect(signal)
    if (!connection.success) return connection
    const result = await runAdb(args, signal)
    if (result.code === 0) return { success: true, error: null }
    return { success: false, error: failureText(result, settings.timeoutMs) }
  }

  const getProp = async (name: string): Promise<string | null> => {
    const result = await runAdb(['shell', 'getprop', name])
    const value = result.stdout.toString('utf8').trim()
    return result.code === 0 && value ? value : null
  }

  const batteryLevel = async (): Promise<number | null> => {
    const result = await runAdb(['shell', 'dumpsys', 'battery'])
    if (result.code !== 0) return null
    const match = /^\s*level:\s*(\d+)/m.exec(result.stdout.toString('utf8'))
    return match?.[1] ? Number(match[1]) : null
  }

  const probe: DeviceProbe = async () => {
    const offline = (error: string) => ({
      connected: false,
      serial,
      deviceModel: null,
      androidVersion: null,
      batteryLevel: null,
      error,
    })
    const connection = await connect()
    if (!connection.success)
      return offline(`Device not reachable: ${connection.error ?? 'Connection failed'}`)
    const ping = await runAdb(['shell', 'echo', 'ping'])
    if (ping.code !== 0 || !ping.stdout.toString('utf8').includes('ping'))
      return offline('Device connected but not responding')
    return {
      connected: true,
      serial,
      deviceModel: await getProp('ro.product.model'),
      androidVersion: await getProp('ro.build.version.release'),
      batteryLevel: await batteryLevel(),
      error: null,
    }
  }

  const device: DeviceCapability & { serial: string; probe: DeviceProbe } = {
    serial,
    captureState,
    applyPrimitive,
    probe,
  }
  return device
}
