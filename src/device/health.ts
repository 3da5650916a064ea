import { errorMessage, nowIso } from '../shared/utils.js'

import type { DeviceHealth, DeviceProbe } from './types.js'

type Clock = () => number

/**
 * Caches the last device probe for `ttlMs`. Concurrent callers share one
 * in-flight probe.
 */
export class DeviceHealthMonitor {
  private last: DeviceHealth | null = null
  private checkedAt = 0
  private inflight: Promise<DeviceHealth> | null = null

  constructor(
    private readonly probe: DeviceProbe,
    private readonly ttlMs: number,
    private readonly serial: string,
    private readonly clock: Clock = Date.now,
  ) {}

  get lastCheckedAt(): number {
    return this.checkedAt
  }

  invalidate(): void {
    this.last = null
    this.checkedAt = 0
  }

  async check(): Promise<DeviceHealth> {
    if (this.last && this.clock() - this.checkedAt < this.ttlMs) return this.last
    this.inflight ??= this.refresh().finally(() => {
      this.inflight = null
    })
    return this.inflight
  }

  private async refresh(): Promise<DeviceHealth> {
    let health: DeviceHealth
    try {
      health = { ...(await this.probe()), checkedAt: nowIso() }
    } catch (error) {
      health = {
        connected: false,
        serial: this.serial,
        deviceModel: null,
        androidVersion: null,
        batteryLevel: null,
        error: errorMessage(error),
        checkedAt: nowIso(),
      }
    }
    this.last = health
    this.checkedAt = this.clock()
    return health
  }
}
