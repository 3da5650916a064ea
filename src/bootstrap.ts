import mkdir from 'fire-keeper/mkdir'

import { createFileAuditSink, type AuditSink } from './audit/sink.js'
import { buildPaths, type AppConfig, type StatePaths } from './config.js'
import { createDecisionAdapter } from './decision/adapter.js'
import { createAdbDevice } from './device/adb.js'
import { DeviceHealthMonitor } from './device/health.js'
import { setDefaultLogPath } from './log/safe.js'
import { Orchestrator } from './orchestrator/orchestrator-service.js'
import { TaskStore } from './tasks/store.js'

import type { DecideFn, DecisionBackendKind } from './decision/types.js'
import type { DeviceCapability, DeviceProbe } from './device/types.js'

export type Runtime = {
  config: AppConfig
  paths: StatePaths
  store: TaskStore
  orchestrator: Orchestrator
  health: DeviceHealthMonitor
}

export type RuntimeOverrides = {
  device?: DeviceCapability
  probe?: DeviceProbe
  decide?: DecideFn
  audit?: AuditSink
}

/** Wires the store, device, decision adapter and orchestrator for one process. */
export const createRuntime = async (
  config: AppConfig,
  overrides: RuntimeOverrides = {},
): Promise<Runtime> => {
  const paths = buildPaths(config.stateDir)
  await mkdir(paths.root, { echo: false })
  setDefaultLogPath(paths.log)

  const adb = createAdbDevice(config.device)
  const adapter = createDecisionAdapter(config.decision, { logPath: paths.log })
  const backend: DecisionBackendKind = adapter.backend

  const store = new TaskStore({
    maxTasks: config.tasks.maxTasks,
    evictionHeadroom: config.tasks.evictionHeadroom,
    listLimit: config.tasks.listLimit,
  })
  const health = new DeviceHealthMonitor(
    overrides.probe ?? adb.probe,
    config.device.healthTtlMs,
    adb.serial,
  )
  const orchestrator = new Orchestrator({
    config,
    store,
    device: overrides.device ?? adb,
    decide: overrides.decide ?? adapter.decide,
    backend,
    audit: overrides.audit ?? createFileAuditSink(paths.audit),
    logPath: paths.log,
  })
  return { config, paths, store, orchestrator, health }
}
