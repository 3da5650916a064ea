import type { DeviceHealthMonitor } from '../device/health.js'
import type { Orchestrator } from '../orchestrator/orchestrator-service.js'
import type { FastifyInstance } from 'fastify'

export const registerStatusRoutes = (
  app: FastifyInstance,
  orchestrator: Orchestrator,
  health: DeviceHealthMonitor,
): void => {
  app.get('/api/status', () => orchestrator.getOverview())

  app.get('/api/device/health', () => health.check())
}
