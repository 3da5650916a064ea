import fastify from 'fastify'

import { logSafeError } from '../log/safe.js'

import { registerErrorHandler } from './error-handler.js'
import { registerAuditRoute } from './routes-api-audit.js'
import { registerTaskCancelRoute } from './routes-api-task-cancel.js'
import { registerTaskRoutes } from './routes-api-tasks.js'
import { registerStatusRoutes } from './routes-api-status.js'

import type { DeviceHealthMonitor } from '../device/health.js'
import type { Orchestrator } from '../orchestrator/orchestrator-service.js'

const MAX_BODY_BYTES = 64 * 1024

export type HttpAppParams = {
  orchestrator: Orchestrator
  health: DeviceHealthMonitor
  auditLogPath?: string
}

export const buildHttpApp = (params: HttpAppParams) => {
  const app = fastify({ bodyLimit: MAX_BODY_BYTES })
  registerErrorHandler(app)
  registerTaskRoutes(app, params.orchestrator)
  registerTaskCancelRoute(app, params.orchestrator)
  registerStatusRoutes(app, params.orchestrator, params.health)
  if (params.auditLogPath) registerAuditRoute(app, params.auditLogPath)

  app.setNotFoundHandler(async (_request, reply) => {
    return reply.code(404).send({ error: 'not found' })
  })
  return app
}

export const createHttpServer = (
  params: HttpAppParams & { port: number; host: string },
) => {
  const app = buildHttpApp(params)
  void app
    .listen({ port: params.port, host: params.host })
    .then((address) => {
      console.log(`[http] listening on ${address}`)
    })
    .catch(async (error: unknown) => {
      await logSafeError('http: listen', error)
      process.exit(1)
    })
  return app
}
