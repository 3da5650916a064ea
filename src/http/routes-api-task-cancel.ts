import { resolveRouteId } from './route-params.js'

import type { Orchestrator } from '../orchestrator/orchestrator-service.js'
import type { FastifyInstance } from 'fastify'

export const registerTaskCancelRoute = (
  app: FastifyInstance,
  orchestrator: Orchestrator,
): void => {
  app.post('/api/tasks/:id/cancel', (request, reply) => {
    const taskId = resolveRouteId(request.params, reply, 'task')
    if (!taskId) return reply
    return orchestrator.cancel(taskId)
  })
}
