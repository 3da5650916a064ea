import { resolveRouteId } from './route-params.js'
import {
  listTasksQuerySchema,
  parseWith,
  startTaskBodySchema,
} from './schemas.js'

import type { Orchestrator } from '../orchestrator/orchestrator-service.js'
import type { FastifyInstance } from 'fastify'

export const registerTaskRoutes = (
  app: FastifyInstance,
  orchestrator: Orchestrator,
): void => {
  app.post('/api/tasks', async (request, reply) => {
    const body = parseWith(startTaskBodySchema, request.body)
    const task = orchestrator.start({
      goal: body.goal,
      ...(body.app ? { app: body.app } : {}),
      ...(body.parameters ? { parameters: body.parameters } : {}),
      ...(body.maxSteps !== undefined ? { maxSteps: body.maxSteps } : {}),
    })
    return reply.code(202).send({ taskId: task.id, status: task.status })
  })

  app.get('/api/tasks', (request) => {
    const query = parseWith(listTasksQuerySchema, request.query)
    return { tasks: orchestrator.list(query.status, query.limit) }
  })

  app.get('/api/tasks/:id', (request, reply) => {
    const taskId = resolveRouteId(request.params, reply, 'task')
    if (!taskId) return reply
    return orchestrator.getStatus(taskId)
  })
}
