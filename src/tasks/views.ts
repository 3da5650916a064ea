import { truncateText } from '../shared/utils.js'

import type { Task, TaskSummary } from '../types/index.js'

export const SUMMARY_GOAL_LIMIT = 100

export const toTaskSummary = (task: Task): TaskSummary => ({
  id: task.id,
  goal: truncateText(task.goal, SUMMARY_GOAL_LIMIT),
  status: task.status,
  app: task.app,
  createdAt: task.createdAt,
  stepsTaken: task.stepsTaken,
  estimatedCost: task.estimatedCost,
})
