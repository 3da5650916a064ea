type AppErrorCode =
  | 'validation_failed'
  | 'task_not_found'
  | 'store_at_capacity'
  | 'service_stopped'

export class AppError extends Error {
  readonly code: AppErrorCode
  readonly statusCode: number

  constructor(params: {
    code: AppErrorCode
    message: string
    statusCode: number
  }) {
    super(params.message)
    this.name = 'AppError'
    this.code = params.code
    this.statusCode = params.statusCode
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super({ code: 'validation_failed', message, statusCode: 400 })
    this.name = 'ValidationError'
  }
}

export class StoreNotFoundError extends AppError {
  readonly taskId: string

  constructor(taskId: string) {
    super({
      code: 'task_not_found',
      message: `task not found: ${taskId}`,
      statusCode: 404,
    })
    this.name = 'StoreNotFoundError'
    this.taskId = taskId
  }
}

export class StoreCapacityError extends AppError {
  constructor(maxTasks: number) {
    super({
      code: 'store_at_capacity',
      message: `task store is full: ${maxTasks} live tasks`,
      statusCode: 503,
    })
    this.name = 'StoreCapacityError'
  }
}

export class ServiceStoppedError extends AppError {
  constructor() {
    super({
      code: 'service_stopped',
      message: 'service is stopping and accepts no new tasks',
      statusCode: 503,
    })
    this.name = 'ServiceStoppedError'
  }
}
