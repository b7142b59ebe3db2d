export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum ECS_ERROR {
  COMPONENT_NOT_REGISTERED = "COMPONENT_NOT_REGISTERED",
  DUPLICATE_COMPONENT = "DUPLICATE_COMPONENT",
  COMPONENT_ALREADY_PRESENT = "COMPONENT_ALREADY_PRESENT",
  UNKNOWN_COMPONENT_TYPE = "UNKNOWN_COMPONENT_TYPE",
  INVALID_DESCRIPTION = "INVALID_DESCRIPTION",
  ENTITY_NOT_ALIVE = "ENTITY_NOT_ALIVE",
  SCHEDULER_REENTRANT = "SCHEDULER_REENTRANT",
}

export class ECSError extends AppError {
  constructor(
    public readonly category: ECS_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_ecs_error(error: unknown): error is ECSError {
  return error instanceof ECSError;
}
