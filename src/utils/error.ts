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

/**
 * Contract violations raised by the registry and its pools.
 * None of these are runtime conditions to recover from: they flag a bug
 * in the calling code. Expected absence (dead entity, missing component)
 * never produces an ECSError.
 */
export enum ECS_ERROR {
  EID_MAX_INDEX_OVERFLOW = "EID_MAX_INDEX_OVERFLOW",
  ENTITY_NOT_ALIVE = "ENTITY_NOT_ALIVE",
  COMPONENT_ALREADY_PRESENT = "COMPONENT_ALREADY_PRESENT",
  COMPONENT_NOT_PRESENT = "COMPONENT_NOT_PRESENT",
  EMPTY_VIEW = "EMPTY_VIEW",
  DUPLICATE_SYSTEM = "DUPLICATE_SYSTEM",
  SYSTEM_NOT_FOUND = "SYSTEM_NOT_FOUND",
}

export class ECSError extends AppError {
  constructor(
    public readonly category: ECS_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, false, context);
  }
}

export function is_ecs_error(error: unknown): error is ECSError {
  return error instanceof ECSError;
}
