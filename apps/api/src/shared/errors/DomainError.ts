import { AppError, ErrorBody } from "./AppError";

/**
 * Domain-level errors
 */

export interface ValidationIssue {
  field: string;
  message: string;
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly issues: ValidationIssue[] = [],
  ) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }

  toJSON(): ErrorBody {
    return {
      ...super.toJSON(),
      field: this.field,
      issues: this.issues,
    };
  }
}

export class EntityNotFoundError extends AppError {
  constructor(
    public readonly entityName: string,
    public readonly entityId: string,
  ) {
    super(`${entityName} with id ${entityId} not found`, "ENTITY_NOT_FOUND");
    this.name = "EntityNotFoundError";
  }
}
