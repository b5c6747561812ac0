import { AppError, ErrorBody } from "./AppError";

/**
 * A storage call failed or returned data in an unexpected shape.
 */
export class PersistenceError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly dbCode?: string,
  ) {
    super(message, "PERSISTENCE_ERROR");
    this.name = "PersistenceError";
  }

  toJSON(): ErrorBody {
    return { ...super.toJSON(), operation: this.operation };
  }
}
