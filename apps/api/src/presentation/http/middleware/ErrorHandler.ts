import { Request, Response, NextFunction } from "express";
import { AppError } from "../../../shared/errors/AppError";
import { HttpError } from "../../../shared/errors/HttpError";
import {
  ValidationError,
  EntityNotFoundError,
} from "../../../shared/errors/DomainError";
import {
  LLMRequestError,
  LLMTimeoutError,
  LLMUnavailableError,
} from "../../../shared/errors/LLMError";
import { ILogger } from "../../../infrastructure/logging/ILogger";

function statusFor(err: AppError): number {
  if (err instanceof HttpError) return err.statusCode;
  if (err instanceof ValidationError) return 400;
  if (err instanceof EntityNotFoundError) return 404;
  if (err instanceof LLMRequestError) return 502;
  if (err instanceof LLMUnavailableError) return 503;
  if (err instanceof LLMTimeoutError) return 504;
  return 500;
}

/**
 * Centralized Error Handler Middleware
 *
 * Maps application errors to HTTP responses. Unknown errors become 500
 * and only expose their message outside production.
 */
export function createErrorHandler(logger: ILogger, isProduction: boolean) {
  return function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction,
  ): void {
    if (err instanceof AppError) {
      const status = statusFor(err);
      const context = { path: req.path, method: req.method, status };

      if (status >= 500) {
        logger.error("Request failed", err, context);
      } else {
        logger.warn("Request rejected", { ...context, code: err.code });
      }

      res.status(status).json({
        error: err.message,
        code: err.code,
        ...(err instanceof ValidationError && {
          field: err.field,
          issues: err.issues,
        }),
      });
      return;
    }

    // body-parser reports malformed JSON as a SyntaxError with a status
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      logger.warn("Malformed JSON body", { path: req.path, method: req.method });
      res.status(400).json({ error: "Malformed JSON body", code: "BAD_REQUEST" });
      return;
    }

    logger.error("Unhandled error", err, {
      path: req.path,
      method: req.method,
    });

    res.status(500).json({
      error: isProduction ? "Internal server error" : err.message,
      code: "INTERNAL_ERROR",
      ...(!isProduction && { stack: err.stack }),
    });
  };
}
