import { z } from "zod";
import { ValidationError } from "../../../shared/errors/DomainError";

/**
 * Validate an untrusted request payload against a zod schema.
 * Failures become a ValidationError naming the first offending field.
 */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): z.infer<S> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: issue.path.join(".") || "body",
      message: issue.message,
    }));
    const [first] = issues;
    throw new ValidationError(
      first ? `${first.field}: ${first.message}` : "Invalid request",
      first?.field,
      issues,
    );
  }

  return result.data;
}
