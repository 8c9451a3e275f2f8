import type { z } from "zod";
import { ValidationError } from "@relaymail/errors";

/**
 * Parse untrusted input, reporting the first problem per field.
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  message = "Invalid request body",
): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const fields: Record<string, string> = {};
  for (const issue of result.error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "body";
    fields[key] ??= issue.message;
  }
  throw new ValidationError(message, fields);
}
