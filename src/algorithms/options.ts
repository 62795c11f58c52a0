import { z } from "zod";

import { GraphOptionsError } from "../graph/errors.js";

/**
 * Validates algorithm options against {@link schema}, converting zod issues
 * into a {@link GraphOptionsError} carrying one `path: message` line per issue.
 */
export function parseAlgorithmOptions<S extends z.ZodTypeAny>(schema: S, input: unknown, operation: string): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new GraphOptionsError(
      operation,
      parsed.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "options"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/** Schema accepted wherever an option references a node index. */
export const NodeIndexSchema = z.number().int().nonnegative();
