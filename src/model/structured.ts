import { z, type ZodIssue, type ZodTypeAny } from "zod";

import { ConfigError } from "../core/errors.js";

// Settings, options and scopes all export as sorted `[key, value]` pairs.
export const StructuredPairsSchema = z.array(z.tuple([z.string(), z.string()]));

export type StructuredPairs = z.infer<typeof StructuredPairsSchema>;

export function formatSchemaIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}

export function parseStructured<TSchema extends ZodTypeAny>(
  schema: TSchema,
  data: unknown,
  label: string,
): z.output<TSchema> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid structured ${label}: ${formatSchemaIssues(parsed.error.issues).join("; ")}`,
      parsed.error,
    );
  }
  return parsed.data;
}
