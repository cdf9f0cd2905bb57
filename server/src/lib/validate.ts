import { z } from 'zod';

/**
 * Validates a request body against a Zod schema.
 * Returns the parsed data on success, or the flattened issues on failure.
 */
export function validateBody<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown,
): { success: true; data: z.infer<T> } | { success: false; issues: string[] } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return { success: false, issues: formatIssues(result.error.issues) };
  }
  return { success: true, data: result.data };
}

/** `path: message` strings, `(root)` for issues on the value itself */
export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
