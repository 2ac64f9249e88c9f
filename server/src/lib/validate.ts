import { z } from 'zod';

/**
 * Validates a request body against a Zod schema.
 */
export function validateBody<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown,
): { success: true; data: z.infer<T> } | { success: false; issues: z.ZodIssue[] } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return { success: false, issues: result.error.issues };
  }
  return { success: true, data: result.data };
}

/**
 * One-line rendering of zod issues, e.g. `choices.0.score: Expected number, received string`.
 * Only the first `limit` issues are listed.
 */
export function formatIssues(issues: z.ZodIssue[], limit = 3): string {
  const shown = issues.slice(0, limit).map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  const more = issues.length > limit ? ` (+${issues.length - limit} more)` : '';
  return shown.join('; ') + more;
}
