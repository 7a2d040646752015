import { z } from 'zod';

/**
 * Render zod issues as `path: message` pairs joined by `; `.
 */
export function formatZodIssues(issues: readonly z.core.$ZodIssue[]): string {
  const messages: string[] = [];
  for (const issue of issues) {
    const path = issue.path.length > 0 ? issue.path.map(String).join('.') : 'input';
    messages.push(`${path}: ${issue.message}`);
  }
  return messages.join('; ');
}

/**
 * Parse `value` with `schema`, throwing a single descriptive `Error` on failure.
 *
 * @param label Prefix naming what was being parsed (e.g. `'policy'`).
 */
export function parseOrThrow<T extends z.ZodType>(
  schema: T,
  value: unknown,
  label: string
): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid ${label}: ${formatZodIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}
