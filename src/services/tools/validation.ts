import { z } from 'zod';

/**
 * Parses model-supplied tool arguments. Invalid arguments throw, which the
 * orchestrator treats as a failed tool execution.
 */
export function parseToolArgs<T extends z.ZodTypeAny>(
  toolName: string,
  schema: T,
  args: Record<string, unknown>
): z.infer<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid arguments for ${toolName}: ${details}`);
  }
  return parsed.data;
}
