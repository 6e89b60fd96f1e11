import type { Context } from 'hono';
import { z } from 'zod';

export const DeviceIdSchema = z.string().trim().min(1).max(64);

export type ParseResult<T> = { ok: true; data: T } | { ok: false; message: string };

export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): ParseResult<z.infer<T>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }
  const message = parsed.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return { ok: false, message };
}

/**
 * JSON body that may be absent. A malformed body still throws SyntaxError.
 */
export async function readOptionalJson(c: Context): Promise<unknown> {
  const raw = await c.req.text();
  return raw.trim() === '' ? {} : JSON.parse(raw);
}
