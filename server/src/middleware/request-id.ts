import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

const REQUEST_ID_RE = /^[A-Za-z0-9._:-]+$/;

/** Accepts a caller's X-Request-ID when it is short and safe; otherwise mints one. */
export function resolveRequestId(raw: string | undefined): string {
  if (raw) {
    const candidate = raw.trim().slice(0, 64);
    if (REQUEST_ID_RE.test(candidate)) return candidate;
  }
  return randomUUID();
}

export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header('X-Request-ID'));
  c.set('requestId', requestId);
  c.header('X-Request-ID', requestId);
  await next();
}
