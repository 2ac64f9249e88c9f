import logger from './logger.js';
import { describeError } from './errors.js';

export type JsonBodyResult =
  | { ok: true; data: unknown }
  | { ok: false; status: 400 | 413 | 415; error: string };

function tooLarge(maxBytes: number): JsonBodyResult {
  return { ok: false, status: 413, error: `Request too large (max ${maxBytes} bytes)` };
}

/** True when a declared Content-Length is over the limit. Missing or malformed headers pass. */
export function declaresOversizedBody(contentLength: string | null, maxBytes: number): boolean {
  if (!contentLength) return false;
  const parsed = Number.parseInt(contentLength, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return false;
  return parsed > maxBytes;
}

async function readUtf8WithLimit(
  request: Request,
  maxBytes: number,
): Promise<{ ok: true; raw: string } | { ok: false; result: JsonBodyResult }> {
  if (request.bodyUsed) {
    return { ok: false, result: { ok: false, status: 400, error: 'Request body is not readable' } };
  }

  const stream = request.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel().catch((err: unknown) => {
          logger.debug({ error: describeError(err) }, 'Body stream cancel failed');
        });
        return { ok: false, result: tooLarge(maxBytes) };
      }
      chunks.push(value);
    }
  } catch (err) {
    logger.warn({ error: describeError(err) }, 'Failed to read request body');
    return { ok: false, result: { ok: false, status: 400, error: 'Failed to read request body' } };
  }

  const merged = new Uint8Array(totalBytes);
  let offset = 0;
  for (const chunk of chunks) {
    merged.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return { ok: true, raw: new TextDecoder().decode(merged) };
}

/**
 * Parse a JSON body with an actual byte-size guard.
 * Holds even when Content-Length is absent or wrong.
 */
export async function readJsonBody(request: Request, maxBytes: number): Promise<JsonBodyResult> {
  if (declaresOversizedBody(request.headers.get('content-length'), maxBytes)) {
    return tooLarge(maxBytes);
  }

  const contentType = request.headers.get('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return { ok: false, status: 415, error: 'Unsupported content type. Use application/json.' };
  }

  const read = await readUtf8WithLimit(request, maxBytes);
  if (!read.ok) return read.result;

  if (!read.raw.trim()) {
    return { ok: false, status: 400, error: 'Request body is empty' };
  }
  try {
    return { ok: true, data: JSON.parse(read.raw) };
  } catch {
    return { ok: false, status: 400, error: 'Request body is not valid JSON' };
  }
}
