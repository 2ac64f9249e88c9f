import logger from './logger.js';

export type DecodeResult =
  | { ok: true; value: unknown }
  | { ok: false; cleaned: string };

const FENCED_BLOCK = /```[a-zA-Z0-9_-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```/;

/**
 * Returns the body of the first fenced block, or the trimmed text when there
 * is none. Handles prose around the fence ("Here is the JSON: ```json ...```").
 */
export function stripFences(text: string): string {
  const fenced = text.match(FENCED_BLOCK);
  if (fenced) return fenced[1].trim();
  // Unterminated fence (truncated output)
  return text.replace(/^```[a-zA-Z0-9_-]*\s*\n?/, '').trim();
}

function tryParse(text: string): DecodeResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false, cleaned: text };
  }
}

/** Slice from the first `{`/`[` to the last matching closer. */
function sliceOutermost(text: string): string | null {
  const firstBrace = text.indexOf('{');
  const firstBracket = text.indexOf('[');
  let start = -1;
  let closeChar = '';

  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }
  if (start < 0) return null;

  const lastClose = text.lastIndexOf(closeChar);
  return lastClose > start ? text.slice(start, lastClose + 1) : text.slice(start);
}

/** Append closers for braces/brackets left open by a truncated response. */
function closePartial(text: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of text) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  const tail = inString ? '"' : '';
  return (text + tail).replace(/,\s*$/, '') + stack.reverse().join('');
}

/**
 * Decodes a structured payload out of model text: fence stripping, then a
 * direct parse, then progressively looser repairs (surrounding prose,
 * trailing commas, truncated output).
 */
export function decodeJsonPayload(text: string): DecodeResult {
  if (!text.trim()) return { ok: false, cleaned: '' };

  const cleaned = stripFences(text);
  const direct = tryParse(cleaned);
  if (direct.ok) return direct;

  const sliced = sliceOutermost(cleaned) ?? cleaned;
  const repairs = [
    sliced,
    sliced.replace(/,\s*([\]}])/g, '$1'),
  ];
  const lastRepair = repairs[repairs.length - 1];
  const closed = closePartial(lastRepair);
  if (closed !== lastRepair) repairs.push(closed);

  for (const candidate of repairs) {
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed;
  }

  logger.debug({ rawSnippet: text.substring(0, 300) }, 'Failed to decode JSON payload');
  return { ok: false, cleaned };
}
