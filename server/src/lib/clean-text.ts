const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&bull;': '•',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
};

const TAG_NAMES = [
  'a', 'article', 'b', 'blockquote', 'br', 'center', 'code', 'dd', 'div', 'dl', 'dt', 'em', 'font',
  'h[1-6]', 'hr', 'i', 'img', 'li', 'ol', 'p', 'pre', 'section', 'small', 'span', 'strong', 'sub',
  'sup', 'table', 'tbody', 'td', 'th', 'thead', 'tr', 'u', 'ul',
].join('|');

// A known tag name followed by whitespace, `/` or `>`; `vector<int>` is not a tag.
const HTML_TAG_SOURCE = `</?(?:${TAG_NAMES})(?=[\\s/>])[^>]*>`;
const ENTITY_SOURCE = '&(?:nbsp|amp|bull|lt|gt|quot|apos|#39);';

/** True when the text carries markup or entities that htmlToText would rewrite. */
export function looksLikeHtml(text: string): boolean {
  return new RegExp(HTML_TAG_SOURCE, 'i').test(text) || new RegExp(ENTITY_SOURCE).test(text);
}

/**
 * Convert HTML-ish job board text to plain multi-line text.
 * Preserves line breaks; collapses runs of spaces and blank lines.
 * Text without markup is returned as given.
 */
export function htmlToText(text: string): string {
  if (!text) return '';
  if (!looksLikeHtml(text)) return text;

  let result = text;

  // <br>, </p>, </li> end a line
  result = result.replace(/<br\s*\/?>|<\/(?:p|li|div|h[1-6])>/gi, '\n');

  result = result.replace(new RegExp(HTML_TAG_SOURCE, 'gi'), '');

  result = result.replace(new RegExp(ENTITY_SOURCE, 'g'), (entity) => ENTITIES[entity] ?? entity);

  // Collapse multiple spaces (but not newlines)
  result = result.replace(/[ \t ]+/g, ' ');

  result = result
    .split('\n')
    .map((line) => line.trim())
    .join('\n');

  result = result.replace(/\n{3,}/g, '\n\n');

  return result.trim();
}

/** Single-line variant: every whitespace run becomes one space. */
export function htmlToLine(text: string): string {
  return htmlToText(text).replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}

/** First `maxWords` words; the text is returned unchanged when shorter. */
export function limitWords(text: string, maxWords: number): string {
  const words = text.trim().split(/\s+/).filter(Boolean);
  if (words.length <= maxWords) return text.trim();
  return words.slice(0, maxWords).join(' ');
}
