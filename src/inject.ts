import type { Element } from 'domhandler';
import type { HeadElement, HtmlDocument } from './document';

// Line boundaries: \r\n, \n, \r and the rarer Unicode separators.
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

// Whitespace for trimming. Unlike String.prototype.trim this includes
// \x1c-\x1f and \x85 and leaves U+FEFF alone.
const WS = '[\\t\\n\\v\\f\\r\\x1c-\\x1f \\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000]';
const SURROUNDING_WS = new RegExp(`^${WS}+|${WS}+$`, 'g');
const TRAILING_WS = new RegExp(`${WS}+$`);

/**
 * Canonical form used to compare inline script bodies: whole text trimmed,
 * trailing whitespace stripped from every line, lines joined with "\n".
 * Files written by earlier runs depend on this exact rule.
 */
export function normalizeScriptText(text: string): string {
  return text
    .replace(SURROUNDING_WS, '')
    .split(LINE_BREAK)
    .map((line) => line.replace(TRAILING_WS, ''))
    .join('\n');
}

export function scriptTextEqual(a: string, b: string): boolean {
  return normalizeScriptText(a) === normalizeScriptText(b);
}

// Every inline <script> (no src) whose body matches `body` after normalization
export function findExactScript($: HtmlDocument, body: string): Element[] {
  return $('script')
    .toArray()
    .filter((el) => $(el).attr('src') === undefined)
    .filter((el) => scriptTextEqual($(el).text(), body));
}

function createScript($: HtmlDocument, body: string) {
  return $('<script></script>').text(body);
}

/**
 * Prepends an inline script with `body` to `head` unless an equivalent one
 * already exists anywhere in the document. Returns whether it inserted.
 */
export function insertTop(
  $: HtmlDocument,
  head: HeadElement,
  body: string
): boolean {
  if (findExactScript($, body).length) return false;
  head.prepend(createScript($, body));
  return true;
}

/**
 * Same as {@link insertTop}, but appends as the last child of `head`.
 */
export function insertBottom(
  $: HtmlDocument,
  head: HeadElement,
  body: string
): boolean {
  if (findExactScript($, body).length) return false;
  head.append(createScript($, body));
  return true;
}
