import { readFileSync } from 'fs';
import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

export type HtmlDocument = CheerioAPI;
export type HeadElement = Cheerio<Element>;

// htmlparser2 in HTML mode: lenient, keeps the tree as written (no implied
// <html>/<head>/<body>) and leaves entities untouched on the way back out.
const PARSE_OPTIONS = {
  xml: { xmlMode: false, decodeEntities: false },
} satisfies cheerio.CheerioOptions;

export function parseDocument(html: string): HtmlDocument {
  return cheerio.load(html, PARSE_OPTIONS);
}

/**
 * Reads `filePath` as UTF-8 (undecodable bytes become U+FFFD) and parses it.
 */
export function loadDocument(filePath: string): HtmlDocument {
  return parseDocument(readFileSync(filePath, 'utf8'));
}

export function serializeDocument($: HtmlDocument): string {
  return $.html();
}

/**
 * Returns the document's first <head>, creating it (and an <html> root
 * around it when there is none) if needed.
 */
export function ensureHead($: HtmlDocument): HeadElement {
  const head = $('head').first();
  if (head.length) return head;

  const created = $('<head></head>');
  const html = $('html').first();
  if (html.length) {
    html.prepend(created);
  } else {
    const root = $('<html></html>');
    $.root().prepend(root);
    root.append(created);
  }
  return $('head').first();
}
