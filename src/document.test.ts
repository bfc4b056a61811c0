import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ensureHead,
  loadDocument,
  parseDocument,
  serializeDocument,
} from './document';

describe('parseDocument', () => {
  it('does not invent html, head or body', () => {
    expect(serializeDocument(parseDocument('<p>hello</p>'))).toBe(
      '<p>hello</p>'
    );
  });

  it('tolerates unclosed and stray tags', () => {
    const $ = parseDocument('<div><p>one<p>two</span></div>');
    expect($('p').length).toBe(2);
    expect($('div').text()).toBe('onetwo');
  });

  it('keeps entities as written', () => {
    const html = '<p>caf&eacute; &amp; bar &lt;3</p>';
    expect(serializeDocument(parseDocument(html))).toBe(html);
  });
});

describe('loadDocument', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'access-gate-doc-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('replaces undecodable bytes instead of failing', () => {
    const file = path.join(dir, 'bad.html');
    writeFileSync(
      file,
      Buffer.concat([
        Buffer.from('<p>a'),
        Buffer.from([0xff, 0xfe]),
        Buffer.from('b</p>'),
      ])
    );

    const $ = loadDocument(file);
    expect($('p').text()).toBe('a\uFFFD\uFFFDb');
  });
});

describe('ensureHead', () => {
  it('returns the existing head', () => {
    const $ = parseDocument(
      '<html><head><title>t</title></head><body></body></html>'
    );
    const head = ensureHead($);
    expect(head.children('title').text()).toBe('t');
    expect($('head').length).toBe(1);
  });

  it('creates head as the first child of html', () => {
    const $ = parseDocument('<html><body>x</body></html>');
    ensureHead($);
    expect(serializeDocument($)).toBe(
      '<html><head></head><body>x</body></html>'
    );
  });

  it('wraps a new head in a new html root placed first', () => {
    const $ = parseDocument('<p>hello</p>');
    ensureHead($);
    expect(serializeDocument($)).toBe('<html><head></head></html><p>hello</p>');
  });

  it('changes nothing on a second call', () => {
    const $ = parseDocument('<p>hello</p>');
    const first = ensureHead($);
    const second = ensureHead($);

    expect(second.get(0)).toBe(first.get(0));
    expect($('html').length).toBe(1);
    expect($('head').length).toBe(1);
    expect(serializeDocument($)).toBe('<html><head></head></html><p>hello</p>');
  });
});
