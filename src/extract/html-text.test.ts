import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { extractBlockText } from './html-text.js';

function textOf(html: string): string {
  const $ = cheerio.load(html);
  return extractBlockText($('div').first());
}

describe('extractBlockText', () => {
  it('puts each block on its own line and keeps inline text together', () => {
    expect(textOf('<div><p>Un <em>dous</em></p><p>tres<br>catro</p></div>')).toBe('Un dous\ntres\ncatro');
  });

  it('drops scripts, figures and advertising blocks', () => {
    const html =
      '<div><p>Texto</p><script>track()</script><figure><figcaption>Foto</figcaption></figure>' +
      '<div class="advert-box">Compra</div><div class="ad-top">Anuncio</div><p>Fin</p></div>';

    expect(textOf(html)).toBe('Texto\nFin');
  });

  it('decodes entities and collapses whitespace', () => {
    expect(textOf('<div><p>A&nbsp;&amp;   B\n  C</p></div>')).toBe('A & B C');
  });

  it('does not leave blank lines between nested blocks', () => {
    expect(textOf('<div><div><p>a</p></div>\n\n<div><p>b</p></div></div>')).toBe('a\nb');
  });

  it('leaves the original document untouched', () => {
    const $ = cheerio.load('<div><p>Texto</p><script>track()</script></div>');

    extractBlockText($('div').first());

    expect($('script').length).toBe(1);
  });

  it('works on a fragment root', () => {
    const $ = cheerio.load('<p>Primeiro</p><p>Segundo</p>', null, false);

    expect(extractBlockText($.root())).toBe('Primeiro\nSegundo');
  });
});
