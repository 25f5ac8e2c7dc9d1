import * as cheerio from 'cheerio';

const NOISE_SELECTOR = 'script, style, noscript, template, svg, nav, header, footer, aside, form, iframe';
const BLOCK_SELECTOR = 'p, div, section, article, li, tr, td, th, h1, h2, h3, h4, h5, h6, dt, dd, blockquote, pre, table';

/**
 * Readability-style plain text extraction: strips page chrome, prefers the
 * main content container, keeps block boundaries as line breaks.
 * Returns null when the page has no readable text.
 */
export function extractText(html: string): string | null {
  const $ = cheerio.load(html);
  $(NOISE_SELECTOR).remove();
  $('br').replaceWith('\n');
  $(BLOCK_SELECTOR).each((_, el) => {
    $(el).append('\n');
  });

  let container = $('main').first();
  if (container.length === 0) container = $('article').first();
  if (container.length === 0) container = $('body').first();
  const raw = container.length > 0 ? container.text() : $.root().text();

  const text = raw
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v\u00a0]+/g, ' ').trim())
    .filter(Boolean)
    .join('\n');
  return text || null;
}

export default extractText;
