// Regex helpers shared by the page-text parsers.

const PCT = '(\\d+(?:\\.\\d+)?)\\s*%';

/** `1,014,404` -> 1014404 */
export function parseGroupedInt(s: string): number {
  return parseInt(s.replace(/,/g, ''), 10);
}

export function matchNumber(text: string, re: RegExp): number | null {
  const m = re.exec(text);
  if (!m || m[1] === undefined) return null;
  const n = parseFloat(m[1].replace(/,/g, ''));
  return Number.isFinite(n) ? n : null;
}

/**
 * First percentage on the same line as `keyword`, after it or before it.
 * Values outside 0..100 are ignored.
 */
export function percentageNear(text: string, keyword: string): number | null {
  const after = new RegExp(`${keyword}[^\\n%]{0,80}?${PCT}`, 'i');
  const before = new RegExp(`${PCT}[^\\n]{0,80}?${keyword}`, 'i');
  for (const re of [after, before]) {
    const n = matchNumber(text, re);
    if (n !== null && n <= 100) return n;
  }
  return null;
}

export function firstPercentage(text: string): number | null {
  return matchNumber(text, new RegExp(PCT));
}

/** First line mentioning `word`, capped at `max` characters. */
export function lineMentioning(text: string, word: string, max = 300): string | null {
  const needle = word.toLowerCase();
  const line = text.split('\n').find((l) => l.toLowerCase().includes(needle));
  return line ? line.slice(0, max) : null;
}
