/**
 * Sequel / numeral helpers.
 * Titles in a series differ only by a number written as digits, Roman
 * numerals or Chinese numerals; these helpers pull those numbers out so
 * "最终幻想七", "Final Fantasy VII" and "ff7" compare as the same entry.
 */

const CN_DIGITS: Record<string, number> = {
  零: 0, 一: 1, 二: 2, 两: 2, 三: 3, 四: 4, 五: 5, 六: 6, 七: 7, 八: 8, 九: 9,
};

const ROMAN: Record<string, number> = {
  I: 1, II: 2, III: 3, IV: 4, V: 5, VI: 6, VII: 7, VIII: 8, IX: 9, X: 10,
};

const DIGITS_RE = /(?<!\d)\d{1,2}(?!\d)/g;
const CN_NUMERAL_RE = /[一二两三四五六七八九十]{1,3}/g;
const ROMAN_RE = /\b(?:I|II|III|IV|V|VI|VII|VIII|IX|X)\b/gi;

/** "七" -> 7, "十二" -> 12, "二十" -> 20. Returns undefined for anything else. */
export function chineseNumeralToInt(token: string): number | undefined {
  const t = token.trim();
  if (!t) return undefined;
  if (/^\d+$/.test(t)) return parseInt(t, 10);
  if (t === '十') return 10;

  const tenAt = t.indexOf('十');
  if (tenAt >= 0) {
    const left = t.slice(0, tenAt);
    const right = t.slice(tenAt + 1);
    if (right.includes('十')) return undefined;
    const tens = left === '' ? 1 : CN_DIGITS[left];
    const ones = right === '' ? 0 : CN_DIGITS[right];
    if (tens === undefined || ones === undefined) return undefined;
    return tens * 10 + ones;
  }

  return t.length === 1 ? CN_DIGITS[t] : undefined;
}

export function romanToInt(token: string): number | undefined {
  return ROMAN[token.toUpperCase()];
}

function inSequelRange(v: number | undefined): v is number {
  return v !== undefined && v >= 1 && v <= 99;
}

/** Distinct sequel numbers (1..99) mentioned in a title, as strings. */
export function extractSequelTokens(s: string): Set<string> {
  const out = new Set<string>();
  for (const m of s.match(DIGITS_RE) ?? []) {
    const v = parseInt(m, 10);
    if (inSequelRange(v)) out.add(String(v));
  }
  for (const m of s.match(CN_NUMERAL_RE) ?? []) {
    const v = chineseNumeralToInt(m);
    if (inSequelRange(v)) out.add(String(v));
  }
  for (const m of s.match(ROMAN_RE) ?? []) {
    const v = romanToInt(m);
    if (inSequelRange(v)) out.add(String(v));
  }
  return out;
}

/** Rewrite Chinese and Roman numerals as Arabic digits. */
export function rewriteNumerals(s: string): string {
  return s
    .replace(CN_NUMERAL_RE, (m) => {
      const v = chineseNumeralToInt(m);
      return v === undefined ? m : String(v);
    })
    .replace(ROMAN_RE, (m) => {
      const v = romanToInt(m);
      return v === undefined ? m : String(v);
    });
}

export function sameTokens(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const t of a) if (!b.has(t)) return false;
  return true;
}

export function tokensIntersect(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const t of a) if (b.has(t)) return true;
  return false;
}
