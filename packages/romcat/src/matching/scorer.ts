/**
 * String similarity scorers, all on a 0..100 scale.
 *
 * `ratio` is the indel similarity 2·LCS / (|a| + |b|). The token and
 * partial variants are combined by `weightedRatio`, which picks the best of
 * them with down-weighting for the looser comparisons.
 */

function chars(s: string): string[] {
  return Array.from(s);
}

/** Length of the longest common subsequence, over code points. */
function lcsLength(a: string[], b: string[]): number {
  if (a.length === 0 || b.length === 0) return 0;
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] = a[i - 1] === b[j - 1]
        ? prev[j - 1] + 1
        : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length];
}

function ratioOf(a: string[], b: string[]): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (200 * lcsLength(a, b)) / total;
}

export function ratio(a: string, b: string): number {
  return ratioOf(chars(a), chars(b));
}

function tokens(s: string): string[] {
  return s.split(/\s+/).filter(Boolean);
}

export function tokenSortRatio(a: string, b: string): number {
  return ratio(tokens(a).sort().join(' '), tokens(b).sort().join(' '));
}

export function tokenSetRatio(a: string, b: string): number {
  const ta = new Set(tokens(a));
  const tb = new Set(tokens(b));
  const both = [...ta].filter(t => tb.has(t)).sort();
  const onlyA = [...ta].filter(t => !tb.has(t)).sort();
  const onlyB = [...tb].filter(t => !ta.has(t)).sort();

  const sect = both.join(' ');
  if (sect && (onlyA.length === 0 || onlyB.length === 0)) return 100;

  const withA = [sect, ...onlyA].filter(Boolean).join(' ');
  const withB = [sect, ...onlyB].filter(Boolean).join(' ');
  return Math.max(
    sect ? ratio(sect, withA) : 0,
    sect ? ratio(sect, withB) : 0,
    ratio(withA, withB)
  );
}

/** Best ratio of the shorter string against every same-length window of the longer. */
export function partialRatio(a: string, b: string): number {
  const ca = chars(a);
  const cb = chars(b);
  const [short, long] = ca.length <= cb.length ? [ca, cb] : [cb, ca];
  if (short.length === 0) return 0;

  let best = 0;
  for (let start = 0; start + short.length <= long.length; start++) {
    const score = ratioOf(short, long.slice(start, start + short.length));
    if (score > best) best = score;
    if (best === 100) break;
  }
  return best;
}

/**
 * Combined score. Strings of similar length compare whole and by tokens;
 * when one is much longer, substring (partial) matches count at a discount.
 * Returns an unrounded value in [0, 100].
 */
export function weightedRatio(a: string, b: string): number {
  if (!a || !b) return 0;
  if (a === b) return 100;

  const base = ratio(a, b);
  const la = chars(a).length;
  const lb = chars(b).length;
  const lenRatio = Math.max(la, lb) / Math.min(la, lb);

  if (lenRatio < 1.5) {
    return Math.max(base, tokenSortRatio(a, b) * 0.95, tokenSetRatio(a, b) * 0.95);
  }

  const partialScale = lenRatio > 8 ? 0.6 : 0.9;
  return Math.max(
    base,
    partialRatio(a, b) * partialScale,
    tokenSetRatio(a, b) * partialScale * 0.95
  );
}
