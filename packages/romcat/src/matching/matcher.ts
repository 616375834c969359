/**
 * CandidateMatcher — pure, no I/O.
 * Constructed with a loaded catalog; prepared (normalised) alternate names
 * are computed once and reused for every query.
 */

import type {
  Catalog,
  CatalogEntry,
  MatchOptions,
  MatchOutcome,
  ScoredCandidate,
} from '../shared/types.js';
import { applyAlias, normalizeTitle } from './normalize.js';
import { weightedRatio } from './scorer.js';
import {
  extractSequelTokens,
  rewriteNumerals,
  sameTokens,
  tokensIntersect,
} from './sequence.js';

/** Score multiplier when query and candidate name different sequel numbers. */
export const SEQUEL_MISMATCH_FACTOR = 0.6;

interface PreparedTitle {
  text: string;
  compact: string;
  sequel: Set<string>;
}

interface PreparedEntry extends PreparedTitle {
  entry: CatalogEntry;
  index: number;
}

interface Ranked {
  prepared: PreparedEntry;
  score: number;
}

export class CandidateMatcher {
  private readonly prepared: PreparedEntry[];

  constructor(
    private readonly catalog: Catalog,
    private readonly options: MatchOptions
  ) {
    this.prepared = catalog.entries.map((entry, index) => ({
      entry,
      index,
      ...this.prepare(entry.alternateName),
    }));
  }

  get size(): number {
    return this.prepared.length;
  }

  /** Normalise, apply aliases, lower-case and (in sequence-aware mode) rewrite numerals. */
  prepare(title: string): PreparedTitle {
    let text = applyAlias(normalizeTitle(title), this.catalog.aliases).toLowerCase();
    if (this.options.sequenceAware) text = rewriteNumerals(text);
    return { text, compact: text.replace(/\s+/g, ''), sequel: extractSequelTokens(text) };
  }

  /**
   * Similarity of a query against one alternate name, integer 0..100.
   * Titles that differ only in spacing score 100.
   */
  scorePair(query: PreparedTitle, candidate: PreparedTitle): number {
    if (query.compact === candidate.compact) return 100;
    let score = weightedRatio(query.text, candidate.text);
    if (!sameTokens(query.sequel, candidate.sequel)) {
      score *= SEQUEL_MISMATCH_FACTOR;
    }
    return Math.max(0, Math.min(100, Math.round(score)));
  }

  match(query: string): MatchOutcome {
    const q = this.prepare(query);
    const ranked: Ranked[] = this.prepared.map(p => ({ prepared: p, score: this.scorePair(q, p) }));
    ranked.sort((a, b) => this.compare(q, a, b));

    const candidates: ScoredCandidate[] = ranked
      .filter(r => r.score > 0)
      .slice(0, this.options.candidateLimit)
      .map(r => ({ entry: r.prepared.entry, score: r.score, index: r.prepared.index }));

    const best = candidates[0];
    return { best, score: best?.score ?? 0, candidates };
  }

  /**
   * Ranking order: higher score first. In sequence-aware mode equal scores
   * prefer an exact normalised hit, then matching sequel numbers, then any
   * shared sequel number, then the longer (more specific) title. Whatever
   * is still tied goes to the entry that appears first in the catalog.
   */
  private compare(q: PreparedTitle, a: Ranked, b: Ranked): number {
    if (a.score !== b.score) return b.score - a.score;

    if (this.options.sequenceAware) {
      const ka = this.tieKey(q, a.prepared);
      const kb = this.tieKey(q, b.prepared);
      for (let i = 0; i < ka.length; i++) {
        if (ka[i] !== kb[i]) return kb[i] - ka[i];
      }
    }

    return a.prepared.index - b.prepared.index;
  }

  private tieKey(q: PreparedTitle, p: PreparedEntry): number[] {
    const exact = p.text === q.text ? 1 : 0;
    const sequelOk = q.sequel.size === 0 || sameTokens(q.sequel, p.sequel) ? 1 : 0;
    const sequelShared = tokensIntersect(q.sequel, p.sequel) ? 1 : 0;
    return [exact, sequelOk, sequelShared, Array.from(p.text).length];
  }
}

/** One-shot helper: best catalog entry and score for a query. */
export function bestMatch(query: string, catalog: Catalog, options: MatchOptions): MatchOutcome {
  return new CandidateMatcher(catalog, options).match(query);
}
