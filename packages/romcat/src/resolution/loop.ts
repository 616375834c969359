/**
 * Resolution Loop
 * Two passes over the input, both in input order:
 *   1. match every item; auto-accept at or above the threshold
 *   2. ask the operator about the rest, once each
 * The catalog and config are passed in; the loop keeps no state between runs.
 */

import { validateThreshold } from '../shared/config.js';
import { ConfigurationError } from '../shared/errors.js';
import { silentLogger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';
import type {
  Catalog,
  MatchResult,
  ResolutionOutcome,
  ResolutionSummary,
  RunConfig,
} from '../shared/types.js';
import { queryFromFilename } from '../input/listing.js';
import { CandidateMatcher } from '../matching/matcher.js';
import type { Operator, ReviewDecision } from './operator.js';

export type ResolveConfig = Pick<RunConfig, 'confidenceThreshold' | 'sequenceAware' | 'candidateLimit'>;

function applyDecision(result: MatchResult, decision: ReviewDecision): MatchResult {
  switch (decision.kind) {
    case 'accept': {
      const picked = decision.candidate !== undefined
        ? result.candidates[decision.candidate]?.entry ?? result.suggestion
        : result.suggestion;
      if (!picked) return { ...result, accepted: false, source: 'skipped' };
      return { ...result, canonicalName: picked.canonicalName, accepted: true, source: 'manual' };
    }
    case 'override': {
      const name = decision.canonicalName.trim();
      if (!name) return { ...result, accepted: false, source: 'skipped' };
      return { ...result, canonicalName: name, accepted: true, source: 'manual' };
    }
    case 'skip':
      return { ...result, canonicalName: undefined, accepted: false, source: 'skipped' };
  }
}

function summarize(results: MatchResult[], prompted: number): ResolutionSummary {
  return {
    total: results.length,
    autoAccepted: results.filter(r => r.source === 'auto').length,
    prompted,
    manuallyAccepted: results.filter(r => r.source === 'manual').length,
    skipped: results.filter(r => r.source === 'skipped').length,
  };
}

export async function resolveItems(
  items: readonly string[],
  catalog: Catalog,
  config: ResolveConfig,
  operator: Operator,
  logger: Logger = silentLogger
): Promise<ResolutionOutcome> {
  validateThreshold(config.confidenceThreshold);
  if (catalog.entries.length === 0) {
    throw new ConfigurationError(`Catalog for "${catalog.system}" has no entries (${catalog.sourcePath})`);
  }
  if (items.length === 0) {
    throw new ConfigurationError('No input items provided');
  }

  const threshold = config.confidenceThreshold;
  const matcher = new CandidateMatcher(catalog, {
    sequenceAware: config.sequenceAware,
    candidateLimit: config.candidateLimit,
  });

  const results: MatchResult[] = [];
  const pending: number[] = [];

  for (const item of items) {
    const query = queryFromFilename(item);
    const outcome = matcher.match(query);
    const suggestion = outcome.best?.entry;

    // nothing to suggest -> always ask, even at threshold 0
    if (suggestion && outcome.score >= threshold) {
      results.push({
        item,
        query,
        canonicalName: suggestion.canonicalName,
        suggestion,
        score: outcome.score,
        accepted: true,
        source: 'auto',
        candidates: outcome.candidates,
      });
      continue;
    }

    pending.push(results.length);
    results.push({
      item,
      query,
      suggestion,
      score: outcome.score,
      accepted: false,
      source: 'skipped',
      candidates: outcome.candidates,
    });
  }

  if (pending.length > 0) {
    logger.info(`${pending.length} of ${items.length} titles need review`);
  }

  for (const [i, idx] of pending.entries()) {
    const current = results[idx];
    const decision = await operator.review({
      item: current.item,
      query: current.query,
      suggestion: current.suggestion,
      score: current.score,
      threshold,
      candidates: current.candidates,
      position: i + 1,
      remaining: pending.length - i,
    });
    results[idx] = applyDecision(current, decision);
  }

  return { results, summary: summarize(results, pending.length) };
}
