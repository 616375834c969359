/**
 * Operator boundary — the Resolution Loop asks, the operator answers.
 * Interactive terminal prompts, scripted answers and batch skipping all
 * sit behind this one interface.
 */

import type { CatalogEntry, ScoredCandidate } from '../shared/types.js';

export interface ReviewRequest {
  item: string;                 // original filename
  query: string;                // stem that was matched
  suggestion?: CatalogEntry;    // best guess, absent when nothing matched
  score: number;
  threshold: number;
  candidates: ScoredCandidate[];
  position: number;             // 1-based among pending reviews
  remaining: number;            // reviews left including this one
}

export type ReviewDecision =
  | { kind: 'accept'; candidate?: number }   // index into request.candidates; default is the suggestion
  | { kind: 'override'; canonicalName: string }
  | { kind: 'skip' };

export interface Operator {
  review(request: ReviewRequest): Promise<ReviewDecision>;
}

/** Non-interactive runs: every low-confidence item is left out of the output. */
export class SkipAllOperator implements Operator {
  async review(): Promise<ReviewDecision> {
    return { kind: 'skip' };
  }
}
