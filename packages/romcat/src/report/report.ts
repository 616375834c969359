/**
 * Run report
 * Summary counts plus one mapping line per item, printed after resolution so
 * the whole run can be double-checked by eye (or pasted into an LLM).
 */

import type { Logger } from '../shared/logger.js';
import type { MatchResult, ResolutionSummary } from '../shared/types.js';

function pct(part: number, total: number): string {
  return total > 0 ? `${(part * 100 / total).toFixed(1)}%` : '0.0%';
}

export function formatSummary(summary: ResolutionSummary, threshold: number): string[] {
  return [
    `  Total          : ${summary.total}`,
    `${`  Auto (>= ${threshold})`.padEnd(17)}: ${summary.autoAccepted} (${pct(summary.autoAccepted, summary.total)})`,
    `  Prompted       : ${summary.prompted} (${pct(summary.prompted, summary.total)})`,
    `  Manual         : ${summary.manuallyAccepted}`,
    `  Skipped        : ${summary.skipped}`,
  ];
}

/** `<file> -> <matched catalog name> -> <final name>` */
export function formatMapping(r: MatchResult): string {
  const detected = r.suggestion?.alternateName ?? '';
  const chosen = r.accepted && r.canonicalName ? r.canonicalName : '(skipped)';
  return `${r.item} -> ${detected} -> ${chosen}`;
}

export function printRunReport(
  logger: Logger,
  results: readonly MatchResult[],
  summary: ResolutionSummary,
  threshold: number
): void {
  logger.section('Mappings');
  for (const r of results) logger.line(`  ${formatMapping(r)}`);

  logger.section('Summary');
  for (const line of formatSummary(summary, threshold)) logger.line(line);
  logger.line('');
}
