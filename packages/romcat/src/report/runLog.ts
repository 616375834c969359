import fs from 'node:fs';
import path from 'node:path';

import type { MatchResult, ResolutionSummary } from '../shared/types.js';

export interface RunLogEntry {
  item: string;
  query: string;
  source: MatchResult['source'];
  score: number;
  canonicalName: string | null;
  suggestedAlternate: string | null;
  candidates: Array<{ alternateName: string; canonicalName: string; score: number }>;
}

export interface RunLogDocument {
  system: string;
  threshold: number;
  startedAt: string;
  finishedAt: string;
  summary: ResolutionSummary;
  entries: RunLogEntry[];
}

export function toLogEntry(r: MatchResult): RunLogEntry {
  return {
    item: r.item,
    query: r.query,
    source: r.source,
    score: r.score,
    canonicalName: r.canonicalName ?? null,
    suggestedAlternate: r.suggestion?.alternateName ?? null,
    candidates: r.candidates.map(c => ({
      alternateName: c.entry.alternateName,
      canonicalName: c.entry.canonicalName,
      score: c.score,
    })),
  };
}

/** JSON run log, one file per run, written atomically. */
export class RunLog {
  private readonly startedAt: Date;

  constructor(private readonly logDir: string, now: Date = new Date()) {
    this.startedAt = now;
  }

  get filePath(): string {
    const ts = this.startedAt.toISOString().replace(/[:.]/g, '-');
    return path.join(this.logDir, `${ts}.json`);
  }

  write(doc: Omit<RunLogDocument, 'startedAt' | 'finishedAt'>, finishedAt: Date = new Date()): string {
    fs.mkdirSync(this.logDir, { recursive: true });
    const full: RunLogDocument = {
      ...doc,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
    };
    const filePath = this.filePath;
    const tmpPath = `${filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(full, null, 2));
    fs.renameSync(tmpPath, filePath);
    return filePath;
  }
}
