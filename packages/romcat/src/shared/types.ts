/**
 * romcat shared types
 * Plain data shapes passed between loader, matcher, loop and emitter.
 */

// ============================================================================
// Catalog
// ============================================================================

export interface CatalogEntry {
  alternateName: string;   // local title as it appears in filenames (e.g. Chinese)
  canonicalName: string;   // authoritative display title
}

export interface Catalog {
  system: string;
  sourcePath: string;
  entries: readonly CatalogEntry[];
  aliases: AliasMap;
}

/** normalized, lower-cased alias -> default title */
export type AliasMap = ReadonlyMap<string, string>;

export interface MalformedRow {
  line: number;
  reason: string;
}

// ============================================================================
// Matching
// ============================================================================

export interface ScoredCandidate {
  entry: CatalogEntry;
  score: number;           // 0..100
  index: number;           // position in catalog, used for stable ordering
}

export interface MatchOutcome {
  best?: ScoredCandidate;  // undefined when nothing scored above 0
  score: number;
  candidates: ScoredCandidate[];
}

export interface MatchOptions {
  sequenceAware: boolean;
  candidateLimit: number;
}

// ============================================================================
// Resolution
// ============================================================================

export type MatchSource = 'auto' | 'manual' | 'skipped';

export interface MatchResult {
  item: string;            // original input filename
  query: string;           // filename stem used for matching
  canonicalName?: string;
  suggestion?: CatalogEntry;
  score: number;
  accepted: boolean;
  source: MatchSource;
  candidates: ScoredCandidate[];
}

export interface ResolutionSummary {
  total: number;
  autoAccepted: number;
  prompted: number;
  manuallyAccepted: number;
  skipped: number;
}

export interface ResolutionOutcome {
  results: MatchResult[];
  summary: ResolutionSummary;
}

// ============================================================================
// Output
// ============================================================================

export interface OutputRecord {
  path: string;   // stable reference back to the original file
  name: string;   // canonical display name
}

// ============================================================================
// Configuration
// ============================================================================

export interface RunConfig {
  catalogDirectory: string;
  system: string;
  confidenceThreshold: number;   // integer 0..100
  outputPath: string;
  sequenceAware: boolean;
  candidateLimit: number;
  aliasFile: string;
  columns: {
    alternate: string;
    canonical: string;
  };
  logDirectory?: string;
}
