import { normalizePatternOptions, type NormalizedPatternOptions } from '../pattern/pattern-options';
import type { CandidateIndexKind, RouterOptions } from '../types';

export type NormalizedRouterOptions = NormalizedPatternOptions & {
  flatScanThreshold: number;
  candidateIndex: CandidateIndexKind;
};

export const DEFAULT_FLAT_SCAN_THRESHOLD = 64;
const FLAT_SCAN_THRESHOLD_LIMIT = 1e6;

const CANDIDATE_INDEX_KINDS: ReadonlySet<string> = new Set<CandidateIndexKind>(['auto', 'trie', 'flat']);

export function normalizeRouterOptions(input?: RouterOptions): NormalizedRouterOptions {
  return {
    ...normalizePatternOptions(input),
    flatScanThreshold: sanitizeFlatScanThreshold(input?.flatScanThreshold),
    candidateIndex: sanitizeCandidateIndex(input?.candidateIndex),
  };
}

function sanitizeFlatScanThreshold(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    return DEFAULT_FLAT_SCAN_THRESHOLD;
  }
  if (value > FLAT_SCAN_THRESHOLD_LIMIT) {
    return FLAT_SCAN_THRESHOLD_LIMIT;
  }
  return Math.floor(value);
}

function sanitizeCandidateIndex(value: CandidateIndexKind | undefined): CandidateIndexKind {
  if (value === undefined || !CANDIDATE_INDEX_KINDS.has(value)) {
    return 'auto';
  }
  return value;
}
