export type CandidateIndexStats = {
  nodes: number;
  depth: number;
};

/**
 * Narrows the ranked prefix endpoints down to those whose literal prefix
 * starts the queried path.
 */
export interface CandidateIndex {
  readonly kind: 'trie' | 'flat';
  /** Ranks of the candidates, ascending. */
  candidates(path: string): IterableIterator<number>;
  stats(): CandidateIndexStats;
}
