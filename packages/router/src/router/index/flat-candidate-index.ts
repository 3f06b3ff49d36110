import type { CandidateIndex, CandidateIndexStats } from './candidate-index';

/**
 * Checks every literal prefix in rank order.
 */
export class FlatCandidateIndex implements CandidateIndex {
  readonly kind = 'flat';
  private readonly prefixes: readonly string[];

  constructor(prefixes: readonly string[]) {
    this.prefixes = Object.freeze([...prefixes]);
  }

  *candidates(path: string): IterableIterator<number> {
    const prefixes = this.prefixes;
    for (let rank = 0; rank < prefixes.length; rank++) {
      const prefix = prefixes[rank];
      if (prefix !== undefined && path.startsWith(prefix)) {
        yield rank;
      }
    }
  }

  stats(): CandidateIndexStats {
    return { nodes: 0, depth: 0 };
  }
}
