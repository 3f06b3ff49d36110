import type { Loggable, LogMetadataRecord } from '@wayfinder/logger';

import type { Endpoint, MatchingEndpoint } from '../types';

import type { CandidateIndex } from './index/candidate-index';

export interface PathRouterParts<V> {
  readonly exact: ReadonlyMap<string, MatchingEndpoint<V>>;
  /** Endpoints with variables, in rank order. */
  readonly ranked: ReadonlyArray<Endpoint<V>>;
  readonly index: CandidateIndex;
}

/**
 * Resolves request paths against a fixed set of endpoints. Built by
 * `PathRouterBuilder.build`; never changes afterwards.
 */
export class PathRouter<V> implements Loggable {
  private readonly exact: ReadonlyMap<string, MatchingEndpoint<V>>;
  private readonly ranked: ReadonlyArray<Endpoint<V>>;
  private readonly index: CandidateIndex;

  constructor(parts: PathRouterParts<V>) {
    this.exact = parts.exact;
    this.ranked = parts.ranked;
    this.index = parts.index;
    Object.freeze(this);
  }

  get size(): number {
    return this.exact.size + this.ranked.length;
  }

  /**
   * Returns the best endpoint for `path`: the literal endpoint equal to it,
   * else the first matching endpoint in rank order.
   */
  find(path: string): MatchingEndpoint<V> | null {
    const exact = this.exact.get(path);
    if (exact) {
      return exact;
    }
    for (const rank of this.index.candidates(path)) {
      const found = this.matchRank(rank, path);
      if (found) {
        return found;
      }
    }
    return null;
  }

  /**
   * Yields every endpoint matching `path`, best first. Candidates are only
   * evaluated as the iterator advances.
   */
  *findAll(path: string): IterableIterator<MatchingEndpoint<V>> {
    const exact = this.exact.get(path);
    if (exact) {
      yield exact;
    }
    for (const rank of this.index.candidates(path)) {
      const found = this.matchRank(rank, path);
      if (found) {
        yield found;
      }
    }
  }

  toLog(): LogMetadataRecord {
    const { nodes, depth } = this.index.stats();
    return {
      exactEndpoints: this.exact.size,
      prefixEndpoints: this.ranked.length,
      candidateIndex: this.index.kind,
      nodes,
      depth,
    };
  }

  private matchRank(rank: number, path: string): MatchingEndpoint<V> | undefined {
    const endpoint = this.ranked[rank];
    if (!endpoint) {
      return undefined;
    }
    const result = endpoint.pattern.match(path);
    if (!result.matched) {
      return undefined;
    }
    return Object.freeze({ pattern: endpoint.pattern, value: endpoint.value, variables: result.variables });
  }
}
