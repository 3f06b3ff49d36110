import { Logger } from '@wayfinder/logger';

import { DuplicateRouteError } from '../errors';
import { compareSpecificity } from '../pattern/comparators';
import { NO_VARIABLES, PathPattern } from '../pattern/path-pattern';
import type { Endpoint, EndpointComparator, MatchingEndpoint, RouterOptions } from '../types';

import type { CandidateIndex } from './index/candidate-index';
import { FlatCandidateIndex } from './index/flat-candidate-index';
import { TrieCandidateIndex } from './index/trie-candidate-index';
import { PathRouter } from './path-router';
import { normalizeRouterOptions, type NormalizedRouterOptions } from './router-options';

const logger = new Logger('PathRouterBuilder');

export function specificityOrder<V>(a: Endpoint<V>, b: Endpoint<V>): number {
  return compareSpecificity(a.pattern, b.pattern);
}

/**
 * Collects endpoints and builds routers from them. `build` may be called any
 * number of times; each router is a snapshot of the endpoints added so far.
 */
export class PathRouterBuilder<V> {
  private readonly options: NormalizedRouterOptions;
  private readonly endpoints: Array<Endpoint<V>> = [];
  private readonly bySkeleton = new Map<string, PathPattern>();

  constructor(options?: RouterOptions) {
    this.options = normalizeRouterOptions(options);
  }

  /**
   * Registers `value` under `pattern`. String patterns are compiled with the
   * builder's options.
   *
   * @throws PatternSyntaxError when `pattern` is not well formed
   * @throws DuplicateRouteError when a pattern matching the same paths was already added
   */
  add(pattern: string | PathPattern, value: V): this {
    const compiled = typeof pattern === 'string' ? PathPattern.compile(pattern, this.options) : pattern;

    const existing = this.bySkeleton.get(compiled.skeleton);
    if (existing) {
      throw new DuplicateRouteError(compiled.source, existing.source);
    }

    this.bySkeleton.set(compiled.skeleton, compiled);
    this.endpoints.push(Object.freeze({ pattern: compiled, value }));
    return this;
  }

  /**
   * @param comparator orders endpoints with variables; defaults to most specific first.
   * Registration order breaks ties. A literal endpoint equal to the path always comes first.
   */
  build(comparator: EndpointComparator<V> = specificityOrder): PathRouter<V> {
    const exact = new Map<string, MatchingEndpoint<V>>();
    const prefixed: Array<[Endpoint<V>, number]> = [];

    this.endpoints.forEach((endpoint, order) => {
      if (endpoint.pattern.isLiteral) {
        exact.set(endpoint.pattern.literalPrefix, Object.freeze({ ...endpoint, variables: NO_VARIABLES }));
      } else {
        prefixed.push([endpoint, order]);
      }
    });

    prefixed.sort(([a, orderA], [b, orderB]) => comparator(a, b) || orderA - orderB);
    const ranked = Object.freeze(prefixed.map(([endpoint]) => endpoint));

    const router = new PathRouter<V>({
      exact,
      ranked,
      index: this.createIndex(ranked.map(endpoint => endpoint.pattern.literalPrefix)),
    });

    logger.debug('Router built', router);
    return router;
  }

  private createIndex(prefixes: readonly string[]): CandidateIndex {
    const kind = this.options.candidateIndex;
    if (kind === 'flat' || (kind === 'auto' && prefixes.length < this.options.flatScanThreshold)) {
      return new FlatCandidateIndex(prefixes);
    }
    return new TrieCandidateIndex(prefixes);
  }
}

export function routerBuilder<V>(options?: RouterOptions): PathRouterBuilder<V> {
  return new PathRouterBuilder<V>(options);
}
