import { bench, do_not_optimize, group, run } from 'mitata';

import type { PathRouter } from '../../src/router/path-router';
import { routerBuilder } from '../../src/router/router-builder';
import type { CandidateIndexKind } from '../../src/types';

type RouteSpec = {
  pattern: string;
  sample: string;
};

const ALPHA_LOWER = 'abcdefghijklmnopqrstuvwxyz';
const ALPHANUM_LOWER = 'abcdefghijklmnopqrstuvwxyz0123456789';
const HEX_CHARS = '0123456789abcdef';

const literalRoutes10k = generateLiteralRouteSpecs(10_000, 4, 8);
const variableRoutes1k = generateVariableRouteSpecs(1_000);
const variableRoutes48 = generateVariableRouteSpecs(48);
const overlappingRoutes = Array.from({ length: 500 }, (_, i) => ({
  pattern: `${'a'.repeat(i + 1)}{suffix:.*}`,
  sample: 'a'.repeat(500),
}));

const routerLiteral10k = buildRouter(literalRoutes10k);
const routerVariableTrie = buildRouter(variableRoutes1k, 'trie');
const routerVariableFlat = buildRouter(variableRoutes1k, 'flat');
const routerSmallTrie = buildRouter(variableRoutes48, 'trie');
const routerSmallFlat = buildRouter(variableRoutes48, 'flat');
const routerOverlapping = buildRouter(overlappingRoutes);

const nextLiteral = makeRoundRobin(literalRoutes10k.map(spec => spec.sample));
const nextVariable = makeRoundRobin(variableRoutes1k.map(spec => spec.sample));
const nextSmall = makeRoundRobin(variableRoutes48.map(spec => spec.sample));

group('find :: literal endpoints', () => {
  bench('10k literal routes', () => do_not_optimize(routerLiteral10k.find(nextLiteral())));
  bench('10k literal routes (miss)', () => do_not_optimize(routerLiteral10k.find('/not/registered/anywhere')));
});

group('find :: 1k variable endpoints', () => {
  bench('trie', () => do_not_optimize(routerVariableTrie.find(nextVariable())));
  bench('flat', () => do_not_optimize(routerVariableFlat.find(nextVariable())));
});

group('find :: 48 variable endpoints', () => {
  bench('trie', () => do_not_optimize(routerSmallTrie.find(nextSmall())));
  bench('flat', () => do_not_optimize(routerSmallFlat.find(nextSmall())));
});

group('findAll :: 500 overlapping endpoints', () => {
  bench('first match only', () => do_not_optimize(routerOverlapping.findAll('a'.repeat(500)).next()));
  bench('every match', () => do_not_optimize([...routerOverlapping.findAll('a'.repeat(500))].length));
});

group('build', () => {
  bench('1k variable routes', () => do_not_optimize(buildRouter(variableRoutes1k)));
  bench('10k literal routes', () => do_not_optimize(buildRouter(literalRoutes10k)));
});

await run({ colors: process.env.NO_COLOR !== '1' });

function buildRouter(specs: RouteSpec[], candidateIndex?: CandidateIndexKind): PathRouter<string> {
  const builder = routerBuilder<string>({ candidateIndex });
  for (const spec of specs) {
    builder.add(spec.pattern, spec.pattern);
  }
  return builder.build();
}

function generateLiteralRouteSpecs(count: number, depth: number, segmentLength: number): RouteSpec[] {
  const specs: RouteSpec[] = new Array(count);
  const next = makeSeededGenerator(count + depth + segmentLength);
  for (let i = 0; i < count; i++) {
    const segments: string[] = new Array(depth);
    for (let d = 0; d < depth; d++) {
      segments[d] = generateToken(next, segmentLength, ALPHANUM_LOWER, i + d * 13);
    }
    const path = `/${segments.join('/')}/${i}`;
    specs[i] = { pattern: path, sample: path };
  }
  return specs;
}

function generateVariableRouteSpecs(count: number): RouteSpec[] {
  const specs: RouteSpec[] = new Array(count);
  const next = makeSeededGenerator(0xbeef);
  for (let i = 0; i < count; i++) {
    const prefix = `/bench/${i.toString(36).padStart(4, '0')}`;
    switch (i % 4) {
      case 0: {
        const userId = generateToken(next, 24, HEX_CHARS);
        specs[i] = {
          pattern: `${prefix}/users/{userId:[0-9a-f]{24}}/posts/{postId:[0-9]+}`,
          sample: `${prefix}/users/${userId}/posts/${i}`,
        };
        break;
      }
      case 1: {
        const lang = generateToken(next, 2, ALPHA_LOWER);
        specs[i] = {
          pattern: `${prefix}/search/{lang:[a-z]{2}}/{terms}`,
          sample: `${prefix}/search/${lang}/term-${i}/ref`,
        };
        break;
      }
      case 2: {
        const file = generateToken(next, 10, ALPHANUM_LOWER);
        specs[i] = {
          pattern: `${prefix}/assets/{file}.{ext:[a-z0-9]+}`,
          sample: `${prefix}/assets/${file}.png`,
        };
        break;
      }
      default: {
        specs[i] = {
          pattern: `${prefix}/{rest}`,
          sample: `${prefix}/${generateToken(next, 6, ALPHA_LOWER)}/${generateToken(next, 6, ALPHA_LOWER)}`,
        };
        break;
      }
    }
  }
  return specs;
}

function makeSeededGenerator(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state;
  };
}

function generateToken(next: () => number, length: number, alphabet: string, salt = 0): string {
  let token = '';
  let state = salt;
  for (let i = 0; i < length; i++) {
    state ^= next();
    token += alphabet.charAt(Math.abs(state) % alphabet.length);
  }
  return token;
}

function makeRoundRobin<T>(items: readonly T[]): () => T {
  let index = 0;
  return () => {
    const value = items[index % items.length];
    index++;
    if (value === undefined) {
      throw new RangeError('Round robin over an empty list');
    }
    return value;
  };
}
