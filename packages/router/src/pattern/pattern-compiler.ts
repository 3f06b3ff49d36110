import { PatternSyntaxError } from '../errors';
import type { Segment } from '../types';

import { MATCHER_FLAGS } from './pattern-options';
import { isolateValuePattern, tokenizeValuePattern } from './value-pattern';

export const escapeRegexLiteral = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export interface CompiledMatcher {
  readonly segments: readonly Segment[];
  readonly matcher: RegExp;
  /** Variable name and the number of the capture group holding its value, in declaration order. */
  readonly groups: ReadonlyArray<readonly [string, number]>;
  readonly literalLength: number;
  readonly literalPrefix: string;
  readonly isLiteral: boolean;
  readonly skeleton: string;
}

/**
 * Builds one anchored matcher for a segment sequence.
 *
 * Every variable becomes `((?:valuePattern))`. Its group number is one more
 * than the count of capture groups emitted before it, the caller's own inner
 * groups included, so values are recovered by position. Segments must come
 * from `parsePattern` or `validateSegments`.
 *
 * @param source the pattern string the segments came from, for error messages
 */
export function compileMatcher(input: readonly Segment[], source: string): CompiledMatcher {
  const segments = mergeLiterals(input);
  const groups: Array<readonly [string, number]> = [];
  let regexSource = '^';
  let nextGroup = 1;
  let literalLength = 0;
  let literalPrefix = '';
  let isLiteral = true;

  for (const segment of segments) {
    if (segment.kind === 'literal') {
      regexSource += escapeRegexLiteral(segment.text);
      literalLength += segment.text.length;
      if (isLiteral) {
        literalPrefix += segment.text;
      }
      continue;
    }

    isLiteral = false;

    const prepared = tokenizeValuePattern(segment.valuePattern);
    regexSource += `(${isolateValuePattern(prepared, nextGroup, `v${groups.length}_`)})`;
    groups.push([segment.name, nextGroup]);
    nextGroup += 1 + prepared.captureCount;
  }

  regexSource += '$';

  let matcher: RegExp;
  try {
    matcher = new RegExp(regexSource, MATCHER_FLAGS);
  } catch (error) {
    throw new PatternSyntaxError('Value patterns do not form a valid matcher', source, { cause: error });
  }

  return {
    segments,
    matcher,
    groups,
    literalLength,
    literalPrefix,
    isLiteral,
    skeleton: skeletonOf(segments),
  };
}

/**
 * Erases variable names: two patterns with equal skeletons match the same
 * paths and bind values at the same positions.
 */
export function skeletonOf(segments: readonly Segment[]): string {
  return JSON.stringify(segments.map(segment => (segment.kind === 'literal' ? segment.text : [segment.valuePattern])));
}

function mergeLiterals(segments: readonly Segment[]): Segment[] {
  const merged: Segment[] = [];
  for (const segment of segments) {
    if (segment.kind === 'literal') {
      if (!segment.text.length) {
        continue;
      }
      const last = merged[merged.length - 1];
      if (last?.kind === 'literal') {
        merged[merged.length - 1] = { kind: 'literal', text: last.text + segment.text };
        continue;
      }
    }
    merged.push(segment);
  }
  return merged;
}
