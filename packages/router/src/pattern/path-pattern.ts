import type { MatchResult, PathVariables, PatternOptions, Segment, Specificity } from '../types';

import { compileMatcher, type CompiledMatcher } from './pattern-compiler';
import { normalizePatternOptions } from './pattern-options';
import { formatPattern, parsePattern, validateSegments } from './pattern-parser';

export const NO_VARIABLES: PathVariables = Object.freeze(Object.create(null));

export const NO_MATCH: MatchResult = Object.freeze({ matched: false, variables: NO_VARIABLES });
export const MATCHED: MatchResult = Object.freeze({ matched: true, variables: NO_VARIABLES });

/**
 * A parsed and compiled path pattern. Immutable.
 */
export class PathPattern {
  readonly source: string;
  readonly segments: readonly Segment[];
  readonly literalPrefix: string;
  readonly literalLength: number;
  readonly isLiteral: boolean;
  readonly skeleton: string;
  readonly variableNames: readonly string[];
  readonly specificity: Specificity;

  private readonly matcher: RegExp;
  private readonly groups: ReadonlyArray<readonly [string, number]>;

  private constructor(source: string, compiled: CompiledMatcher) {
    this.source = source;
    this.segments = Object.freeze(compiled.segments);
    this.literalPrefix = compiled.literalPrefix;
    this.literalLength = compiled.literalLength;
    this.isLiteral = compiled.isLiteral;
    this.skeleton = compiled.skeleton;
    this.matcher = compiled.matcher;
    this.groups = compiled.groups;
    this.variableNames = Object.freeze(compiled.groups.map(([name]) => name));
    this.specificity = Object.freeze({ variableCount: compiled.groups.length, literalLength: compiled.literalLength });
    Object.freeze(this);
  }

  /**
   * Parses and compiles `pattern`.
   *
   * @throws PatternSyntaxError
   */
  static compile(pattern: string, options?: PatternOptions): PathPattern {
    return new PathPattern(pattern, compileMatcher(parsePattern(pattern, options), pattern));
  }

  /**
   * Validates and compiles a segment sequence built outside the parser.
   * Without `source` the pattern string is rendered from the segments.
   *
   * @throws PatternSyntaxError
   */
  static fromSegments(segments: readonly Segment[], source?: string, options?: PatternOptions): PathPattern {
    const text = source ?? formatPattern(segments);
    const validated = validateSegments(segments, text, normalizePatternOptions(options));
    return new PathPattern(text, compileMatcher(validated, text));
  }

  get variableCount(): number {
    return this.groups.length;
  }

  /**
   * Matches the whole of `path`. Values are bound by variable name.
   */
  match(path: string): MatchResult {
    if (this.isLiteral) {
      return path === this.literalPrefix ? MATCHED : NO_MATCH;
    }

    const found = this.matcher.exec(path);
    if (!found) {
      return NO_MATCH;
    }

    const variables: Record<string, string> = Object.create(null);
    for (const [name, group] of this.groups) {
      variables[name] = found[group] ?? '';
    }
    return { matched: true, variables: Object.freeze(variables) };
  }

  equals(other: PathPattern): boolean {
    return this === other || this.source === other.source;
  }

  toString(): string {
    return this.source;
  }
}

export function compilePattern(segments: readonly Segment[], source?: string, options?: PatternOptions): PathPattern {
  return PathPattern.fromSegments(segments, source, options);
}
