import type { PathPattern } from './pattern/path-pattern';

export interface LiteralSegment {
  readonly kind: 'literal';
  readonly text: string;
}

export interface VariableSegment {
  readonly kind: 'variable';
  readonly name: string;
  /** Regex source the bound text must match, anchors already stripped. */
  readonly valuePattern: string;
  /** `true` when the declaration had no `:valuePattern` part. */
  readonly isDefault: boolean;
}

export type Segment = LiteralSegment | VariableSegment;

export type PathVariables = Readonly<Record<string, string>>;

export interface MatchResult {
  readonly matched: boolean;
  readonly variables: PathVariables;
}

export interface Specificity {
  readonly variableCount: number;
  readonly literalLength: number;
}

export interface Endpoint<V> {
  readonly pattern: PathPattern;
  readonly value: V;
}

export interface MatchingEndpoint<V> extends Endpoint<V> {
  readonly variables: PathVariables;
}

export type EndpointComparator<V> = (a: Endpoint<V>, b: Endpoint<V>) => number;

export type CandidateIndexKind = 'auto' | 'trie' | 'flat';
export type RegexAnchorPolicy = 'warn' | 'error' | 'silent';

export interface RegexSafetyOptions {
  mode?: 'error' | 'warn' | 'off';
  maxLength?: number;
  forbidBacktrackingTokens?: boolean;
  forbidBackreferences?: boolean;
  validator?: (pattern: string) => void;
}

export interface PatternOptions {
  /** Value pattern of `{name}` declarations. Defaults to `[\s\S]+`, one or more of any character. */
  defaultValuePattern?: string;
  regexAnchorPolicy?: RegexAnchorPolicy;
  regexSafety?: RegexSafetyOptions;
}

export interface RouterOptions extends PatternOptions {
  /** Below this many variable-bearing endpoints a flat scan replaces the trie. */
  flatScanThreshold?: number;
  candidateIndex?: CandidateIndexKind;
}
