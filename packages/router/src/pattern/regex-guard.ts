import type { RegexToken } from './regex-tokens';

export interface RegexAssessment {
  safe: boolean;
  reason?: string;
}

export interface RegexSafetyStaticConfig {
  maxLength: number;
  forbidBacktrackingTokens: boolean;
  forbidBackreferences: boolean;
}

export function assessRegexSafety(source: string, tokens: readonly RegexToken[], options: RegexSafetyStaticConfig): RegexAssessment {
  if (source.length > options.maxLength) {
    return { safe: false, reason: `Regex length ${source.length} exceeds limit ${options.maxLength}` };
  }
  if (options.forbidBackreferences && tokens.some(token => token.kind === 'backreference')) {
    return { safe: false, reason: 'Backreferences are not allowed in value patterns' };
  }
  if (options.forbidBacktrackingTokens && hasNestedUnboundedQuantifier(tokens)) {
    return { safe: false, reason: 'Nested unlimited quantifiers detected' };
  }
  return { safe: true };
}

/**
 * Detects an unbounded quantifier applied to a group that itself contains an
 * unbounded quantifier, e.g. `(a+)+` or `(?:\w*x)*`.
 */
export function hasNestedUnboundedQuantifier(tokens: readonly RegexToken[]): boolean {
  const open: boolean[] = [false];
  let closedUnbounded = false;
  let previous: RegexToken | undefined;

  for (const token of tokens) {
    switch (token.kind) {
      case 'group-open':
        open.push(false);
        break;
      case 'group-close': {
        closedUnbounded = open.pop() ?? false;
        if (!open.length) {
          open.push(false);
        }
        if (closedUnbounded) {
          open[open.length - 1] = true;
        }
        break;
      }
      case 'quantifier':
        if (token.unbounded) {
          if (previous?.kind === 'group-close' && closedUnbounded) {
            return true;
          }
          open[open.length - 1] = true;
        }
        break;
      default:
        break;
    }
    previous = token;
  }

  return false;
}
