import { Logger } from '@wayfinder/logger';

import { PatternSyntaxError } from '../errors';

import { MATCHER_FLAGS, type NormalizedPatternOptions } from './pattern-options';
import { assessRegexSafety } from './regex-guard';
import { countCapturingGroups, joinTokens, tokenizeRegex, type RegexToken } from './regex-tokens';

const logger = new Logger('PathPattern');

export interface PreparedValuePattern {
  readonly source: string;
  readonly tokens: readonly RegexToken[];
  readonly captureCount: number;
}

/**
 * Validates the value pattern of one `{name:valuePattern}` declaration and
 * normalizes it for embedding in a larger matcher.
 *
 * @param pattern the whole path pattern, for error messages
 * @param index offset of the declaration in `pattern`, when it came from one
 */
export function prepareValuePattern(
  raw: string,
  pattern: string,
  index: number | undefined,
  options: NormalizedPatternOptions,
): PreparedValuePattern {
  const tokens = stripAnchors(tokenizeRegex(raw), raw, pattern, index, options);

  const inlineFlags = tokens.find(token => token.kind === 'inline-flags');
  if (inlineFlags) {
    throw new PatternSyntaxError(
      `Inline flag directive '${inlineFlags.text}' in value pattern '${raw}' is not supported`,
      pattern,
      { index },
    );
  }

  const source = joinTokens(tokens);
  try {
    new RegExp(source, MATCHER_FLAGS);
  } catch (error) {
    throw new PatternSyntaxError(`Invalid value pattern '${raw}'`, pattern, { index, cause: error });
  }

  ensureRegexSafe(source, tokens, pattern, index, options);

  return { source, tokens, captureCount: countCapturingGroups(tokens) };
}

/**
 * Value patterns stored on segments were validated when they were parsed,
 * so they only need tokenizing.
 */
export function tokenizeValuePattern(source: string): PreparedValuePattern {
  const tokens = tokenizeRegex(source);
  return { source, tokens, captureCount: countCapturingGroups(tokens) };
}

/**
 * Rewrites a value pattern so it can sit next to other value patterns in one
 * regex: numeric backreferences are shifted by `groupOffset` (the number of the
 * variable's own capture group) and named groups move into `namespace`.
 */
export function isolateValuePattern(prepared: PreparedValuePattern, groupOffset: number, namespace: string): string {
  let source = '';
  for (const token of prepared.tokens) {
    if (token.kind === 'backreference') {
      source += typeof token.group === 'number' ? `\\${token.group + groupOffset}` : `\\k<${namespace}${token.group}>`;
    } else if (token.kind === 'group-open' && token.name !== undefined) {
      source += `(?<${namespace}${token.name}>`;
    } else {
      source += token.text;
    }
  }
  return `(?:${source})`;
}

function stripAnchors(
  tokens: RegexToken[],
  raw: string,
  pattern: string,
  index: number | undefined,
  options: NormalizedPatternOptions,
): RegexToken[] {
  let start = 0;
  let end = tokens.length;
  while (start < end && isAnchor(tokens[start], '^')) {
    start++;
  }
  while (end > start && isAnchor(tokens[end - 1], '$')) {
    end--;
  }
  if (start === 0 && end === tokens.length) {
    return tokens;
  }

  const message = `Value pattern '${raw}' declares '^' or '$' anchors; matchers are anchored automatically, so the anchors are stripped`;
  if (options.regexAnchorPolicy === 'error') {
    throw new PatternSyntaxError(message, pattern, { index });
  }
  if (options.regexAnchorPolicy === 'warn') {
    logger.warn(message, { pattern });
  }

  const stripped = tokens.slice(start, end);
  return stripped.length ? stripped : tokenizeRegex('.*');
}

function isAnchor(token: RegexToken | undefined, anchor: '^' | '$'): boolean {
  return token?.kind === 'char' && token.text === anchor;
}

function ensureRegexSafe(
  source: string,
  tokens: readonly RegexToken[],
  pattern: string,
  index: number | undefined,
  options: NormalizedPatternOptions,
): void {
  const safety = options.regexSafety;
  if (safety.mode === 'off') {
    return;
  }
  const result = assessRegexSafety(source, tokens, safety);
  if (!result.safe) {
    const reason = result.reason ? ` (${result.reason})` : '';
    const message = `Unsafe value pattern '${source}'${reason}`;
    if (safety.mode === 'warn') {
      logger.warn(message, { pattern });
    } else {
      throw new PatternSyntaxError(message, pattern, { index });
    }
  }
  if (!safety.validator) {
    return;
  }
  try {
    safety.validator(source);
  } catch (error) {
    throw new PatternSyntaxError(`Value pattern '${source}' was rejected by the configured validator`, pattern, { index, cause: error });
  }
}
