import { RouterError } from '../errors';
import type { PatternOptions, RegexAnchorPolicy, RegexSafetyOptions } from '../types';

export type NormalizedRegexSafetyOptions = {
  mode: 'error' | 'warn' | 'off';
  maxLength: number;
  forbidBacktrackingTokens: boolean;
  forbidBackreferences: boolean;
  validator?: (pattern: string) => void;
};

export type NormalizedPatternOptions = {
  defaultValuePattern: string;
  regexAnchorPolicy: RegexAnchorPolicy;
  regexSafety: NormalizedRegexSafetyOptions;
};

// Any character, line terminators included
export const DEFAULT_VALUE_PATTERN = '[\\s\\S]+';
export const MATCHER_FLAGS = 'u';

const DEFAULT_REGEX_MAX_LENGTH = 256;
const REGEX_MAX_LENGTH_LIMIT = 65535;

export const DEFAULT_REGEX_SAFETY: NormalizedRegexSafetyOptions = {
  mode: 'warn',
  maxLength: DEFAULT_REGEX_MAX_LENGTH,
  forbidBacktrackingTokens: true,
  forbidBackreferences: false,
};

export function normalizeRegexSafety(input?: RegexSafetyOptions): NormalizedRegexSafetyOptions {
  return {
    mode: input?.mode ?? DEFAULT_REGEX_SAFETY.mode,
    maxLength: sanitizeMaxLength(input?.maxLength),
    forbidBacktrackingTokens: input?.forbidBacktrackingTokens ?? DEFAULT_REGEX_SAFETY.forbidBacktrackingTokens,
    forbidBackreferences: input?.forbidBackreferences ?? DEFAULT_REGEX_SAFETY.forbidBackreferences,
    validator: input?.validator,
  };
}

export function normalizePatternOptions(input?: PatternOptions): NormalizedPatternOptions {
  return {
    defaultValuePattern: sanitizeDefaultValuePattern(input?.defaultValuePattern),
    regexAnchorPolicy: input?.regexAnchorPolicy ?? 'warn',
    regexSafety: normalizeRegexSafety(input?.regexSafety),
  };
}

function sanitizeMaxLength(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return DEFAULT_REGEX_MAX_LENGTH;
  }
  if (value > REGEX_MAX_LENGTH_LIMIT) {
    return REGEX_MAX_LENGTH_LIMIT;
  }
  return Math.floor(value);
}

function sanitizeDefaultValuePattern(value: string | undefined): string {
  if (value === undefined) {
    return DEFAULT_VALUE_PATTERN;
  }
  if (!value.length) {
    throw new RouterError('defaultValuePattern must not be empty');
  }
  try {
    new RegExp(value, MATCHER_FLAGS);
  } catch (error) {
    throw new RouterError(`defaultValuePattern '${value}' is not a valid regular expression`, { cause: error });
  }
  return value;
}
