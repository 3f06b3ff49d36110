import { PatternSyntaxError } from '../errors';
import type { PatternOptions, Segment, VariableSegment } from '../types';

import { normalizePatternOptions, type NormalizedPatternOptions } from './pattern-options';
import { prepareValuePattern } from './value-pattern';

// Letters, '$' and '_', then letters, decimal digits, '$' and '_'
const VARIABLE_NAME = /^[$_\p{L}][$_\p{L}\p{Nd}]*$/u;

/**
 * Parses a path pattern into literal and variable segments.
 *
 * `{name}` binds the configured default value pattern, `{name:regex}` binds
 * text matching `regex`, and `\{` is a literal `{`. Adjacent literal text is
 * merged into one segment.
 *
 * @throws PatternSyntaxError
 */
export function parsePattern(pattern: string, options?: PatternOptions): Segment[] {
  const normalized = normalizePatternOptions(options);
  const segments: Segment[] = [];
  const names = new Set<string>();
  let literal = '';
  let consumed = 0;

  const flushLiteral = (): void => {
    if (literal.length) {
      segments.push({ kind: 'literal', text: literal });
      literal = '';
    }
  };

  while (consumed < pattern.length) {
    const from = pattern.indexOf('{', consumed);

    if (from === -1) {
      literal += pattern.slice(consumed);
      break;
    }

    if (from > consumed && pattern.charAt(from - 1) === '\\') {
      literal += pattern.slice(consumed, from - 1) + '{';
      consumed = from + 1;
      continue;
    }

    literal += pattern.slice(consumed, from);
    flushLiteral();

    const to = findDeclarationEnd(pattern, from);
    const variable = parseDeclaration(pattern, from, to, normalized);
    claimName(names, variable.name, pattern, from);
    segments.push(variable);
    consumed = to;
  }

  flushLiteral();
  return segments;
}

/**
 * Checks segments built outside the parser the way `parsePattern` checks a
 * pattern string, and normalizes their value patterns.
 *
 * @param pattern the pattern string rendered from the segments, for error messages
 * @throws PatternSyntaxError
 */
export function validateSegments(
  segments: readonly Segment[],
  pattern: string,
  options: NormalizedPatternOptions,
): Segment[] {
  const names = new Set<string>();
  return segments.map(segment => {
    if (segment.kind === 'literal') {
      return segment;
    }
    claimName(names, segment.name, pattern, undefined);
    return declareVariable(segment.name, segment.valuePattern, segment.isDefault, pattern, undefined, options);
  });
}

/**
 * Returns the index after the '}' closing the declaration opened at `from`.
 * Braces of quantifiers such as `{2}` nest; a backslash skips one character.
 */
function findDeclarationEnd(pattern: string, from: number): number {
  let depth = 0;

  for (let i = from + 1; i < pattern.length; i++) {
    switch (pattern.charAt(i)) {
      case '}':
        if (depth === 0) {
          return i + 1;
        }
        depth--;
        break;
      case '{':
        depth++;
        break;
      case '\\':
        i++;
        break;
      default:
        break;
    }
  }

  throw new PatternSyntaxError(`Unclosed variable declaration starting at index ${from}`, pattern, { index: from });
}

function parseDeclaration(pattern: string, from: number, to: number, options: NormalizedPatternOptions): VariableSegment {
  const body = pattern.slice(from + 1, to - 1);
  const colon = body.indexOf(':');

  if (colon === -1) {
    return declareVariable(body, options.defaultValuePattern, true, pattern, from, options);
  }
  return declareVariable(body.slice(0, colon), body.slice(colon + 1), false, pattern, from, options);
}

function declareVariable(
  name: string,
  raw: string,
  isDefault: boolean,
  pattern: string,
  index: number | undefined,
  options: NormalizedPatternOptions,
): VariableSegment {
  if (!VARIABLE_NAME.test(name)) {
    throw new PatternSyntaxError(`Invalid variable name '${name}'`, pattern, { index });
  }
  if (!raw.length) {
    throw new PatternSyntaxError(`Variable '${name}' declares an empty value pattern`, pattern, { index });
  }
  if (isDefault && raw === options.defaultValuePattern) {
    return { kind: 'variable', name, valuePattern: raw, isDefault };
  }

  const prepared = prepareValuePattern(raw, pattern, index, options);
  return { kind: 'variable', name, valuePattern: prepared.source, isDefault };
}

function claimName(names: Set<string>, name: string, pattern: string, index: number | undefined): void {
  if (names.has(name)) {
    throw new PatternSyntaxError(`Duplicate variable name '${name}'`, pattern, { index });
  }
  names.add(name);
}

/**
 * Renders segments back into pattern syntax.
 */
export function formatPattern(segments: readonly Segment[]): string {
  let pattern = '';
  for (const segment of segments) {
    if (segment.kind === 'literal') {
      pattern += segment.text.replaceAll('{', '\\{');
    } else {
      pattern += segment.isDefault ? `{${segment.name}}` : `{${segment.name}:${segment.valuePattern}}`;
    }
  }
  return pattern;
}
