export type RegexToken =
  | { kind: 'char'; text: string }
  | { kind: 'escape'; text: string }
  | { kind: 'class'; text: string }
  | { kind: 'backreference'; text: string; group: number | string }
  | { kind: 'group-open'; text: string; capturing: boolean; name?: string }
  | { kind: 'group-close'; text: string }
  | { kind: 'inline-flags'; text: string }
  | { kind: 'quantifier'; text: string; unbounded: boolean };

const QUANTIFIER_BRACES = /^\{(\d+)(,(\d*))?\}\??/;
const INLINE_FLAGS = /^\(\?(?:[a-zA-Z]+(?:-[a-zA-Z]+)?|-[a-zA-Z]+)([:)])/;
const GROUP_NAME = /^\(\?<([^=!>][^>]*)>/;

/**
 * Splits a Unicode-mode regex source into the tokens the router cares about:
 * groups, backreferences, quantifiers and opaque atoms. Malformed input still
 * produces tokens; validity is checked separately by compiling the source.
 */
export function tokenizeRegex(source: string): RegexToken[] {
  const tokens: RegexToken[] = [];
  let i = 0;

  while (i < source.length) {
    const char = source.charAt(i);

    if (char === '\\') {
      const token = readEscape(source, i);
      tokens.push(token);
      i += token.text.length;
      continue;
    }

    if (char === '[') {
      const end = findClassEnd(source, i);
      tokens.push({ kind: 'class', text: source.slice(i, end) });
      i = end;
      continue;
    }

    if (char === '(') {
      const token = readGroupOpen(source.slice(i));
      tokens.push(token);
      i += token.text.length;
      continue;
    }

    if (char === ')') {
      tokens.push({ kind: 'group-close', text: char });
      i++;
      continue;
    }

    if (char === '*' || char === '+' || char === '?') {
      const lazy = source.charAt(i + 1) === '?';
      tokens.push({ kind: 'quantifier', text: lazy ? char + '?' : char, unbounded: char !== '?' });
      i += lazy ? 2 : 1;
      continue;
    }

    if (char === '{') {
      const braces = QUANTIFIER_BRACES.exec(source.slice(i));
      if (braces) {
        const unbounded = braces[2] !== undefined && braces[3] === '';
        tokens.push({ kind: 'quantifier', text: braces[0], unbounded });
        i += braces[0].length;
        continue;
      }
    }

    tokens.push({ kind: 'char', text: char });
    i++;
  }

  return tokens;
}

export function countCapturingGroups(tokens: readonly RegexToken[]): number {
  let count = 0;
  for (const token of tokens) {
    if (token.kind === 'group-open' && token.capturing) {
      count++;
    }
  }
  return count;
}

export function joinTokens(tokens: readonly RegexToken[]): string {
  let source = '';
  for (const token of tokens) {
    source += token.text;
  }
  return source;
}

function readEscape(source: string, start: number): RegexToken {
  const next = source.charAt(start + 1);

  if (next >= '1' && next <= '9') {
    let end = start + 2;
    while (end < source.length && isDigit(source.charCodeAt(end))) {
      end++;
    }
    const text = source.slice(start, end);
    return { kind: 'backreference', text, group: Number(text.slice(1)) };
  }

  if (next === 'k' && source.charAt(start + 2) === '<') {
    const close = source.indexOf('>', start + 3);
    if (close !== -1) {
      const text = source.slice(start, close + 1);
      return { kind: 'backreference', text, group: text.slice(3, -1) };
    }
  }

  // \p{...}, \P{...} and \u{...} carry braces that are not quantifiers
  if ((next === 'p' || next === 'P' || next === 'u') && source.charAt(start + 2) === '{') {
    const close = source.indexOf('}', start + 3);
    if (close !== -1) {
      return { kind: 'escape', text: source.slice(start, close + 1) };
    }
  }

  return { kind: 'escape', text: source.slice(start, start + 2) };
}

function findClassEnd(source: string, start: number): number {
  let i = start + 1;
  while (i < source.length) {
    const char = source.charAt(i);
    if (char === '\\') {
      i += 2;
      continue;
    }
    if (char === ']') {
      return i + 1;
    }
    i++;
  }
  return source.length;
}

function readGroupOpen(rest: string): RegexToken {
  if (rest.charAt(1) !== '?') {
    return { kind: 'group-open', text: '(', capturing: true };
  }

  const named = GROUP_NAME.exec(rest);
  if (named?.[1] !== undefined) {
    return { kind: 'group-open', text: named[0], capturing: true, name: named[1] };
  }

  const third = rest.charAt(2);
  if (third === ':' || third === '=' || third === '!') {
    return { kind: 'group-open', text: rest.slice(0, 3), capturing: false };
  }
  if (third === '<' && (rest.charAt(3) === '=' || rest.charAt(3) === '!')) {
    return { kind: 'group-open', text: rest.slice(0, 4), capturing: false };
  }

  const flags = INLINE_FLAGS.exec(rest);
  if (flags) {
    // (?i) applies to everything after it; (?i:...) is a scoped group
    return flags[1] === ')'
      ? { kind: 'inline-flags', text: flags[0] }
      : { kind: 'group-open', text: flags[0], capturing: false };
  }

  return { kind: 'group-open', text: '(', capturing: true };
}

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}
