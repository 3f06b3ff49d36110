import { describe, expect, it } from 'vitest';

import { PatternSyntaxError, RouterError } from '../../src/errors';
import { compareSpecificity, SAME_PATHS_COMPARATOR, SPECIFICITY_COMPARATOR } from '../../src/pattern/comparators';
import { compilePattern, PathPattern } from '../../src/pattern/path-pattern';
import { parsePattern } from '../../src/pattern/pattern-parser';
import type { Segment } from '../../src/types';

function variablesOf(pattern: string, path: string): Record<string, string> | null {
  const result = PathPattern.compile(pattern).match(path);
  return result.matched ? { ...result.variables } : null;
}

describe('PathPattern :: match', () => {
  it('should match a literal pattern only against the same text', () => {
    const pattern = PathPattern.compile('/about');

    expect(pattern.match('/about').matched).toBe(true);
    expect(pattern.match('/About').matched).toBe(false);
    expect(pattern.match('/about/').matched).toBe(false);
  });

  it('should bind greedy default variables around tighter ones', () => {
    expect(variablesOf('/{x}/{y:[a-z]+}/{z:.*}', '/foo/bar/baz/qux')).toEqual({ x: 'foo/bar', y: 'baz', z: 'qux' });
  });

  it('should let the first greedy variable take as much as possible', () => {
    expect(variablesOf('{a}.{b:.+}', '1.2.3')).toEqual({ a: '1.2', b: '3' });
  });

  it('should split adjacent variables by their value patterns', () => {
    expect(variablesOf('{a:[0-9]+}{b:[a-z]+}', '12ab')).toEqual({ a: '12', b: 'ab' });
  });

  it('should leave the rest to a default variable after a fixed-width one', () => {
    expect(variablesOf('{a:[a-z]{2}}{b}', 'abcd')).toEqual({ a: 'ab', b: 'cd' });
  });

  it('should let a default variable cross line terminators', () => {
    expect(variablesOf('{a}', 'a\nb')).toEqual({ a: 'a\nb' });
    expect(variablesOf('{a}', '\r')).toEqual({ a: '\r' });
    expect(variablesOf('{a}', 'x\u2028y')).toEqual({ a: 'x\u2028y' });
  });

  it('should resolve group numbers past the inner groups of earlier variables', () => {
    expect(variablesOf('/{a:(x)(y)}/{b:(z)\\1}', '/xy/zz')).toEqual({ a: 'xy', b: 'zz' });
    expect(variablesOf('/{a:(x)(y)}/{b:(z)\\1}', '/xy/zx')).toBeNull();
  });

  it('should keep same-named inner groups of different variables apart', () => {
    const pattern = '{a:(?<d>[0-9])\\k<d>}-{b:(?<d>[a-z])\\k<d>}';

    expect(variablesOf(pattern, '11-bb')).toEqual({ a: '11', b: 'bb' });
    expect(variablesOf(pattern, '12-bb')).toBeNull();
  });

  it('should escape regex metacharacters in literal text', () => {
    expect(variablesOf('/a.b/{x}', '/a.b/c')).toEqual({ x: 'c' });
    expect(variablesOf('/a.b/{x}', '/aXb/c')).toBeNull();
    expect(variablesOf('/(v1)+/{x}', '/(v1)+/c')).toEqual({ x: 'c' });
  });

  it('should require a non-empty value for default variables', () => {
    expect(variablesOf('{x}', '')).toBeNull();
    expect(variablesOf('/{x}', '/')).toBeNull();
  });

  it('should match the empty path with the empty pattern or a match-anything variable', () => {
    expect(PathPattern.compile('').match('').matched).toBe(true);
    expect(PathPattern.compile('').match('/').matched).toBe(false);
    expect(variablesOf('{path:.*}', '')).toEqual({ path: '' });
  });

  it('should honour a custom default value pattern', () => {
    const pattern = PathPattern.compile('/{seg}', { defaultValuePattern: '[^/]+' });

    expect(pattern.match('/a/b').matched).toBe(false);
    expect({ ...pattern.match('/a').variables }).toEqual({ seg: 'a' });
  });

  it('should return frozen variables without a prototype', () => {
    const { variables } = PathPattern.compile('/{x}').match('/toString');

    expect(Object.getPrototypeOf(variables)).toBeNull();
    expect(Object.isFrozen(variables)).toBe(true);
    expect(variables.x).toBe('toString');
  });

  it('should report no variables on a failed match', () => {
    const result = PathPattern.compile('/{x}').match('x');

    expect(result.matched).toBe(false);
    expect(Object.keys(result.variables)).toEqual([]);
  });
});

describe('PathPattern :: properties', () => {
  it('should expose the literal prefix, specificity and variable names', () => {
    const pattern = PathPattern.compile('/a/{x}/{y:[0-9]+}.json');

    expect(pattern.literalPrefix).toBe('/a/');
    expect(pattern.isLiteral).toBe(false);
    expect(pattern.literalLength).toBe(9);
    expect(pattern.variableNames).toEqual(['x', 'y']);
    expect(pattern.variableCount).toBe(2);
    expect(pattern.specificity).toEqual({ variableCount: 2, literalLength: 9 });
  });

  it('should count an escaped brace as one literal character', () => {
    const pattern = PathPattern.compile('\\{{x}');

    expect(pattern.literalLength).toBe(1);
    expect(pattern.literalPrefix).toBe('{');
  });

  it('should give structurally equal patterns the same skeleton', () => {
    expect(PathPattern.compile('/a/{b}').skeleton).toBe(PathPattern.compile('/a/{c}').skeleton);
    expect(PathPattern.compile('/a/{b}').skeleton).not.toBe(PathPattern.compile('/a/{b:[0-9]+}').skeleton);
    expect(PathPattern.compile('/a/{b}').skeleton).not.toBe(PathPattern.compile('/a/{b}/').skeleton);
  });

  it('should compare patterns by source', () => {
    expect(PathPattern.compile('/a/{b}').equals(PathPattern.compile('/a/{b}'))).toBe(true);
    expect(PathPattern.compile('/a/{b}').equals(PathPattern.compile('/a/{c}'))).toBe(false);
    expect(String(PathPattern.compile('/a/{b}'))).toBe('/a/{b}');
  });

  it('should be immutable', () => {
    expect(Object.isFrozen(PathPattern.compile('/a/{b}'))).toBe(true);
  });
});

describe('PathPattern :: compilePattern', () => {
  it('should render the source from parsed segments', () => {
    const pattern = compilePattern(parsePattern('/files/\\{raw}/{name:[a-z]+}'));

    expect(pattern.source).toBe('/files/\\{raw}/{name:[a-z]+}');
    expect({ ...pattern.match('/files/{raw}/doc').variables }).toEqual({ name: 'doc' });
  });

  it('should keep a given source', () => {
    expect(compilePattern(parsePattern('/x'), 'home').toString()).toBe('home');
  });

  it('should reject segments that repeat a variable name', () => {
    const segments = [
      { kind: 'variable', name: 'a', valuePattern: '[\\s\\S]+', isDefault: true },
      { kind: 'literal', text: '/' },
      { kind: 'variable', name: 'a', valuePattern: '[\\s\\S]+', isDefault: true },
    ] as const;

    expect(() => compilePattern(segments)).toThrow(PatternSyntaxError);
  });

  it('should reject segments whose variable name breaks the name grammar', () => {
    const segments: Segment[] = [{ kind: 'variable', name: 'a-b', valuePattern: 'x', isDefault: false }];

    expect(() => compilePattern(segments)).toThrow(PatternSyntaxError);
    expect(() => compilePattern(segments)).toThrow("Invalid variable name 'a-b'");
  });

  it('should reject segments with an empty value pattern', () => {
    const segments: Segment[] = [{ kind: 'variable', name: 'e', valuePattern: '', isDefault: false }];

    expect(() => compilePattern(segments)).toThrow("Variable 'e' declares an empty value pattern");
  });

  it('should reject segments with an inline flag directive', () => {
    const segments: Segment[] = [{ kind: 'variable', name: 'a', valuePattern: '(?i)x', isDefault: false }];

    expect(() => compilePattern(segments)).toThrow("Inline flag directive '(?i)'");
  });

  it('should strip anchors from segment value patterns', () => {
    const segments: Segment[] = [
      { kind: 'literal', text: '/' },
      { kind: 'variable', name: 'a', valuePattern: '^x$', isDefault: false },
    ];
    const pattern = compilePattern(segments, undefined, { regexAnchorPolicy: 'silent' });

    expect(pattern.source).toBe('/{a:^x$}');
    expect(pattern.segments[1]).toEqual({ kind: 'variable', name: 'a', valuePattern: 'x', isDefault: false });
    expect({ ...pattern.match('/x').variables }).toEqual({ a: 'x' });
  });

  it('should reject anchored segment value patterns under the error policy', () => {
    const segments: Segment[] = [{ kind: 'variable', name: 'a', valuePattern: '^x$', isDefault: false }];

    expect(() => compilePattern(segments, undefined, { regexAnchorPolicy: 'error' })).toThrow(PatternSyntaxError);
  });

  it('should reject an empty default value pattern option', () => {
    expect(() => PathPattern.compile('{x}', { defaultValuePattern: '' })).toThrow(RouterError);
    expect(() => PathPattern.compile('{x}', { defaultValuePattern: '' })).toThrow('defaultValuePattern must not be empty');
  });
});

describe('PathPattern :: comparators', () => {
  it('should order fewer variables first, then longer literals', () => {
    const patterns = ['/{x}/{y}', '/a/{x}/', '/abc/{x}', '/about'].map(source => PathPattern.compile(source));

    expect(patterns.sort(SPECIFICITY_COMPARATOR).map(String)).toEqual(['/about', '/abc/{x}', '/a/{x}/', '/{x}/{y}']);
  });

  it('should leave equally specific patterns tied', () => {
    expect(compareSpecificity(PathPattern.compile('help.{ext}'), PathPattern.compile('{name}.txt'))).toBeLessThan(0);
    expect(compareSpecificity(PathPattern.compile('/a/{x}'), PathPattern.compile('/b/{y}'))).toBe(0);
  });

  it('should treat structural duplicates as equal', () => {
    expect(SAME_PATHS_COMPARATOR(PathPattern.compile('/a/{b}'), PathPattern.compile('/a/{c}'))).toBe(0);
    expect(SAME_PATHS_COMPARATOR(PathPattern.compile('/a/{b}'), PathPattern.compile('/b/{b}'))).not.toBe(0);
  });
});
