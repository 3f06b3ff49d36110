import type { PathPattern } from './path-pattern';

/**
 * Negative when `a` is more specific than `b`: fewer variables first, then
 * more literal characters. Zero leaves the order to the caller.
 */
export function compareSpecificity(a: PathPattern, b: PathPattern): number {
  const byVariables = a.specificity.variableCount - b.specificity.variableCount;
  if (byVariables !== 0) {
    return byVariables;
  }
  return b.specificity.literalLength - a.specificity.literalLength;
}

export const SPECIFICITY_COMPARATOR = (a: PathPattern, b: PathPattern): number => compareSpecificity(a, b);

/**
 * Orders by skeleton; zero exactly when the patterns match the same paths
 * with variables at the same positions.
 */
export const SAME_PATHS_COMPARATOR = (a: PathPattern, b: PathPattern): number => {
  if (a.skeleton === b.skeleton) {
    return 0;
  }
  return a.skeleton < b.skeleton ? -1 : 1;
};
