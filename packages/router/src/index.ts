export * from './errors';
export * from './types';
export { PathPattern, compilePattern } from './pattern/path-pattern';
export { parsePattern, formatPattern } from './pattern/pattern-parser';
export { compareSpecificity, SPECIFICITY_COMPARATOR, SAME_PATHS_COMPARATOR } from './pattern/comparators';
export { PathRouter } from './router/path-router';
export { PathRouterBuilder, routerBuilder, specificityOrder } from './router/router-builder';
export { normalizeRouterOptions, DEFAULT_FLAT_SCAN_THRESHOLD } from './router/router-options';
export type { NormalizedRouterOptions } from './router/router-options';
