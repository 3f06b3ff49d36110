import { RouterError } from './router.error';

/**
 * Thrown while parsing or registering a path pattern that is not well formed.
 * Never thrown while matching.
 */
export class PatternSyntaxError extends RouterError {
  readonly pattern: string;
  readonly index?: number;

  constructor(message: string, pattern: string, details: { index?: number; cause?: unknown } = {}) {
    super(`${message} in path pattern '${pattern}'`, details.cause === undefined ? undefined : { cause: details.cause });

    this.name = 'PatternSyntaxError';
    this.pattern = pattern;
    this.index = details.index;
  }
}
