import { RouterError } from './router.error';

export class DuplicateRouteError extends RouterError {
  readonly pattern: string;
  readonly existingPattern: string;

  constructor(pattern: string, existingPattern: string) {
    super(
      pattern === existingPattern
        ? `There is already an endpoint whose path pattern is '${pattern}'`
        : `There is already an endpoint whose path pattern is '${existingPattern}', which conflicts with '${pattern}'`,
    );

    this.name = 'DuplicateRouteError';
    this.pattern = pattern;
    this.existingPattern = existingPattern;
  }
}
