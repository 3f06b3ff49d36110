import { afterEach, describe, expect, it, vi } from 'vitest';

import { PathPattern } from '../../../src/pattern/path-pattern';
import { routerBuilder } from '../../../src/router/router-builder';
import type { Endpoint } from '../../../src/types';

const byValueDescending = (a: Endpoint<number>, b: Endpoint<number>): number => b.value - a.value;

function helpRoutes() {
  return routerBuilder<number>().add('help.txt', 1).add('help.{ext}', 2).add('{name}.txt', 3).add('{name}.{ext}', 4);
}

describe('PathRouter :: ordering', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should list matches by specificity', () => {
    const router = helpRoutes().build();

    expect([...router.findAll('help.txt')].map(endpoint => endpoint.value)).toEqual([1, 2, 3, 4]);
  });

  it('should keep the exact match first under a custom comparator', () => {
    const router = helpRoutes().build(byValueDescending);

    expect([...router.findAll('help.txt')].map(endpoint => endpoint.value)).toEqual([1, 4, 3, 2]);
    expect(router.find('help.txt')?.value).toBe(1);
    expect(router.find('readme.txt')?.value).toBe(4);
  });

  it('should bind variables per endpoint', () => {
    const router = helpRoutes().build();

    expect([...router.findAll('help.txt')].map(endpoint => ({ ...endpoint.variables }))).toEqual([
      {},
      { ext: 'txt' },
      { name: 'help' },
      { name: 'help', ext: 'txt' },
    ]);
  });

  it('should break comparator ties by registration order', () => {
    const router = routerBuilder<number>().add('{x}', 1).add('/{x}', 2).add('/a/{x}', 3).build(() => 0);

    expect([...router.findAll('/a/b')].map(endpoint => endpoint.value)).toEqual([1, 2, 3]);
  });

  it('should let a comparator reorder equally specific endpoints', () => {
    const builder = routerBuilder<number>().add('{letter:[a-zA-Z]}x', 1).add('{letters:[a-z]{2}}', 2);

    expect(builder.build().find('ax')?.value).toBe(1);
    expect(builder.build(byValueDescending).find('ax')?.value).toBe(2);
    expect(builder.build(byValueDescending).find('Ax')?.value).toBe(1);
  });

  it('should evaluate candidates only as the iterator advances', () => {
    const router = routerBuilder<number>().add('/a/{x}', 1).add('/{x}', 2).add('{x}', 3).build();
    const match = vi.spyOn(PathPattern.prototype, 'match');

    const matches = router.findAll('/a/b');
    expect(matches.next().value?.value).toBe(1);
    expect(match).toHaveBeenCalledTimes(1);

    expect([...matches].map(endpoint => endpoint.value)).toEqual([2, 3]);
    expect(match).toHaveBeenCalledTimes(3);
  });

  it('should return frozen matches', () => {
    const found = helpRoutes().build().find('readme.md');

    expect(found?.value).toBe(4);
    expect(Object.isFrozen(found)).toBe(true);
    expect(Object.isFrozen(found?.variables)).toBe(true);
  });
});

describe('PathRouterBuilder :: build', () => {
  it('should snapshot the endpoints added so far', () => {
    const builder = routerBuilder<string>().add('/a/{x}', 'a');
    const first = builder.build();
    builder.add('/b/{x}', 'b');
    const second = builder.build();

    expect(first.find('/b/1')).toBeNull();
    expect(second.find('/b/1')?.value).toBe('b');
    expect(first.size).toBe(1);
    expect(second.size).toBe(2);
  });

  it('should accept precompiled patterns', () => {
    const router = routerBuilder<string>().add(PathPattern.compile('/u/{id:[0-9]+}'), 'user').build();

    expect({ ...router.find('/u/42')?.variables }).toEqual({ id: '42' });
    expect(router.find('/u/me')).toBeNull();
  });
});
