import { describe, expect, it } from 'vitest';

import { routerBuilder } from '../../../src/router/router-builder';

function overlappingRouter(count: number) {
  const builder = routerBuilder<number>();
  for (let i = 1; i <= count; i++) {
    builder.add('a'.repeat(i) + '{suffix:.*}', i);
  }
  return builder.build();
}

describe('PathRouter :: scale', () => {
  it.each<[number, string]>([
    [63, 'flat'],
    [64, 'trie'],
    [65, 'trie'],
    [1000, 'trie'],
  ])('should route %i overlapping endpoints with a %s index', (count, kind) => {
    const router = overlappingRouter(count);

    expect(router.toLog()).toMatchObject({ prefixEndpoints: count, candidateIndex: kind });

    const best = router.find('a'.repeat(count));
    expect(best?.value).toBe(count);
    expect({ ...best?.variables }).toEqual({ suffix: '' });

    expect({ ...router.find('a'.repeat(10) + 'b')?.variables }).toEqual({ suffix: 'b' });
    expect(router.find('a'.repeat(10) + 'b')?.value).toBe(10);
    expect(router.find('b')).toBeNull();

    const all = [...router.findAll('a'.repeat(count))].map(endpoint => endpoint.value);
    expect(all).toHaveLength(count);
    expect(all[0]).toBe(count);
    expect(all[count - 1]).toBe(1);
  });

  it('should report the depth of a deep trie', () => {
    expect(overlappingRouter(1000).toLog()).toMatchObject({ nodes: 1001, depth: 1000 });
  });

  it('should route many literal endpoints through the exact table', () => {
    const builder = routerBuilder<number>();
    for (let i = 0; i < 2000; i++) {
      builder.add(`/static/${i}`, i);
    }
    const router = builder.build();

    expect(router.find('/static/1999')?.value).toBe(1999);
    expect(router.find('/static/2000')).toBeNull();
    expect(router.toLog()).toMatchObject({ exactEndpoints: 2000, prefixEndpoints: 0 });
  });
});
