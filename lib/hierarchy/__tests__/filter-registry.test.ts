import { describe, it, expect } from 'vitest';
import { HierarchyError } from '@/lib/errors/hierarchy-error';
import { HierarchyFilterRegistry, isFilterKey } from '../filter-registry';
import { GLOBAL_FILTER_KEY, type FilterKey } from '../types';

describe('HierarchyFilterRegistry', () => {
  it('is the identity when nothing is registered', () => {
    const registry = new HierarchyFilterRegistry();
    expect(registry.apply('single', ['single.twig'])).toEqual(['single.twig']);
  });

  it('does not mutate the input list', () => {
    const registry = new HierarchyFilterRegistry();
    registry.add('page', (candidates) => {
      const copy = [...candidates];
      copy.reverse();
      return copy;
    });
    const input = ['a.twig', 'b.twig'];

    expect(registry.apply('page', input)).toEqual(['b.twig', 'a.twig']);
    expect(input).toEqual(['a.twig', 'b.twig']);
  });

  it('applies filters in registration order', () => {
    const registry = new HierarchyFilterRegistry();
    registry.add(GLOBAL_FILTER_KEY, (candidates) => ['custom.twig', ...candidates]);
    registry.add(GLOBAL_FILTER_KEY, (candidates) => candidates.slice(1));

    expect(registry.apply(GLOBAL_FILTER_KEY, ['index.twig'])).toEqual(['index.twig']);
  });

  it('keeps filters of different keys apart', () => {
    const registry = new HierarchyFilterRegistry();
    registry.add('tag', () => ['tag-special.twig']);

    expect(registry.apply('category', ['category.twig'])).toEqual(['category.twig']);
    expect(registry.apply('tag', ['tag.twig'])).toEqual(['tag-special.twig']);
  });

  it('removes a registration through its disposer', () => {
    const registry = new HierarchyFilterRegistry();
    const dispose = registry.add('home', () => []);
    expect(registry.count('home')).toBe(1);

    dispose();

    expect(registry.has('home')).toBe(false);
    expect(registry.apply('home', ['home.twig'])).toEqual(['home.twig']);
  });

  it('clears one key or all keys', () => {
    const registry = new HierarchyFilterRegistry();
    registry.add('home', (c) => [...c]);
    registry.add('date', (c) => [...c]);

    registry.clear('home');
    expect(registry.has('home')).toBe(false);
    expect(registry.has('date')).toBe(true);

    registry.clear();
    expect(registry.count('date')).toBe(0);
  });

  it('rejects unknown keys', () => {
    const registry = new HierarchyFilterRegistry();
    const key: string = 'paged';

    expect(isFilterKey(key)).toBe(false);
    expect(isFilterKey('front-page')).toBe(true);
    expect(() => registry.add(key as FilterKey, (c) => [...c])).toThrow(HierarchyError);
  });

  it('rejects filters that do not return a list', () => {
    const registry = new HierarchyFilterRegistry();
    const broken = (() => 'single.twig') as unknown as (c: readonly string[]) => string[];
    registry.add('single', broken);

    expect(() => registry.apply('single', ['single.twig'])).toThrow(
      'Filter registered under "single" did not return a candidate list'
    );
  });
});
