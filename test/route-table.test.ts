import { describe, expect, it } from 'vitest';
import { PathPattern } from '../src/route/PathPattern.js';
import { RouteTable } from '../src/route/RouteTable.js';
import { WILDCARD, type RouteEntry } from '../src/route/types.js';

type Entry = RouteEntry<string, string>;

function entry(method: string, tokens: string[], name: string): Entry {
  return { pattern: new PathPattern(method, tokens), handler: () => name };
}

async function resolve(table: RouteTable<string, string>, method: string, path: string) {
  const match = table.match(method, path);
  if (!match) return null;
  return { name: await match.handler(match.params, 'req'), params: match.params };
}

describe('RouteTable', () => {
  it('partitions entries by method and segment count', () => {
    const table = new RouteTable([
      entry('GET', ['a'], 'a'),
      entry('GET', ['b'], 'b'),
      entry('GET', ['a', 'b'], 'ab'),
      entry('POST', ['a'], 'post-a'),
    ]);

    expect(table.size).toBe(4);
    expect(table.bucketCount).toBe(3);
  });

  it('keeps registration order in entries()', () => {
    const entries = [entry('GET', ['x'], 'x'), entry('POST', [], 'root'), entry('GET', ['y'], 'y')];
    const table = new RouteTable(entries);

    expect(table.entries()).toEqual(entries);
    expect(Object.isFrozen(table.entries())).toBe(true);
  });

  it('is unaffected by later changes to the source list', () => {
    const entries = [entry('GET', ['x'], 'x')];
    const table = new RouteTable(entries);
    entries.push(entry('GET', ['y'], 'y'));

    expect(table.size).toBe(1);
    expect(table.match('GET', '/y')).toBeNull();
  });

  it('captures wildcard components left to right', async () => {
    const table = new RouteTable([
      entry('POST', ['foo', WILDCARD, 'bar', WILDCARD, 'baz'], 'multi'),
    ]);

    expect(await resolve(table, 'POST', '/foo/1/bar/2/baz')).toEqual({
      name: 'multi',
      params: ['1', '2'],
    });
  });

  it('compares literals case-sensitively', () => {
    const table = new RouteTable([entry('GET', ['Foo'], 'foo')]);

    expect(table.match('GET', '/foo')).toBeNull();
    expect(table.match('GET', '/Foo')).not.toBeNull();
  });

  it('matches the inbound method case-insensitively', async () => {
    const table = new RouteTable([entry('GET', ['a'], 'a')]);

    expect(await resolve(table, 'get', '/a')).toEqual({ name: 'a', params: [] });
  });

  it('reports no match when no bucket has the shape', () => {
    const table = new RouteTable([entry('GET', ['a', 'b'], 'ab')]);

    expect(table.match('GET', '/a')).toBeNull();
    expect(table.match('GET', '/a/b/c')).toBeNull();
    expect(table.match('PUT', '/a/b')).toBeNull();
  });

  it('reports no match when no entry in the bucket fits', () => {
    const table = new RouteTable([entry('GET', ['a', WILDCARD], 'a'), entry('GET', ['b', 'c'], 'bc')]);

    expect(table.match('GET', '/b/d')).toBeNull();
  });

  it('prefers the earlier registration over a more specific later one', async () => {
    const table = new RouteTable([
      entry('GET', [WILDCARD, WILDCARD], 'generic'),
      entry('GET', ['foo', WILDCARD], 'specific'),
    ]);

    expect(await resolve(table, 'GET', '/foo/1')).toEqual({ name: 'generic', params: ['foo', '1'] });
  });

  it('does not leak captures from a partially matching entry', async () => {
    const table = new RouteTable([
      entry('GET', [WILDCARD, 'x'], 'first'),
      entry('GET', ['a', WILDCARD], 'second'),
    ]);

    expect(await resolve(table, 'GET', '/a/y')).toEqual({ name: 'second', params: ['y'] });
  });
});
