import { splitPath } from './pathSplitter.js';
import type { RouteEntry, RouteMatch } from './types.js';

type Bucket<TRequest, TResponse> = readonly RouteEntry<TRequest, TResponse>[];

function bucketKey(method: string, segmentCount: number): string {
  return `${method} ${segmentCount}`;
}

/**
 * Read-only route collection, bucketed by method and segment count so that a
 * lookup only scans the patterns that share the inbound request's shape.
 * Within a bucket entries keep their registration order, and the first entry
 * that matches wins.
 */
export class RouteTable<TRequest, TResponse> {
  private readonly buckets: ReadonlyMap<string, Bucket<TRequest, TResponse>>;
  private readonly all: Bucket<TRequest, TResponse>;

  constructor(entries: Iterable<RouteEntry<TRequest, TResponse>>) {
    const buckets = new Map<string, RouteEntry<TRequest, TResponse>[]>();
    const all: RouteEntry<TRequest, TResponse>[] = [];

    for (const entry of entries) {
      const key = bucketKey(entry.pattern.method, entry.pattern.length);
      let bucket = buckets.get(key);
      if (!bucket) {
        bucket = [];
        buckets.set(key, bucket);
      }
      bucket.push(entry);
      all.push(entry);
    }

    for (const bucket of buckets.values()) {
      Object.freeze(bucket);
    }
    this.buckets = buckets;
    this.all = Object.freeze(all);
  }

  get size(): number {
    return this.all.length;
  }

  get bucketCount(): number {
    return this.buckets.size;
  }

  /** All entries in registration order. */
  entries(): Bucket<TRequest, TResponse> {
    return this.all;
  }

  match(method: string, path: string): RouteMatch<TRequest, TResponse> | null {
    const components = splitPath(path);
    const bucket = this.buckets.get(bucketKey(method.toUpperCase(), components.length));
    if (!bucket) return null;

    for (const entry of bucket) {
      const params: string[] = [];
      const matched = entry.pattern.segments.every((segment, i) => {
        if (segment.kind === 'wildcard') {
          params.push(components[i]);
          return true;
        }
        return segment.value === components[i];
      });
      if (matched) {
        return { handler: entry.handler, params };
      }
    }
    return null;
  }
}
