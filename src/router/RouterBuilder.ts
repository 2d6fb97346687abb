import logger from '../logger.js';
import { PathPattern, type PatternInput } from '../route/PathPattern.js';
import { RouteTable } from '../route/RouteTable.js';
import type { NotFoundHandler, RouteEntry, RouteHandler } from '../route/types.js';
import { Router } from './Router.js';

export interface RouterBuilderOptions<TRequest, TResponse> {
  /** Produces the response for requests that match no route. */
  notFound: NotFoundHandler<TRequest, TResponse>;
}

/**
 * Collects routes and compiles them into a {@link Router}.
 *
 * Registration order decides precedence: when two patterns of the same method
 * and length both match a path, the one registered first wins, however
 * specific the later one is.
 *
 * @example
 * ```typescript
 * const router = new RouterBuilder<Request, Response>({ notFound: () => notFoundResponse })
 *   .register('GET', [], home)
 *   .register('POST', ['foo', WILDCARD, 'bar', WILDCARD, 'baz'], update)
 *   .register('GET', '/_', show)
 *   .build();
 *
 * await router.dispatch('POST', '/foo/1/bar/2/baz', req); // update(['1', '2'], req)
 * ```
 */
export class RouterBuilder<TRequest, TResponse> {
  private readonly entries: RouteEntry<TRequest, TResponse>[] = [];
  private readonly notFound: NotFoundHandler<TRequest, TResponse>;

  constructor(options: RouterBuilderOptions<TRequest, TResponse>) {
    this.notFound = options.notFound;
  }

  /**
   * @throws RouteConstructionError if the method or pattern is malformed
   */
  register(
    method: string,
    pattern: PatternInput,
    handler: RouteHandler<TRequest, TResponse>
  ): this {
    const path = new PathPattern(method, pattern);
    this.entries.push({ pattern: path, handler });
    logger.debug(`registered route: ${path}`);
    return this;
  }

  /**
   * Compiles the routes registered so far into a new {@link Router}, which
   * has no registration methods and cannot be extended.
   *
   * The builder itself stays reusable: it keeps its routes, accepts further
   * `register` calls and can be built again. Those later registrations only
   * reach routers built after them, never a router returned earlier.
   */
  build(): Router<TRequest, TResponse> {
    this.warnShadowed();
    const table = new RouteTable(this.entries);
    logger.info('router built', { routes: table.size, buckets: table.bucketCount });
    return new Router(table, this.notFound);
  }

  private warnShadowed(): void {
    this.entries.forEach((entry, i) => {
      const first = this.entries.findIndex((other) => other.pattern.equals(entry.pattern));
      if (first < i) {
        logger.warn(`route ${entry.pattern} is shadowed by an earlier identical route`, {
          position: i,
          shadowedBy: first,
        });
      }
    });
  }
}
