import type { RouteTable } from '../route/RouteTable.js';
import type { NotFoundHandler } from '../route/types.js';

/**
 * A built, immutable router. Instances come from `RouterBuilder.build()` and
 * can be shared by any number of in-flight requests.
 */
export class Router<TRequest, TResponse> {
  private readonly table: RouteTable<TRequest, TResponse>;
  private readonly notFound: NotFoundHandler<TRequest, TResponse>;

  constructor(
    table: RouteTable<TRequest, TResponse>,
    notFound: NotFoundHandler<TRequest, TResponse>
  ) {
    this.table = table;
    this.notFound = notFound;
  }

  get size(): number {
    return this.table.size;
  }

  /**
   * Routes a request to the first matching handler and resolves to its
   * response. Unmatched requests resolve to the not-found response. Handler
   * failures are passed through untouched.
   */
  async dispatch(method: string, path: string, request: TRequest): Promise<TResponse> {
    const match = this.table.match(method, path);
    if (!match) {
      return this.notFound(request);
    }
    return match.handler(match.params, request);
  }
}
