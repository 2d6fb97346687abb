import type { PathPattern } from './PathPattern.js';

/** An upper-cased HTTP method token, standard (`GET`) or extension (`PROPFIND`). */
export type HttpMethod = string;

/** Token that marks a wildcard segment in a path pattern. */
export const WILDCARD = '_';

export type Segment =
  | { readonly kind: 'literal'; readonly value: string }
  | { readonly kind: 'wildcard' };

/**
 * Receives the wildcard captures in left-to-right order, followed by the
 * inbound request.
 */
export type RouteHandler<TRequest, TResponse> = (
  params: string[],
  request: TRequest
) => TResponse | Promise<TResponse>;

export type NotFoundHandler<TRequest, TResponse> = (
  request: TRequest
) => TResponse | Promise<TResponse>;

export type RouteEntry<TRequest, TResponse> = {
  readonly pattern: PathPattern;
  readonly handler: RouteHandler<TRequest, TResponse>;
};

export type RouteMatch<TRequest, TResponse> = {
  handler: RouteHandler<TRequest, TResponse>;
  params: string[];
};
