import type { Request, RequestHandler, Response } from 'express';
import logger from '../logger.js';
import { RouterBuilder } from '../router/RouterBuilder.js';
import type { Router } from '../router/Router.js';
import { HttpResponse } from './HttpResponse.js';

export type HttpRouter = Router<Request, HttpResponse>;

/** Converts a failed handler into the response sent to the client. */
export type ErrorResponder = (error: unknown, req: Request) => HttpResponse | Promise<HttpResponse>;

export interface RequestHandlerOptions {
  onError?: ErrorResponder;
}

/** A builder for express requests whose unmatched requests get an empty 404. */
export function createHttpRouterBuilder(): RouterBuilder<Request, HttpResponse> {
  return new RouterBuilder<Request, HttpResponse>({
    notFound: () => HttpResponse.empty(404, 'Not Found'),
  });
}

export function defaultErrorResponder(error: unknown, req: Request): HttpResponse {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`handler failed for ${req.method} ${req.path}: ${message}`);
  return HttpResponse.text(message, { status: 500, statusText: 'Internal Server Error' });
}

function writeResponse(res: Response, response: HttpResponse): void {
  res.status(response.status);
  res.statusMessage = response.statusText;
  for (const [name, value] of response.headers.entries()) {
    res.setHeader(name, value);
  }
  res.send(response.body);
}

/**
 * Mounts a router on express. The query string never takes part in matching
 * since `req.path` excludes it. Failures while writing the response are
 * handed to express's error pipeline.
 */
export function toRequestHandler(
  router: HttpRouter,
  options: RequestHandlerOptions = {}
): RequestHandler {
  const onError = options.onError ?? defaultErrorResponder;
  return (req, res, next) => {
    router
      .dispatch(req.method, req.path, req)
      .catch((error: unknown) => onError(error, req))
      .then((response) => writeResponse(res, response))
      .catch(next);
  };
}
