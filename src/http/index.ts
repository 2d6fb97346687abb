export { HttpResponse } from './HttpResponse.js';
export type { HttpResponseInit } from './HttpResponse.js';
export {
  createHttpRouterBuilder,
  defaultErrorResponder,
  toRequestHandler,
} from './expressAdapter.js';
export type { ErrorResponder, HttpRouter, RequestHandlerOptions } from './expressAdapter.js';
