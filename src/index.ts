export { PathPattern } from './route/PathPattern.js';
export type { PatternInput } from './route/PathPattern.js';
export { RouteTable } from './route/RouteTable.js';
export { splitPath, stripQuery } from './route/pathSplitter.js';
export { WILDCARD } from './route/types.js';
export type {
  HttpMethod,
  NotFoundHandler,
  RouteEntry,
  RouteHandler,
  RouteMatch,
  Segment,
} from './route/types.js';
export { Router } from './router/Router.js';
export { RouterBuilder } from './router/RouterBuilder.js';
export type { RouterBuilderOptions } from './router/RouterBuilder.js';
export { ConfigError, RouteConstructionError, RouterError } from './errors.js';
export { loadConfig } from './config.js';
export type { ServerConfig } from './config.js';
export { enableConsoleLogging, enableFileLogging } from './logger.js';
export * from './http/index.js';
