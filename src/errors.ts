export class RouterError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Thrown while registering a route whose method or path tokens are malformed.
 * Raised during startup so that a bad route never reaches the serving phase.
 */
export class RouteConstructionError extends RouterError {
  readonly method: string;
  readonly tokens: readonly string[];

  constructor(message: string, method: string, tokens: readonly string[]) {
    super(`${message} (route: ${method} /${tokens.join('/')})`);
    this.method = method;
    this.tokens = tokens;
  }
}

export class ConfigError extends RouterError {}
