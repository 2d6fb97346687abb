import { z } from 'zod';
import { RouteConstructionError } from '../errors.js';
import { WILDCARD, type HttpMethod, type Segment } from './types.js';

// RFC 7230 token characters; extension methods such as PROPFIND are accepted
const methodSchema = z
  .string()
  .regex(/^[!#$%&'*+.^_`|~0-9A-Z-]+$/, 'HTTP method must be a non-empty token');

const tokenSchema = z
  .string()
  .min(1, 'path token must not be empty')
  .refine((token) => !token.includes('/'), 'path token must not contain "/"')
  .refine((token) => !/[?#]/.test(token), 'path token must not contain "?" or "#"');

const tokensSchema = z.array(tokenSchema);

/**
 * Path tokens in list form (`['users', WILDCARD, 'posts']`) or as a path
 * string (`'/users/_/posts'`).
 */
export type PatternInput = string | readonly string[];

/**
 * An HTTP method plus an ordered, fixed-length list of segments. Each segment
 * is either literal text or a wildcard that captures exactly one path
 * component. A pattern with no segments is the root path.
 *
 * @example
 * ```typescript
 * const pattern = new PathPattern('post', ['foo', WILDCARD, 'bar', WILDCARD, 'baz']);
 * pattern.toString(); // 'POST /foo/_/bar/_/baz'
 * ```
 */
export class PathPattern {
  readonly method: HttpMethod;
  readonly segments: readonly Segment[];

  /**
   * The string form is split on `/` only, so a `?` or `#` in it is rejected
   * like any other malformed token.
   *
   * @throws RouteConstructionError if the method is not an HTTP token, or a
   * token is empty or contains `/`, `?` or `#`
   */
  constructor(method: string, pattern: PatternInput) {
    const tokens = typeof pattern === 'string' ? pattern.split('/').filter(Boolean) : [...pattern];

    const parsedMethod = methodSchema.safeParse(method.toUpperCase());
    if (!parsedMethod.success) {
      throw new RouteConstructionError(parsedMethod.error.issues[0].message, method, tokens);
    }

    const parsedTokens = tokensSchema.safeParse(tokens);
    if (!parsedTokens.success) {
      const issue = parsedTokens.error.issues[0];
      throw new RouteConstructionError(
        `${issue.message} at index ${issue.path.join('.')}`,
        parsedMethod.data,
        tokens
      );
    }

    this.method = parsedMethod.data;
    this.segments = Object.freeze(
      parsedTokens.data.map((token) => {
        const segment: Segment =
          token === WILDCARD ? { kind: 'wildcard' } : { kind: 'literal', value: token };
        return Object.freeze(segment);
      })
    );
  }

  get length(): number {
    return this.segments.length;
  }

  segmentAt(index: number): Segment | undefined {
    return this.segments[index];
  }

  equals(other: PathPattern): boolean {
    if (this.method !== other.method || this.length !== other.length) return false;
    return this.segments.every((segment, i) => {
      const theirs = other.segments[i];
      if (segment.kind === 'wildcard') return theirs.kind === 'wildcard';
      return theirs.kind === 'literal' && theirs.value === segment.value;
    });
  }

  toString(): string {
    const tokens = this.segments.map((s) => (s.kind === 'wildcard' ? WILDCARD : s.value));
    return `${this.method} /${tokens.join('/')}`;
  }
}
