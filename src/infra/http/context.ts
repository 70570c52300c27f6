import type { User } from '../../domain/users/user.js';

/**
 * Typed key into a RequestContext. Keys compare by identity, so two keys with
 * the same name never collide.
 */
export class ContextKey<T> {
  // Type-only: ties a key to the type of value stored under it.
  declare readonly valueType?: T;

  constructor(readonly name: string) {}

  toString(): string {
    return `ContextKey(${this.name})`;
  }
}

const neverAborted = new AbortController().signal;

/**
 * Immutable request-scoped context.
 *
 * Deriving (`withValue`, `withSignal`) returns a child that sees every value
 * of its parent; the parent is left untouched. Middleware replaces `req.ctx`
 * with the derived child before calling `next()`.
 */
export class RequestContext {
  private constructor(
    private readonly values: ReadonlyMap<ContextKey<unknown>, unknown>,
    readonly signal: AbortSignal
  ) {
    Object.freeze(this);
  }

  static background(): RequestContext {
    return new RequestContext(new Map(), neverAborted);
  }

  withValue<T>(key: ContextKey<T>, value: T): RequestContext {
    const values = new Map(this.values);
    values.set(key, value);
    return new RequestContext(values, this.signal);
  }

  withSignal(signal: AbortSignal): RequestContext {
    return new RequestContext(this.values, signal);
  }

  value<T>(key: ContextKey<T>): T | undefined {
    // withValue only ever stores a T under a ContextKey<T>
    return this.values.get(key) as T | undefined;
  }

  /**
   * Like `value`, for keys a preceding middleware guarantees. A missing key is
   * a routing bug and surfaces as a 500 through the error handler.
   */
  mustValue<T>(key: ContextKey<T>): T {
    const value = this.value(key);
    if (value === undefined) {
      throw new Error(`request context has no value for ${key.toString()}`);
    }
    return value;
  }

  get cancelled(): boolean {
    return this.signal.aborted;
  }
}

export const requestIdKey = new ContextKey<string>('requestId');
export const urlFormatKey = new ContextKey<string>('urlFormat');
export const userKey = new ContextKey<User>('user');

declare global {
  namespace Express {
    interface Request {
      /** Request-scoped context, replaced (never mutated) by middleware. */
      ctx?: RequestContext;
    }
  }
}

/** The current context of a request, or a fresh background one. */
export function requestContext(req: { ctx?: RequestContext }): RequestContext {
  return req.ctx ?? RequestContext.background();
}
