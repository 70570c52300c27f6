import type { Request, Response } from 'express';
import type { User } from '../../domain/users/user.js';
import { requestContext } from './context.js';

/**
 * A response payload that gets one chance to touch itself and the outgoing
 * response (status code, computed fields) before it is serialized.
 * Failure is signalled by throwing.
 */
export interface Renderer {
  render(req: Request, res: Response): void;
}

export class RenderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RenderError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function toRenderError(err: unknown): RenderError {
  if (err instanceof RenderError) {
    return err;
  }
  return new RenderError(err instanceof Error ? err.message : String(err), { cause: err });
}

function runHook(req: Request, res: Response, v: Renderer): void {
  try {
    v.render(req, res);
  } catch (err) {
    throw toRenderError(err);
  }
}

function respond(req: Request, res: Response, payload: unknown): void {
  let body: string;
  try {
    body = JSON.stringify(payload);
  } catch (err) {
    throw toRenderError(err);
  }

  // The timeout middleware may already have answered.
  if (requestContext(req).cancelled || res.headersSent) {
    return;
  }
  res.type('application/json').send(body);
}

/** Run the pre-serialization hook, then write `v` as JSON. */
export function render(req: Request, res: Response, v: Renderer): void {
  runHook(req, res, v);
  respond(req, res, v);
}

/**
 * Run every item's hook, then write the array as JSON in one go.
 * The first failing item aborts the list; nothing is written.
 */
export function renderList(req: Request, res: Response, items: readonly Renderer[]): void {
  for (const item of items) {
    runHook(req, res, item);
  }
  respond(req, res, items);
}

// Stand-in until real request timing is wired in.
export const ELAPSED_PLACEHOLDER = 10;

export interface UserPayload {
  id: string;
  email: string;
  elapsed: number;
}

export class UserResponse implements Renderer {
  elapsed = 0;

  constructor(readonly user: User) {}

  render(): void {
    this.elapsed = ELAPSED_PLACEHOLDER;
  }

  toJSON(): UserPayload {
    return { id: this.user.id, email: this.user.email, elapsed: this.elapsed };
  }
}

export function newUserResponse(user: User): UserResponse {
  return new UserResponse(user);
}

export type UserResponseFactory = (user: User) => Renderer;

export function newUserListResponse(
  users: readonly User[],
  toResponse: UserResponseFactory = newUserResponse
): Renderer[] {
  return users.map((user) => toResponse(user));
}

export interface ErrPayload {
  status: string;
  error?: string;
}

export class ErrResponse implements Renderer {
  constructor(
    readonly err: unknown, // low-level runtime error, never serialized
    readonly httpStatusCode: number,
    readonly statusText: string, // user-level status message
    readonly errorText?: string // application-level message, for debugging
  ) {}

  render(_req: Request, res: Response): void {
    res.status(this.httpStatusCode);
  }

  toJSON(): ErrPayload {
    const payload: ErrPayload = { status: this.statusText };
    if (this.errorText) {
      payload.error = this.errorText;
    }
    return payload;
  }
}

export function errRender(err: unknown): ErrResponse {
  return new ErrResponse(
    err,
    422,
    'Error rendering response.',
    err instanceof Error ? err.message : String(err)
  );
}
