/**
 * User domain entity.
 * Immutable: users are fixed for the lifetime of the process.
 */
export interface User {
  readonly id: string;
  readonly email: string;
}
