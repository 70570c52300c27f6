import type { User } from '../../domain/users/user.js';
import { seedUsers } from './seed.js';

export interface UserRepo {
  findById(id: string): User | null;
  findAll(): User[];
}

/**
 * Process-wide user registry held in memory.
 * Filled once at construction and never written afterwards, so concurrent
 * requests can read it without locking. A write path would need to swap in a
 * guarded store behind the same interface.
 */
export class InMemoryUserRepo implements UserRepo {
  private readonly users: ReadonlyMap<string, User>;

  constructor(users: readonly User[] = seedUsers) {
    this.users = new Map(
      users.map((user) => [user.id, Object.freeze({ id: user.id, email: user.email })])
    );
  }

  findById(id: string): User | null {
    return this.users.get(id) ?? null;
  }

  findAll(): User[] {
    return [...this.users.values()];
  }
}
