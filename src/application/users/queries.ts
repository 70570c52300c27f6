import type { User } from '../../domain/users/user.js';
import type { UserRepo } from '../../infra/db/userRepo.js';
import { NotFoundError } from '../errors.js';

export class UserQueries {
  constructor(private userRepo: UserRepo) {}

  getUser(userId: string): User {
    const user = this.userRepo.findById(userId);
    if (!user) {
      throw new NotFoundError(`no user with id: ${userId}`);
    }
    return user;
  }

  listUsers(): User[] {
    return this.userRepo.findAll();
  }
}
