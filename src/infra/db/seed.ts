import type { User } from '../../domain/users/user.js';

export const seedUsers: readonly User[] = [
  { id: 'fece', email: 'bill@deadbug.com' },
  { id: 'd00f', email: 'hhill@stricklandpropance.com' },
];
