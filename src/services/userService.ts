import { BadRequestError, DuplicateEntryError, NotFoundError, ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { UserRepository } from '../repositories/types.js';
import type { UserRecord } from '../types/domain.js';

export interface Registration {
  uid: string;
  username: string;
  email?: string;
}

export class UserService {
  constructor(private readonly users: UserRepository) {}

  async register(input: Registration): Promise<UserRecord> {
    if (await this.users.findByUid(input.uid)) {
      throw new BadRequestError('A profile is already registered for this account');
    }
    if (await this.users.findByUsername(input.username)) {
      throw ValidationError.field('username', 'A user with that username already exists.');
    }
    let user: UserRecord;
    try {
      user = await this.users.create({ uid: input.uid, username: input.username, email: input.email });
    } catch (err) {
      // A concurrent registration took the username (or the account) first
      if (err instanceof DuplicateEntryError) {
        throw ValidationError.field('username', 'A user with that username already exists.');
      }
      throw err;
    }
    logger.info({ userId: user.id, uid: user.uid }, 'User registered');
    return user;
  }

  async me(userId: number): Promise<UserRecord> {
    const user = await this.users.findById(userId);
    if (!user) throw new NotFoundError('User not found');
    return user;
  }

  list(): Promise<UserRecord[]> {
    return this.users.findAll();
  }
}
