import { faker } from '@faker-js/faker';
import type { AppDatabase } from '@/database';
import { users, type NewUser, type User } from '@/database/schema';

export class UserFactory {
  static platformUserId(): string {
    // Shape of an Apple user identifier: digits.hex.digits
    return `${faker.string.numeric(6)}.${faker.string.hexadecimal({ length: 32, casing: 'lower', prefix: '' })}.${faker.string.numeric(4)}`;
  }

  static build(overrides: Partial<NewUser> = {}): NewUser {
    const now = new Date();
    return {
      platformUserId: UserFactory.platformUserId(),
      email: faker.internet.email().toLowerCase(),
      createdAt: now,
      updatedAt: now,
      ...overrides,
    };
  }

  static create(db: AppDatabase, overrides: Partial<NewUser> = {}): User {
    const created = db.insert(users).values(UserFactory.build(overrides)).returning().get();
    if (!created) {
      throw new Error('UserFactory failed to insert user');
    }
    return created;
  }
}
