import { Injectable } from '@nestjs/common';
import { User } from '@users/dtos';
import { UsersOutPort } from '@users/out-ports';
import { UserLookupError, UserNotFoundError } from '@users/value-objects';

const SEED_USERS: User[] = [
  { id: '1', name: 'Ada', disabled: false },
  { id: '2', name: 'Grace', disabled: true },
];

const USER_ID_PATTERN = /^[0-9]+$/;

/**
 * In-memory user store.
 */
@Injectable()
export class UsersOutAdapter implements UsersOutPort {
  private readonly users = new Map<string, User>(
    SEED_USERS.map((user) => [user.id, user]),
  );

  async findById(id: string): Promise<User> {
    if (!USER_ID_PATTERN.test(id)) {
      throw new UserLookupError(id, new TypeError(`malformed user id "${id}"`));
    }

    const user = this.users.get(id);
    if (!user) {
      throw new UserNotFoundError(id);
    }
    return user;
  }
}
