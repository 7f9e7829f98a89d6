import { User } from '@users/dtos';

export abstract class UsersOutPort {
  /**
   * Rejects with UserNotFoundError when there is no such user.
   */
  abstract findById(id: string): Promise<User>;
}
