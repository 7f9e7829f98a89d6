import { User } from '@users/dtos';

export abstract class UsersServicePort {
  /**
   * Rejects with an HttpException: 404 when missing, 403 when disabled,
   * 500 when the repository fails.
   */
  abstract getUser(id: string): Promise<User>;
}
