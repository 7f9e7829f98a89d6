import { HttpStatus, Injectable } from '@nestjs/common';
import { newHttpError, trace } from '@logging';
import { User } from '@users/dtos';
import { UsersServicePort } from '@users/in-ports';
import { UsersOutPort } from '@users/out-ports';
import {
  USER_DISABLED,
  UserNotFoundError,
  userError,
} from '@users/value-objects';

@Injectable()
export class UsersService extends UsersServicePort {
  constructor(private readonly outPort: UsersOutPort) {
    super();
  }

  async getUser(id: string): Promise<User> {
    let user: User;
    try {
      user = await this.outPort.findById(id);
    } catch (err) {
      if (err instanceof UserNotFoundError) {
        // Inhibited, so trace hands it back untouched
        throw newHttpError(trace(err), HttpStatus.NOT_FOUND, 'User not found');
      }
      throw userError(err);
    }

    if (user.disabled) {
      throw USER_DISABLED;
    }
    return user;
  }
}
