import { Controller, Get, Param } from '@nestjs/common';
import { LoggingService, Service } from '@logging';
import { User } from '@users/dtos';
import { UsersServicePort } from '@users/in-ports';

@Controller('users')
@Service('users')
export class UsersController {
  constructor(
    private readonly usersService: UsersServicePort,
    private readonly loggingService: LoggingService,
  ) {}

  @Get(':id')
  async getUser(@Param('id') id: string): Promise<User> {
    this.loggingService.addContextFields({ user_id: id });

    const user = await this.usersService.getUser(id);
    this.loggingService.setLogMessage('user fetched');
    return user;
  }
}
