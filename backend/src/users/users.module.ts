import { Module, OnModuleInit } from '@nestjs/common';
import {
  ErrorRegistry,
  StackInhibitSet,
  defaultErrorLogHandler,
} from '@logging';
import { UsersController } from '@users/presentation';
import { UsersService } from '@users/service';
import { UsersOutAdapter } from '@users/infrastructure';
import { UsersOutPort } from '@users/out-ports';
import { UsersServicePort } from '@users/in-ports';
import { USER_DISABLED, UserNotFoundError } from '@users/value-objects';

@Module({
  controllers: [UsersController],
  providers: [
    { provide: UsersServicePort, useClass: UsersService },
    { provide: UsersOutPort, useClass: UsersOutAdapter },
  ],
})
export class UsersModule implements OnModuleInit {
  constructor(
    private readonly inhibitSet: StackInhibitSet,
    private readonly registry: ErrorRegistry,
  ) {}

  onModuleInit(): void {
    this.inhibitSet.inhibit(UserNotFoundError);

    this.registry.register((err, fields) => {
      if (err instanceof UserNotFoundError) {
        fields.user_id = err.userId;
      }
    }, UserNotFoundError);
    this.registry.register((err, fields) => {
      defaultErrorLogHandler(err, fields);
      fields.user_state = 'disabled';
    }, USER_DISABLED);
  }
}
