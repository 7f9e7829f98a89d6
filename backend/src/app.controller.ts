import { Controller, Get } from '@nestjs/common';
import { NoLog, Service } from '@logging';
import { NOPE } from '@users/value-objects';
import { AppService } from './app.service';

@Controller()
@Service('app')
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('ping')
  ping(): string {
    return this.appService.ping();
  }

  @Get('nope')
  nope(): never {
    throw NOPE;
  }

  @Get('healthz')
  @NoLog()
  health(): { status: string; message: string } {
    return this.appService.getHealth();
  }
}
