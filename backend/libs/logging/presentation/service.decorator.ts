import { SetMetadata } from '@nestjs/common';

export const SERVICE_METADATA_KEY = 'service';

/**
 * Service decorator - Sets the service name for logging purposes.
 * This allows each module to identify itself in logs.
 *
 * @param serviceName The name of the service/module (e.g., 'users')
 *
 * @example
 * ```typescript
 * @Controller('users')
 * @Service('users')
 * export class UsersController { ... }
 * ```
 */
export const Service = (serviceName: string) =>
  SetMetadata(SERVICE_METADATA_KEY, serviceName);
