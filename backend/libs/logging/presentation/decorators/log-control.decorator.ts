import { SetMetadata } from '@nestjs/common';

/**
 * Metadata keys for logging control decorators
 */
export const NO_LOG_KEY = 'no_log';

/**
 * @NoLog - Excludes the endpoint from logging entirely.
 *
 * Use for health checks, metrics endpoints, or high-frequency
 * endpoints that would generate excessive logs without value.
 * Errors of a skipped endpoint are left to Nest's exception filters.
 *
 * @example
 * ```typescript
 * @Get('healthz')
 * @NoLog()
 * healthCheck() {
 *   return { status: 'ok' };
 * }
 * ```
 *
 * @example Applied at controller level
 * ```typescript
 * @Controller('metrics')
 * @NoLog()
 * export class MetricsController { ... }
 * ```
 */
export const NoLog = () => SetMetadata(NO_LOG_KEY, true);
