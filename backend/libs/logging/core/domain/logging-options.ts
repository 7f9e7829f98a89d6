import { ContextFieldCollector } from './context-fields';

export const LOGGING_MODULE_OPTIONS = Symbol('LOGGING_MODULE_OPTIONS');

export interface LoggingModuleOptions {
  /**
   * Field collectors run at the start of every request.
   * Defaults to `[requestContextFields]`.
   */
  collectors?: ContextFieldCollector[];

  /**
   * Service name used when neither `@Service()` nor `SERVICE_NAME` is set.
   */
  serviceName?: string;

  /**
   * Register the handlers for HttpException and jsonwebtoken errors.
   * Defaults to true.
   */
  registerDefaultErrorHandlers?: boolean;
}
