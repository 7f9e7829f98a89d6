/**
 * Logging Decorators - Declarative logging configuration for controllers/handlers
 */
export { NoLog, NO_LOG_KEY } from './log-control.decorator';
