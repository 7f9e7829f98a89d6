export * from './decorators';
export * from './service.decorator';
export * from './http-error';
export * from './error-handlers';
export * from './logging.interceptor';
