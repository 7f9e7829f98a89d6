export * from './logging.use-case';
