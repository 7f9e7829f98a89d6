export * from './context.service';
export * from './logging.service';
