export * from './user-errors.vo';
