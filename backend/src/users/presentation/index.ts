export * from './users.controller';
