export * from './users.service.port';
