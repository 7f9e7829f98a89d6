export * from './users.out.port';
