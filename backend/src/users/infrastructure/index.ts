export * from './users.out.adapter';
