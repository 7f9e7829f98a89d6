export * from './env.validation';
export { default as pathConfig, findProjectRoot } from './utils/path.config';
