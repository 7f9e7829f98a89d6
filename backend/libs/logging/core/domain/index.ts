export * from './error-chain';
export * from './error-identity';
export * from './error-registry';
export * from './stack-inhibit-set';
export * from './traced-error';
export * from './unwrap-error';
export * from './log-record';
export * from './log-entry';
export * from './request-context';
export * from './http-request';
export * from './route.normalizer';
export * from './context-fields';
export * from './logging-options';
