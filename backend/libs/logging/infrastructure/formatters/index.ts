export * from './log-formatter';
export * from './json.formatter';
export * from './text.formatter';
