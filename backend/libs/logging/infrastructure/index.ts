export * from './formatters';
export * from './stream/stream.log-sink';
export * from './file/file.log-sink';
export * from './log-sink.factory';
export * from './nest/sink.logger';
