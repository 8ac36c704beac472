export * from './debug-build';
export * from './error';
export * from './ids';
export * from './is';
export * from './logger';
export * from './misc';
export * from './object';
export * from './promisebuffer';
export * from './string';
export * from './time';
export * from './tracing';
export * from './version';
export * from './worldwide';
