export * from './aggregate';
export * from './capacity';
export * from './counters';
export * from './deviceTree';
export * from './document';
export * from './errors';
export * from './freshness';
export * from './keys';
export * from './records';
export * from './sanitizer';
