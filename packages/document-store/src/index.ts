export * from './factory';
export * from './inlineStore';
export * from './paths';
export * from './redisStore';
export * from './types';
