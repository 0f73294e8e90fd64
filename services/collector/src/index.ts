export * from './appRegistry';
export * from './collector';
export * from './config';
export * from './logger';
export * from './metrics';
export * from './program';
export * from './publisher';
export * from './runtime';
export * from './scheduler/commandRunner';
export * from './scheduler/source';
export * from './statusServer';
