export * from './envConfig';
export * from './json';
