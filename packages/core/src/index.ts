export * from './types';
export * from './json';
export * from './errors';
export * from './schemas';
