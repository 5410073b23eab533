export * from './cache';
export * from './configuration';
export * from './utils';
