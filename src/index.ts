export * from './analytics';
export * from './relational';
export * from './config';
export * from './errors';
export * from './logger';
