export * from './event';
export * from './command';
export * from './layout';
export * from './drag';
export * from './persistence';
export * from './notification';
export * from './config';
export * from './plugin';
