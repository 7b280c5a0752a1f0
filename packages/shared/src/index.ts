export * from './errors';
export * from './events';
export * from './messaging';
export * from './observability';
export * from './retry';
export * from './types';
