export * from './types';
export * from './schemas';
export * from './utils';
export * from './errors';
export * from './constants';
