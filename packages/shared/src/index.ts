export * from './types';
export * from './schemas';
export * from './constants';
export * from './utils';
