export * from './errors';
export * from './constants/gym';
export * from './types';
export * from './utils';
export * from './validation';
