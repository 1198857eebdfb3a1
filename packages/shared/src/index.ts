// Shared package exports

export * from './constants';
export * from './types';
export * from './schemas';
