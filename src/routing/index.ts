export * from './types';
export * from './confidence-router';
