/**
 * Session module exports
 */

export * from './types';
export * from './storage';
export * from './lock';
export * from './store';
export * from './cleanup';
