export * from './types';
export * from './catalog';
export * from './loader';
export * from './prompt-context';
