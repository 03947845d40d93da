export * from './types';
export * from './http-endpoint';
export * from './mock-endpoint';
export * from './invocation-engine';
