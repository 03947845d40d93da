export * from './state';
export * from './request-validator';
export * from './execution-plan';
export * from './clarification';
export * from './fallback';
export * from './response-composer';
export * from './engine';
