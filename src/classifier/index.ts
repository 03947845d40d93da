export * from './types';
export * from './schema';
export * from './prompt';
export * from './bedrock-gateway';
