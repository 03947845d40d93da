/**
 * Error handling module: error codes, error types and formatting utilities.
 */

export * from './codes';
export * from './types';
export * from './formatter';
