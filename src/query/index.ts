/**
 * Query module exports
 */

export * from './types';
export * from './config';
export * from './backpacks';
export * from './containers';
export * from './filter';
