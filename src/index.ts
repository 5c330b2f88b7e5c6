/**
 * Toolset library entry point
 */

export * from './types';
export * from './config';
export * from './io';
export * from './logging';
export * from './metadata';
export * from './schemas';
export * from './ui';
export * from './cli';
