/**
 * Program Utilities
 */

export * from './logger';
