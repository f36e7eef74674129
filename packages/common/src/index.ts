/**
 * @keyinfo/common
 * Shared types, constants, errors, and utilities for keyinfo generation
 */

export * from './types.js';
export * from './constants.js';
export * from './errors.js';
export * from './config.js';
export * from './utils/index.js';
