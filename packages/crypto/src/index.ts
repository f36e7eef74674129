/**
 * @keyinfo/crypto
 * Random material and hashing for keyinfo generation
 */

export * from './hash.js';
export * from './random.js';
