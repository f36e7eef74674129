export * from './hex.js';
export * from './validation.js';
