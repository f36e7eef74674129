/**
 * @keyinfo/hls
 * HLS keyinfo descriptor for FFmpeg AES-128 segment encryption
 */

export * from './KeyInfo.js';
export * from './scope.js';
export * from './io/index.js';
