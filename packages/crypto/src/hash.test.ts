import { describe, expect, it } from 'vitest';
import { keyFingerprint, sha256Hash, sha256Hex } from './hash.js';

const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('sha256', () => {
  it('hashes strings and buffers alike', () => {
    expect(sha256Hex('abc')).toBe(ABC_SHA256);
    expect(sha256Hex(Buffer.from('abc'))).toBe(ABC_SHA256);
    expect(sha256Hash('abc')).toHaveLength(32);
  });
});

describe('keyFingerprint', () => {
  it('is the leading 16 hex characters of the hash', () => {
    expect(keyFingerprint(Buffer.from('abc'))).toBe('ba7816bf8f01cfea');
  });

  it('differs between keys', () => {
    expect(keyFingerprint(Buffer.alloc(16, 1))).not.toBe(keyFingerprint(Buffer.alloc(16, 2)));
  });
});
