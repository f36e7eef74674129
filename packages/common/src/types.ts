/**
 * Core types for keyinfo generation
 */

/** Produces `length` cryptographically secure random bytes */
export type RandomSource = (length: number) => Buffer;

/** Who owns the key file a descriptor points at */
export type KeyFileOwnership = 'generated' | 'external';

/** Current key file of a descriptor */
export interface KeyFileRef {
  kind: KeyFileOwnership;
  path: string;
}

/** Descriptor construction options */
export interface KeyInfoOptions {
  /** Directory for generated files (default: config.tempDir) */
  tempDir?: string;
  /** Random source for the key and IVs (default: Node's CSPRNG) */
  randomSource?: RandomSource;
  /** Validate setIV / setKeyFile input instead of accepting it verbatim */
  strict?: boolean;
}

/** randIV options */
export interface RandIVOptions {
  /** Fall back to an all-zero IV instead of failing when randomness is unavailable */
  bestEffort?: boolean;
}

/** Runtime configuration */
export interface KeyInfoConfig {
  tempDir: string;
  debug: boolean;
}
