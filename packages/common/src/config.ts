/**
 * Runtime configuration from the environment
 */

import { tmpdir } from 'os';
import type { KeyInfoConfig } from './types.js';

/**
 * Read configuration from environment variables
 * - HLS_KEYINFO_TMPDIR: directory for generated files (default: OS temp dir)
 * - HLS_KEYINFO_DEBUG: `1` or `true` enables lifecycle debug logs
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): KeyInfoConfig {
  const debug = (env.HLS_KEYINFO_DEBUG || '').toLowerCase();
  return {
    tempDir: env.HLS_KEYINFO_TMPDIR || tmpdir(),
    debug: debug === '1' || debug === 'true',
  };
}

export const config: Readonly<KeyInfoConfig> = loadConfig();
