/**
 * Runtime configuration for signing and verification
 */

import { SecureRandom } from './crypto/types';
import { secureRandom } from './crypto/random';
import { KeyReencoderRegistry, createDefaultKeyReencoders } from './crypto/key-reencoding';
import { LogLevel, Logger, createLogger, isLogLevel } from './logging';

export const LOG_LEVEL_ENV = 'DTLS_LOG_LEVEL';
export const KEY_REENCODING_ENV = 'DTLS_KEY_REENCODING';

const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];
const BOOLEAN_FALSE_VALUES = ['false', '0', 'no', 'off'];

export interface CertificateVerifyConfig {
  logLevel: LogLevel;
  logger: Logger;
  /** Randomness handed to signature engines */
  random: SecureRandom;
  /** Whether rejected private keys may be re-encoded and retried */
  keyReencoding: boolean;
  reencoders: KeyReencoderRegistry;
}

export function parseLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new Error(`Invalid log level: "${value}"`);
  }
  return normalized;
}

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (BOOLEAN_FALSE_VALUES.includes(normalized)) {
    return false;
  }
  throw new Error(`Invalid boolean value: "${value}"`);
}

/**
 * Fill in defaults for everything not given in `overrides`.
 * Environment variables are read at call time.
 */
export function resolveConfig(
  overrides: Partial<CertificateVerifyConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): CertificateVerifyConfig {
  const logLevel = overrides.logLevel ?? parseLogLevel(env[LOG_LEVEL_ENV], 'warn');

  return {
    logLevel,
    logger: overrides.logger ?? createLogger('certificate-verify', logLevel),
    random: overrides.random ?? secureRandom,
    keyReencoding: overrides.keyReencoding ?? parseBoolean(env[KEY_REENCODING_ENV], true),
    reencoders: overrides.reencoders ?? createDefaultKeyReencoders(),
  };
}
