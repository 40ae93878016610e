/**
 * Cryptographic primitives for transcript signatures
 * Exports key model, engines, key factories and the engine cache
 */

export * from './types';
export * from './utils';
export * from './errors';
export * from './der';
export * from './engines';
export * from './key-factory';
export * from './keys';
export * from './random';
export * from './crypto-map';
export * from './key-reencoding';
