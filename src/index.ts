/**
 * QVS - Quote Verification Service bootstrap and trust lifecycle
 *
 * Main entry point of the library
 */

export * from './lib/index.js';
