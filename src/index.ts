/**
 * Signup Kit: fake signup details with a guided, clipboard-driven fill.
 *
 * The CLI lives in ./cli/main; this module exposes the pieces for
 * programmatic use, chiefly the generator and its validators.
 */

export * from './cli';
export * from './config';
export * from './domain';
export * from './generator';
export * from './logger';
export * from './platform';
export * from './storage';
