/**
 * Configuration exports.
 */

export * from './app-config';
export * from './generator-config';
