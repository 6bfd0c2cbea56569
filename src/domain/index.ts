/**
 * Domain model exports.
 */

export * from './account';
export * from './error-presentation';
export * from './errors';
