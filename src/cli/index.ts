/**
 * CLI exports.
 */

export * from './prompt';
export * from './session';
