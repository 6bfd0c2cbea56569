/**
 * Platform collaborator exports.
 */

export * from './browser';
export * from './clipboard';
export * from './process';
