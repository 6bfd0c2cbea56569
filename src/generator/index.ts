/**
 * Generator exports.
 */

export * from './account-generator';
export * from './birth-date';
export * from './display-name';
export * from './password';
export * from './random-source';
