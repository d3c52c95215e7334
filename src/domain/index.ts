/**
 * Domain model exports.
 */

export * from './artifact';
export * from './errors';
export * from './result';
export * from './run';
