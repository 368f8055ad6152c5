/**
 * Domain model exports.
 */

export * from './errors';
export * from './events';
export * from './process';
export * from './subject';
