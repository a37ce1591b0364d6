/**
 * Domain model exports.
 */

export * from './audit';
export * from './errors';
export * from './inventory';
export * from './manifest';
export * from './operation';
export * from './run';
