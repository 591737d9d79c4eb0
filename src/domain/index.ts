/**
 * Domain model exports.
 */

export * from './certificate';
export * from './delivery';
export * from './error-presentation';
export * from './errors';
