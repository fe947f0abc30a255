/**
 * Domain model exports.
 */

export * from './artifact';
export * from './callback-payload';
export * from './errors';
export * from './job';
export * from './task';
