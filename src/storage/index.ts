/**
 * Storage exports.
 */

export * from './checkpoint-store';
export * from './fs-errors';
export * from './memory-store';
export * from './mutex';
export * from './run-lock';
export * from './transaction-log';
export * from './transaction-templates';
