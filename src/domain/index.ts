/**
 * Domain model exports.
 */

export * from './checkpoint';
export * from './errors';
export * from './events';
export * from './module';
export * from './run';
export * from './transaction';
