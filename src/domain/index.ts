/**
 * Domain model exports.
 */

export * from './errors';
export * from './filters';
export * from './ids';
export * from './resource';
export * from './resource-types';
export * from './value-tree';
