/**
 * ec2-local: an in-memory emulator of the EC2 control plane.
 *
 * Public exports for programmatic use: embed the Express app in tests, or
 * drive the gateway directly without HTTP.
 */

export { createApp, createAppContext, seedDefaultNetwork, DEFAULT_VPC_CIDR } from './server';
export type { AppContext } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './storage';
export * from './protocol/codecs';
export * from './gateway/gateway';
export * from './gateway/router';
export * from './gateway/types';
export * from './services';
export { builtinHandlers } from './handlers';
