/**
 * Handler plugin contract.
 *
 * A resource handler owns the actions of one resource type (or one service
 * surface). It reaches state only through the ResourceStore and filters only
 * through the filter evaluator; it never allocates ids or bypasses the
 * store's integrity checks.
 */

import type { ServiceError } from '../domain/errors';
import type { ParameterTree, ValueMap } from '../domain/value-tree';
import type { Logger } from '../logger';
import type { ResourceStore } from '../storage/store';

export interface HandlerContext {
  store: ResourceStore;
  requestId: string;
  region: string;
  accountId: string;
  logger: Logger;
}

/** Returns the action's result body, or throws a ServiceException. */
export type ActionHandler = (params: ParameterTree, ctx: HandlerContext) => Promise<ValueMap>;

export interface ResourceHandler {
  /** Name used in logs and registration errors, e.g. "vpc". */
  name: string;
  service: string;
  actions: Record<string, ActionHandler>;
}

/** Generic outcome of one dispatched request. */
export type ActionOutcome =
  | { shape: 'result'; body: ValueMap }
  | { shape: 'error'; error: ServiceError };
