/**
 * Shared test helpers: error-code capture and a handler harness that drives
 * actions through the real router and gateway without HTTP.
 */

import { isServiceException } from '../src/domain/errors';
import type { ValueMap, ValueTree } from '../src/domain/value-tree';
import { isValueMap } from '../src/domain/value-tree';
import { Gateway } from '../src/gateway/gateway';
import { ActionRouter } from '../src/gateway/router';
import { builtinHandlers } from '../src/handlers';
import { BUILTIN_SERVICES } from '../src/services';
import { createMemoryStore } from '../src/storage/memory-store';
import type { ResourceStore } from '../src/storage/store';

export const TEST_REGION = 'us-east-1';
export const TEST_ACCOUNT = '123456789012';

/** Await a promise expected to reject with a ServiceException and return its code. */
export async function rejectionCode(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (isServiceException(err)) return err.serviceError.code;
    throw err;
  }
  throw new Error('Expected the operation to fail');
}

/** Run a function expected to throw a ServiceException and return its code. */
export function thrownCode(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (isServiceException(err)) return err.serviceError.code;
    throw err;
  }
  throw new Error('Expected the operation to throw');
}

export type CallResult = { ok: true; body: ValueMap } | { ok: false; code: string; message: string };

export interface Harness {
  store: ResourceStore;
  gateway: Gateway;
  /** Dispatch an EC2 action with flat query parameters. */
  call(action: string, params?: Record<string, string | number | boolean>): Promise<CallResult>;
  /** Dispatch and return the body, failing the test on an error outcome. */
  ok(action: string, params?: Record<string, string | number | boolean>): Promise<ValueMap>;
  /** Dispatch and return the error code, failing the test on success. */
  fail(action: string, params?: Record<string, string | number | boolean>): Promise<string>;
}

export function createHarness(store: ResourceStore = createMemoryStore()): Harness {
  const router = ActionRouter.build(BUILTIN_SERVICES, builtinHandlers());
  const gateway = new Gateway({
    router,
    store,
    region: TEST_REGION,
    accountId: TEST_ACCOUNT,
    defaultService: 'ec2',
    requestId: () => 'req-test',
  });

  const call = async (action: string, params: Record<string, string | number | boolean> = {}) => {
    const query = new URLSearchParams({ Action: action, Version: '2016-11-15' });
    for (const [key, value] of Object.entries(params)) query.append(key, String(value));
    const result = await gateway.dispatch({ method: 'POST', headers: {}, query: '', body: query.toString() });
    const outcome: CallResult =
      result.outcome.shape === 'result'
        ? { ok: true, body: result.outcome.body }
        : { ok: false, code: result.outcome.error.code, message: result.outcome.error.message };
    return outcome;
  };

  return {
    store,
    gateway,
    call,
    async ok(action, params) {
      const result = await call(action, params);
      if (!result.ok) throw new Error(`${action} failed: ${result.code} ${result.message}`);
      return result.body;
    },
    async fail(action, params) {
      const result = await call(action, params);
      if (result.ok) throw new Error(`${action} unexpectedly succeeded`);
      return result.code;
    },
  };
}

/** Read a nested map field, failing the test when it is not a map. */
export function mapAt(value: ValueTree | undefined, key: string): ValueMap {
  if (!isValueMap(value)) throw new Error(`Expected a map holding "${key}"`);
  const child = value[key];
  if (!isValueMap(child)) throw new Error(`Expected "${key}" to be a map`);
  return child;
}

/** Read a list field of maps. */
export function listAt(value: ValueTree | undefined, key: string): ValueMap[] {
  if (!isValueMap(value)) throw new Error(`Expected a map holding "${key}"`);
  const child = value[key];
  if (!Array.isArray(child)) throw new Error(`Expected "${key}" to be a list`);
  return child.filter(isValueMap);
}

/** Read a string field. */
export function stringAt(value: ValueTree | undefined, key: string): string {
  if (!isValueMap(value)) throw new Error(`Expected a map holding "${key}"`);
  const child = value[key];
  if (typeof child !== 'string') throw new Error(`Expected "${key}" to be a string`);
  return child;
}
