/**
 * Describe/render plumbing shared by the EC2 handlers.
 */

import { notFoundError, ServiceException } from '../domain/errors';
import { evaluateAll } from '../domain/filters';
import type { Resource, Tag } from '../domain/resource';
import { RESOURCE_TYPES, ResourceTypeTag } from '../domain/resource-types';
import { isValueMap, ParameterTree, ValueMap, ValueTree } from '../domain/value-tree';
import type { ActionHandler, ResourceHandler } from '../gateway/types';
import type { ResourceStore } from '../storage/store';
import { getStringList, paginate, parseFilters } from './params';

export const EC2_SERVICE = 'ec2';

export function attrString(attributes: ValueMap, key: string): string | undefined {
  const value = attributes[key];
  return typeof value === 'string' ? value : undefined;
}

export function attrNumber(attributes: ValueMap, key: string): number | undefined {
  const value = attributes[key];
  return typeof value === 'number' ? value : undefined;
}

/** The structures in a sequence-valued attribute. */
export function attrMaps(attributes: ValueMap, key: string): ValueMap[] {
  const value = attributes[key];
  return Array.isArray(value) ? value.filter(isValueMap) : [];
}

/** A copy of `map` without `keys`. */
export function withoutKeys(map: ValueMap, keys: readonly string[]): ValueMap {
  return Object.fromEntries(Object.entries(map).filter(([key]) => !keys.includes(key)));
}

export function tagSet(tags: Tag[]): ValueTree[] {
  return tags.map((tag) => ({ key: tag.key, value: tag.value }));
}

export function defineEc2Handler(name: string, actions: Record<string, ActionHandler>): ResourceHandler {
  return { name, service: EC2_SERVICE, actions };
}

/**
 * Resources of `type` selected by an id list parameter and `Filter.N`.
 * Every requested id must exist; the first missing one fails the request
 * with the type's not-found error.
 */
export async function selectResources(
  store: ResourceStore,
  type: ResourceTypeTag,
  params: ParameterTree,
  idParam: string,
): Promise<Resource[]> {
  const def = RESOURCE_TYPES[type];
  let resources = await store.list(type);

  const ids = getStringList(params, idParam);
  if (ids.length > 0) {
    const byId = new Map(resources.map((resource) => [resource.id, resource]));
    const missing = ids.find((id) => !byId.has(id));
    if (missing !== undefined) {
      throw new ServiceException(notFoundError(type, def.notFoundCode, missing));
    }
    const wanted = new Set(ids);
    resources = resources.filter((resource) => wanted.has(resource.id));
  }

  return evaluateAll(resources, parseFilters(params), def.filters);
}

/** Select, paginate and render a describe result under `listName`. */
export async function describeResources(
  store: ResourceStore,
  type: ResourceTypeTag,
  params: ParameterTree,
  options: { idParam: string; listName: string; render: (resource: Resource) => ValueMap },
): Promise<ValueMap> {
  const selected = await selectResources(store, type, params, options.idParam);
  const page = paginate(selected, params);
  const body: ValueMap = { [options.listName]: page.items.map(options.render) };
  if (page.nextToken) body.nextToken = page.nextToken;
  return body;
}
