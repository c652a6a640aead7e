/**
 * Tag actions across every resource type.
 */

import { malformedParameterError, missingParameterError, notFoundError, ServiceException } from '../domain/errors';
import { evaluateAll, FilterSubject } from '../domain/filters';
import { checkTagLimit, mergeTags } from '../domain/resource';
import type { Resource, TagKeyRef } from '../domain/resource';
import { RESOURCE_TYPE_TAGS, RESOURCE_TYPES, FilterPathTable, resourceTypeForId } from '../domain/resource-types';
import type { ResourceStore } from '../storage/store';
import { defineEc2Handler } from './common';
import { getString, getStringList, getStructList, paginate, parseFilters, parseTagList, requireString } from './params';

const TAG_FILTERS: FilterPathTable = {
  key: 'key',
  value: 'value',
  'resource-id': 'resourceId',
  'resource-type': 'resourceType',
};

/** Resolve every id before anything changes, so one bad id leaves all resources untouched. */
async function requireResources(store: ResourceStore, ids: string[]): Promise<Resource[]> {
  if (ids.length === 0) throw new ServiceException(missingParameterError('ResourceId'));
  const resources: Resource[] = [];
  for (const id of ids) {
    const resource = await store.find(id);
    if (resource) {
      resources.push(resource);
      continue;
    }
    const type = resourceTypeForId(id);
    if (!type) {
      throw new ServiceException(malformedParameterError(`The ID '${id}' is not valid`, 'InvalidID'));
    }
    throw new ServiceException(notFoundError(type, RESOURCE_TYPES[type].notFoundCode, id));
  }
  return resources;
}

export const tagsHandler = defineEc2Handler('tags', {
  async CreateTags(params, ctx) {
    const tags = parseTagList(params);
    if (tags.length === 0) throw new ServiceException(missingParameterError('Tag'));
    const resources = await requireResources(ctx.store, getStringList(params, 'ResourceId'));
    // All or nothing: no resource is tagged when one would exceed the limit.
    for (const resource of resources) checkTagLimit(mergeTags(resource.tags, tags), resource.id);
    for (const resource of resources) await ctx.store.tagResource(resource.id, tags);
    ctx.logger.debug('Tags created', { resources: resources.length, tags: tags.length });
    return { return: true };
  },

  async DeleteTags(params, ctx) {
    const resources = await requireResources(ctx.store, getStringList(params, 'ResourceId'));
    const refs: TagKeyRef[] = getStructList(params, 'Tag').map((entry) => ({
      key: requireString(entry, 'Key'),
      value: getString(entry, 'Value'),
    }));
    for (const resource of resources) {
      // Without a tag list every tag on the resource goes.
      const removal = refs.length > 0 ? refs : resource.tags.map((tag) => ({ key: tag.key }));
      await ctx.store.untagResource(resource.id, removal);
    }
    ctx.logger.debug('Tags deleted', { resources: resources.length });
    return { return: true };
  },

  async DescribeTags(params, ctx) {
    const rows: FilterSubject[] = [];
    for (const type of RESOURCE_TYPE_TAGS) {
      for (const resource of await ctx.store.list(type)) {
        for (const tag of resource.tags) {
          rows.push({
            attributes: { resourceId: resource.id, resourceType: type, key: tag.key, value: tag.value },
            tags: [],
          });
        }
      }
    }
    const page = paginate(evaluateAll(rows, parseFilters(params), TAG_FILTERS), params);
    return {
      tagSet: page.items.map((row) => row.attributes),
      ...(page.nextToken ? { nextToken: page.nextToken } : {}),
    };
  },
});
