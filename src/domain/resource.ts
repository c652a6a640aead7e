/**
 * Resource domain model.
 *
 * A resource is one emulated cloud object. Its per-type shape lives in the
 * generic `attributes` tree; `tags` and `state` are tracked uniformly so the
 * store and the filter evaluator never need per-type code.
 */

import { ServiceException, validationError } from './errors';
import type { ResourceTypeTag } from './resource-types';
import type { ValueMap } from './value-tree';

export interface Tag {
  key: string;
  value: string;
}

export interface Resource {
  type: ResourceTypeTag;
  id: string;
  attributes: ValueMap;
  /** Keyed by tag key; enumeration follows first-assignment order. */
  tags: Tag[];
  createdAt: string;
  state: string;
}

/** Change applied through the store's update primitive. */
export interface ResourceMutation {
  /** Replaces the attribute tree when present. */
  attributes?: ValueMap;
  state?: string;
}

/** Tag removal request. A value, when given, must match for the tag to be removed. */
export interface TagKeyRef {
  key: string;
  value?: string;
}

/** Merge tags into a tag list: existing keys are overwritten in place, new keys appended. */
export const MAX_TAGS_PER_RESOURCE = 50;

/** Throws TagLimitExceeded when `tags` would put resource `id` over the limit. */
export function checkTagLimit(tags: Tag[], id: string): void {
  if (tags.length > MAX_TAGS_PER_RESOURCE) {
    throw new ServiceException(
      validationError('TagLimitExceeded', `The maximum number of tags (${MAX_TAGS_PER_RESOURCE}) for resource ${id} has been exceeded`),
    );
  }
}

export function mergeTags(existing: Tag[], incoming: Tag[]): Tag[] {
  const merged = new Map<string, string>();
  for (const tag of existing) merged.set(tag.key, tag.value);
  for (const tag of incoming) merged.set(tag.key, tag.value);
  return [...merged].map(([key, value]) => ({ key, value }));
}

/** Remove tags by key (and optionally by value). */
export function removeTags(existing: Tag[], refs: TagKeyRef[]): Tag[] {
  return existing.filter(
    (tag) => !refs.some((ref) => ref.key === tag.key && (ref.value === undefined || ref.value === tag.value)),
  );
}
