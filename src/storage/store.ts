/**
 * Storage layer interface.
 *
 * The resource store owns all emulated state. Handlers never touch the
 * underlying maps: every mutation goes through these primitives so ID
 * allocation, reference indexing and delete-time integrity checks are
 * enforced in one place. Every value passed in or returned is a copy.
 */

import type { Resource, ResourceMutation, Tag, TagKeyRef } from '../domain/resource';
import type { ResourceTypeTag } from '../domain/resource-types';
import type { ValueMap } from '../domain/value-tree';

export type ResourceMutator = (current: Resource) => ResourceMutation;

export interface ResourceStore {
  /**
   * Create a resource in its type's initial state with a freshly allocated id.
   * Rejects tags that break the provider's tag rules, and references to
   * resources that do not exist.
   */
  create(type: ResourceTypeTag, attributes: ValueMap, tags?: Tag[]): Promise<Resource>;

  /** Fetch a resource or throw the type's not-found error. */
  get(type: ResourceTypeTag, id: string): Promise<Resource>;

  /** Look a resource up by id alone, whatever its type. */
  find(id: string): Promise<Resource | null>;

  /** All resources of a type in insertion order. */
  list(type: ResourceTypeTag): Promise<Resource[]>;

  /** Apply a mutation computed from the current resource. Nothing changes if the mutator throws. */
  update(type: ResourceTypeTag, id: string, mutator: ResourceMutator): Promise<Resource>;

  /**
   * Remove a resource. Fails with DependencyViolation while live resources
   * reference it, except those the type's cascade rules remove with it.
   */
  delete(type: ResourceTypeTag, id: string): Promise<void>;

  /** Merge tags into a resource's tag set (existing keys are overwritten). */
  tagResource(id: string, tags: Tag[]): Promise<Resource>;

  /** Remove tags by key, or by key and value. */
  untagResource(id: string, refs: TagKeyRef[]): Promise<Resource>;

  /** Ids of resources whose reference fields currently point at `id`. */
  dependentsOf(id: string): Promise<string[]>;
}
