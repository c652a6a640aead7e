/**
 * In-memory storage implementation.
 *
 * Every public method does all of its work synchronously before its promise
 * settles, so each call is one critical section over the whole store: the
 * integrity check in delete and the removal it guards cannot interleave
 * with a concurrent create or update.
 */

import {
  dependencyViolationError,
  internalError,
  malformedParameterError,
  notFoundError,
  ServiceException,
  validationError,
} from '../domain/errors';
import { IdAllocator, IdAllocatorOptions } from '../domain/ids';
import { checkTagLimit, mergeTags, removeTags, Resource, Tag, TagKeyRef } from '../domain/resource';
import {
  RESOURCE_TYPE_TAGS,
  RESOURCE_TYPES,
  ResourceTypeDefinition,
  ResourceTypeTag,
  resourceTypeForId,
} from '../domain/resource-types';
import { resolvePath, ValueMap } from '../domain/value-tree';
import { ResourceMutator, ResourceStore } from './store';

export const MAX_TAG_KEY_LENGTH = 128;
export const MAX_TAG_VALUE_LENGTH = 256;

export interface MemoryStoreOptions extends IdAllocatorOptions {
  /** Timestamp source for `createdAt`. */
  now?: () => string;
}

interface ResolvedReference {
  id: string;
  type: ResourceTypeTag;
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

function validateTags(tags: Tag[]): void {
  for (const tag of tags) {
    if (tag.key.length === 0 || tag.key.length > MAX_TAG_KEY_LENGTH) {
      throw new ServiceException(
        validationError('InvalidParameterValue', `Tag key must be between 1 and ${MAX_TAG_KEY_LENGTH} characters`, {
          key: tag.key,
        }),
      );
    }
    if (tag.key.toLowerCase().startsWith('aws:')) {
      throw new ServiceException(
        validationError('InvalidParameterValue', `Tag keys starting with 'aws:' are reserved for internal use`, {
          key: tag.key,
        }),
      );
    }
    if (tag.value.length > MAX_TAG_VALUE_LENGTH) {
      throw new ServiceException(
        validationError('InvalidParameterValue', `Tag value must be at most ${MAX_TAG_VALUE_LENGTH} characters`, {
          key: tag.key,
        }),
      );
    }
  }
}

function collectReferences(def: ResourceTypeDefinition, attributes: ValueMap): ResolvedReference[] {
  const refs: ResolvedReference[] = [];
  for (const field of def.references) {
    for (const value of resolvePath(attributes, field.path)) {
      if (typeof value === 'string' && value.length > 0) {
        refs.push({ id: value, type: field.type });
      }
    }
  }
  return refs;
}

class MemoryResourceStore implements ResourceStore {
  private readonly data = new Map<ResourceTypeTag, Map<string, Resource>>();
  /** Every id ever allocated, per type. Ids are never reused. */
  private readonly issued = new Map<ResourceTypeTag, Set<string>>();
  /** Live id → type, for lookups by id alone. */
  private readonly owners = new Map<string, ResourceTypeTag>();
  /** Referenced id → ids of resources referencing it. */
  private readonly referencedBy = new Map<string, Set<string>>();
  /** Referencing id → ids it references. */
  private readonly outgoing = new Map<string, Set<string>>();
  private readonly allocator: IdAllocator;
  private readonly now: () => string;

  constructor(options: MemoryStoreOptions) {
    for (const tag of RESOURCE_TYPE_TAGS) {
      this.data.set(tag, new Map());
      this.issued.set(tag, new Set());
    }
    this.allocator = new IdAllocator(options);
    this.now = options.now ?? (() => new Date().toISOString());
  }

  async create(type: ResourceTypeTag, attributes: ValueMap, tags: Tag[] = []): Promise<Resource> {
    const def = RESOURCE_TYPES[type];
    const attrs = deepCopy(attributes);
    validateTags(tags);
    const refs = collectReferences(def, attrs);
    this.assertReferencesExist(refs);

    const issued = this.issuedFor(type);
    const id = this.allocator.allocate(type, (candidate) => issued.has(candidate));
    const resourceTags = mergeTags([], tags);
    checkTagLimit(resourceTags, id);

    const resource: Resource = {
      type,
      id,
      attributes: attrs,
      tags: resourceTags,
      createdAt: this.now(),
      state: def.initialState,
    };

    issued.add(id);
    this.tableFor(type).set(id, resource);
    this.owners.set(id, type);
    this.indexReferences(id, refs);
    return deepCopy(resource);
  }

  async get(type: ResourceTypeTag, id: string): Promise<Resource> {
    return deepCopy(this.require(type, id));
  }

  async find(id: string): Promise<Resource | null> {
    const resource = this.lookup(id);
    return resource ? deepCopy(resource) : null;
  }

  async list(type: ResourceTypeTag): Promise<Resource[]> {
    return [...this.tableFor(type).values()].map(deepCopy);
  }

  async update(type: ResourceTypeTag, id: string, mutator: ResourceMutator): Promise<Resource> {
    const def = RESOURCE_TYPES[type];
    const existing = this.require(type, id);
    const mutation = mutator(deepCopy(existing));

    const attributes = mutation.attributes ? deepCopy(mutation.attributes) : existing.attributes;
    const state = mutation.state ?? existing.state;
    if (!def.states.includes(state)) {
      throw new ServiceException(
        internalError(`Invalid state "${state}" for ${type}`, { resourceId: id, states: [...def.states] }),
      );
    }

    // Only newly added references are checked: a terminated instance may still
    // name a subnet that has since been deleted.
    const refs = collectReferences(def, attributes);
    const previous = this.outgoing.get(id) ?? new Set<string>();
    this.assertReferencesExist(refs.filter((ref) => !previous.has(ref.id)));

    const updated: Resource = { ...existing, attributes, state };
    this.tableFor(type).set(id, updated);
    this.unindexReferences(id);
    this.indexReferences(id, refs);
    return deepCopy(updated);
  }

  async delete(type: ResourceTypeTag, id: string): Promise<void> {
    const target = this.require(type, id);
    const removal = new Map<string, Resource>([[id, target]]);
    const blockers: string[] = [];
    this.planRemoval(target, removal, blockers);

    if (blockers.length > 0) {
      throw new ServiceException(dependencyViolationError(type, id, blockers));
    }

    for (const resource of removal.values()) {
      this.tableFor(resource.type).delete(resource.id);
      this.owners.delete(resource.id);
      this.unindexReferences(resource.id);
      this.referencedBy.delete(resource.id);
    }
  }

  async tagResource(id: string, tags: Tag[]): Promise<Resource> {
    const existing = this.requireById(id);
    validateTags(tags);
    const merged = mergeTags(existing.tags, tags);
    checkTagLimit(merged, id);
    const updated: Resource = { ...existing, tags: merged };
    this.tableFor(existing.type).set(id, updated);
    return deepCopy(updated);
  }

  async untagResource(id: string, refs: TagKeyRef[]): Promise<Resource> {
    const existing = this.requireById(id);
    const updated: Resource = { ...existing, tags: removeTags(existing.tags, refs) };
    this.tableFor(existing.type).set(id, updated);
    return deepCopy(updated);
  }

  async dependentsOf(id: string): Promise<string[]> {
    return [...(this.referencedBy.get(id) ?? [])];
  }

  /**
   * Walk the live referencers of `resource`. Those covered by a cascade rule
   * join the removal set (and have their own referencers checked); the rest
   * are blockers. References held by resources in a terminal state are ignored.
   */
  private planRemoval(resource: Resource, removal: Map<string, Resource>, blockers: string[]): void {
    const def = RESOURCE_TYPES[resource.type];
    for (const referencingId of this.referencedBy.get(resource.id) ?? []) {
      if (removal.has(referencingId)) continue;
      const referencing = this.lookup(referencingId);
      if (!referencing) continue;
      if (RESOURCE_TYPES[referencing.type].terminalStates.includes(referencing.state)) continue;

      const cascades = def.cascade.some(
        (rule) => rule.type === referencing.type && (!rule.when || rule.when(referencing)),
      );
      if (!cascades) {
        blockers.push(referencingId);
        continue;
      }
      removal.set(referencingId, referencing);
      this.planRemoval(referencing, removal, blockers);
    }
  }

  private assertReferencesExist(refs: ResolvedReference[]): void {
    for (const ref of refs) {
      if (!this.tableFor(ref.type).has(ref.id)) {
        throw new ServiceException(notFoundError(ref.type, RESOURCE_TYPES[ref.type].notFoundCode, ref.id));
      }
    }
  }

  private indexReferences(id: string, refs: ResolvedReference[]): void {
    const targets = new Set(refs.map((ref) => ref.id));
    targets.delete(id);
    if (targets.size === 0) return;
    this.outgoing.set(id, targets);
    for (const target of targets) {
      let referencing = this.referencedBy.get(target);
      if (!referencing) {
        referencing = new Set();
        this.referencedBy.set(target, referencing);
      }
      referencing.add(id);
    }
  }

  private unindexReferences(id: string): void {
    const targets = this.outgoing.get(id);
    if (!targets) return;
    for (const target of targets) {
      const referencing = this.referencedBy.get(target);
      if (!referencing) continue;
      referencing.delete(id);
      if (referencing.size === 0) this.referencedBy.delete(target);
    }
    this.outgoing.delete(id);
  }

  private require(type: ResourceTypeTag, id: string): Resource {
    const resource = this.tableFor(type).get(id);
    if (!resource) {
      throw new ServiceException(notFoundError(type, RESOURCE_TYPES[type].notFoundCode, id));
    }
    return resource;
  }

  private requireById(id: string): Resource {
    const resource = this.lookup(id);
    if (resource) return resource;
    const type = resourceTypeForId(id);
    if (!type) {
      throw new ServiceException(malformedParameterError(`The ID '${id}' is not valid`, 'InvalidID'));
    }
    throw new ServiceException(notFoundError(type, RESOURCE_TYPES[type].notFoundCode, id));
  }

  private lookup(id: string): Resource | undefined {
    const type = this.owners.get(id);
    return type ? this.tableFor(type).get(id) : undefined;
  }

  private tableFor(type: ResourceTypeTag): Map<string, Resource> {
    let table = this.data.get(type);
    if (!table) {
      table = new Map();
      this.data.set(type, table);
    }
    return table;
  }

  private issuedFor(type: ResourceTypeTag): Set<string> {
    let issued = this.issued.get(type);
    if (!issued) {
      issued = new Set();
      this.issued.set(type, issued);
    }
    return issued;
  }
}

/** Create an in-memory resource store. */
export function createMemoryStore(options: MemoryStoreOptions = {}): ResourceStore {
  return new MemoryResourceStore(options);
}
