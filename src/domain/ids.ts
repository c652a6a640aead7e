/**
 * Resource ID allocation.
 *
 * IDs follow the provider's `<prefix>-<hex>` convention. The format is
 * deterministic, the value is random; collisions are regenerated a bounded
 * number of times before allocation fails with an internal error.
 */

import { randomBytes } from 'crypto';
import { internalError, ServiceException } from './errors';
import {
  ID_SUFFIX_LENGTH,
  IdFormat,
  RESOURCE_TYPES,
  ResourceTypeTag,
} from './resource-types';

/** Produces `length` lowercase hex characters. */
export type HexSource = (length: number) => string;

export const randomHex: HexSource = (length) =>
  randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length);

export const MAX_ID_ATTEMPTS = 8;

/** Build an id such as `vpc-0a1b2c3d4e5f60718` for auxiliary objects (reservations, associations). */
export function generateId(prefix: string, format: IdFormat = 'long', hex: HexSource = randomHex): string {
  return `${prefix}-${hex(ID_SUFFIX_LENGTH[format])}`;
}

export interface IdAllocatorOptions {
  /** Types that use the short legacy format regardless of their default. */
  legacyTypes?: readonly ResourceTypeTag[];
  hex?: HexSource;
}

export class IdAllocator {
  private readonly legacyTypes: ReadonlySet<ResourceTypeTag>;
  private readonly hex: HexSource;

  constructor(options: IdAllocatorOptions = {}) {
    this.legacyTypes = new Set(options.legacyTypes ?? []);
    this.hex = options.hex ?? randomHex;
  }

  formatFor(type: ResourceTypeTag): IdFormat {
    return this.legacyTypes.has(type) ? 'short' : RESOURCE_TYPES[type].idFormat;
  }

  /**
   * Allocate a fresh id for `type`. `isTaken` must report ids already in use;
   * it is consulted for every candidate.
   */
  allocate(type: ResourceTypeTag, isTaken: (id: string) => boolean): string {
    const prefix = RESOURCE_TYPES[type].idPrefix;
    const format = this.formatFor(type);
    for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt++) {
      const candidate = generateId(prefix, format, this.hex);
      if (!isTaken(candidate)) return candidate;
    }
    throw new ServiceException(
      internalError(`Failed to allocate a unique ${type} id after ${MAX_ID_ATTEMPTS} attempts`, {
        resourceType: type,
      }),
    );
  }
}
