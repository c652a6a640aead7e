/**
 * Parameter access helpers shared by the EC2 handlers.
 *
 * Decoded parameters arrive in the provider's request naming (PascalCase,
 * `Filter.N`, `TagSpecification.N`). These helpers read them with the
 * provider's error codes for missing or invalid values.
 */

import {
  invalidParameterValueError,
  malformedParameterError,
  missingParameterError,
  ServiceException,
  validationError,
} from '../domain/errors';
import type { Filter } from '../domain/filters';
import type { Tag } from '../domain/resource';
import {
  isScalar,
  isSequence,
  isValueMap,
  ParameterTree,
  scalarToString,
  ValueMap,
  ValueTree,
} from '../domain/value-tree';

export function getString(params: ParameterTree, name: string): string | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  if (isScalar(value)) return scalarToString(value);
  if (isSequence(value) && value.length === 1 && isScalar(value[0])) return scalarToString(value[0]);
  throw new ServiceException(invalidParameterValueError(name, '[structure]', 'expected a single value'));
}

export function requireString(params: ParameterTree, name: string): string {
  const value = getString(params, name);
  if (value === undefined || value === '') {
    throw new ServiceException(missingParameterError(name));
  }
  return value;
}

/** A list of scalars (`Name.N`), or a single scalar treated as a one-element list. */
export function getStringList(params: ParameterTree, name: string): string[] {
  const value = params[name];
  if (value === undefined || value === null) return [];
  if (isScalar(value)) return [scalarToString(value)];
  if (isSequence(value) && value.every(isScalar)) {
    return value.map((item) => scalarToString(item));
  }
  throw new ServiceException(invalidParameterValueError(name, '[structure]', 'expected a list of values'));
}

export function getBoolean(params: ParameterTree, name: string): boolean | undefined {
  const value = getString(params, name);
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new ServiceException(invalidParameterValueError(name, value, 'expected true or false'));
}

/** A `{ Value: bool }` attribute structure, as used by Modify*Attribute actions. */
export function getBooleanAttribute(params: ParameterTree, name: string): boolean | undefined {
  const value = params[name];
  if (isValueMap(value)) return getBoolean(value, 'Value');
  return getBoolean(params, name);
}

export function getInteger(
  params: ParameterTree,
  name: string,
  bounds: { min?: number; max?: number } = {},
): number | undefined {
  const raw = getString(params, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!/^-?\d+$/.test(raw.trim()) || !Number.isSafeInteger(value)) {
    throw new ServiceException(invalidParameterValueError(name, raw, 'expected an integer'));
  }
  if ((bounds.min !== undefined && value < bounds.min) || (bounds.max !== undefined && value > bounds.max)) {
    throw new ServiceException(
      invalidParameterValueError(name, raw, `expected a value between ${bounds.min ?? '-∞'} and ${bounds.max ?? '∞'}`),
    );
  }
  return value;
}

/** A list of structures (`Name.N.Member`). A single structure is treated as a one-element list. */
export function getStructList(params: ParameterTree, name: string): ValueMap[] {
  const value = params[name];
  if (value === undefined || value === null) return [];
  if (isValueMap(value)) return [value];
  if (isSequence(value)) {
    return value.map((item) => {
      if (!isValueMap(item)) {
        throw new ServiceException(invalidParameterValueError(name, scalarOrMarker(item), 'expected a structure'));
      }
      return item;
    });
  }
  throw new ServiceException(invalidParameterValueError(name, scalarOrMarker(value), 'expected a list of structures'));
}

export function getStruct(params: ParameterTree, name: string): ValueMap | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  if (isValueMap(value)) return value;
  throw new ServiceException(invalidParameterValueError(name, scalarOrMarker(value), 'expected a structure'));
}

function scalarOrMarker(value: ValueTree): string {
  return isScalar(value) ? scalarToString(value) : '[structure]';
}

/** `Filter.N.Name` / `Filter.N.Value.M` → ordered filter list. */
export function parseFilters(params: ParameterTree): Filter[] {
  return getStructList(params, 'Filter').map((entry, index) => {
    const name = getString(entry, 'Name');
    if (!name) {
      throw new ServiceException(
        malformedParameterError(`The filter 'Filter.${index + 1}' is missing a Name`, 'InvalidParameterValue'),
      );
    }
    return { name, values: getStringList(entry, 'Value') };
  });
}

/** `Tag.N.Key` / `Tag.N.Value` under `name`. */
export function parseTagList(params: ParameterTree, name = 'Tag'): Tag[] {
  return getStructList(params, name).map((entry) => ({
    key: requireString(entry, 'Key'),
    value: getString(entry, 'Value') ?? '',
  }));
}

/**
 * Tags from the `TagSpecification.N` entries for `resourceType`. Entries for
 * other types in `allowedTypes` are skipped (their resources are tagged
 * elsewhere); any other resource type is rejected.
 */
export function parseTagSpecifications(
  params: ParameterTree,
  resourceType: string,
  allowedTypes: readonly string[] = [resourceType],
): Tag[] {
  const tags: Tag[] = [];
  for (const spec of getStructList(params, 'TagSpecification')) {
    const specType = getString(spec, 'ResourceType') ?? resourceType;
    if (!allowedTypes.includes(specType)) {
      throw new ServiceException(
        validationError(
          'InvalidParameterValue',
          `'${specType}' is not a valid taggable resource type for this operation.`,
          { resourceType: specType },
        ),
      );
    }
    if (specType === resourceType) tags.push(...parseTagList(spec));
  }
  return tags;
}

export interface Page<T> {
  items: T[];
  nextToken?: string;
}

/** Slice a result list by `MaxResults` / `NextToken`. Tokens are opaque base64 offsets. */
export function paginate<T>(items: T[], params: ParameterTree, maxLimit = 1000): Page<T> {
  const limit = getInteger(params, 'MaxResults', { min: 1, max: maxLimit });
  const token = getString(params, 'NextToken');

  let offset = 0;
  if (token) {
    const decoded = Number(Buffer.from(token, 'base64').toString('utf8'));
    if (!Number.isInteger(decoded) || decoded < 0) {
      throw new ServiceException(validationError('InvalidNextToken', 'The specified token is invalid'));
    }
    offset = decoded;
  }

  if (limit === undefined) return { items: items.slice(offset) };
  const end = offset + limit;
  return {
    items: items.slice(offset, end),
    nextToken: end < items.length ? Buffer.from(String(end), 'utf8').toString('base64') : undefined,
  };
}
