/**
 * Generic value tree.
 *
 * Resource attributes, decoded request parameters and response bodies all
 * share this shape: a mapping, an ordered sequence, or a scalar. Keeping a
 * single tagged shape lets filtering, reference indexing and wire encoding
 * traverse any resource type without per-type field access.
 */

export type Scalar = string | number | boolean | null;

export type ValueTree = Scalar | ValueTree[] | ValueMap;

export interface ValueMap {
  [key: string]: ValueTree;
}

/** Decoded request parameters. Independent of the source encoding. */
export type ParameterTree = ValueMap;

export function isValueMap(value: ValueTree | undefined): value is ValueMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSequence(value: ValueTree | undefined): value is ValueTree[] {
  return Array.isArray(value);
}

export function isScalar(value: ValueTree | undefined): value is Scalar {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

/** Convert an arbitrary parsed JSON value into a ValueTree, or undefined if it cannot be represented. */
export function toValueTree(value: unknown): ValueTree | undefined {
  if (value === null) return null;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : undefined;
    case 'object': {
      if (Array.isArray(value)) {
        const items: ValueTree[] = [];
        for (const item of value) {
          const converted = toValueTree(item);
          if (converted === undefined) return undefined;
          items.push(converted);
        }
        return items;
      }
      const map: ValueMap = {};
      for (const [key, entry] of Object.entries(value)) {
        const converted = toValueTree(entry);
        if (converted === undefined) return undefined;
        map[key] = converted;
      }
      return map;
    }
    default:
      return undefined;
  }
}

/**
 * Resolve a dotted path against a tree, flattening sequences on the way.
 *
 * `"placement.availabilityZone"` yields one value; `"securityGroups.groupId"`
 * yields one value per group. Sequences at the end of the path are expanded
 * into their elements. Missing segments yield nothing.
 */
export function resolvePath(root: ValueTree, path: string): Scalar[] {
  const segments = path.split('.').filter((s) => s.length > 0);
  const out: Scalar[] = [];
  collect(root, segments, 0, out);
  return out;
}

function collect(node: ValueTree, segments: string[], index: number, out: Scalar[]): void {
  if (isSequence(node)) {
    for (const item of node) collect(item, segments, index, out);
    return;
  }
  if (index === segments.length) {
    if (isScalar(node)) out.push(node);
    return;
  }
  if (!isValueMap(node)) return;
  const child = node[segments[index]];
  if (child === undefined) return;
  collect(child, segments, index + 1, out);
}

/** Render a scalar the way it appears on the wire. */
export function scalarToString(value: Scalar): string {
  if (value === null) return '';
  return String(value);
}
