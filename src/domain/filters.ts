/**
 * Filter evaluator for "describe" operations.
 *
 * A subject matches when it satisfies every filter (AND), and a filter is
 * satisfied when any resolved value matches any of the filter's values
 * (OR). Filter names are resolved through the resource type's filter path
 * table; names the table does not know match nothing.
 */

import type { Tag } from './resource';
import type { FilterPathTable } from './resource-types';
import { resolvePath, scalarToString, ValueMap } from './value-tree';

export interface Filter {
  name: string;
  values: string[];
}

/** Anything with an attribute tree and tags. Resources satisfy this shape. */
export interface FilterSubject {
  id?: string;
  state?: string;
  attributes: ValueMap;
  tags: Tag[];
}

const TAG_PREFIX = 'tag:';

/** Whether a filter value uses glob syntax. Plain values match exactly. */
export function isGlob(pattern: string): boolean {
  return pattern.includes('*') || pattern.includes('?');
}

const globCache = new Map<string, RegExp>();

/** Compile a glob (`*` any run, `?` one character, `\` escapes) into an anchored RegExp. */
export function globToRegExp(pattern: string): RegExp {
  const cached = globCache.get(pattern);
  if (cached) return cached;

  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '\\' && i + 1 < pattern.length) {
      source += escapeRegExp(pattern[++i]);
    } else if (ch === '*') {
      source += '[\\s\\S]*';
    } else if (ch === '?') {
      source += '[\\s\\S]';
    } else {
      source += escapeRegExp(ch);
    }
  }
  const compiled = new RegExp(`^${source}$`);
  globCache.set(pattern, compiled);
  return compiled;
}

function escapeRegExp(ch: string): string {
  return ch.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

export function matchesPattern(candidate: string, pattern: string): boolean {
  if (!isGlob(pattern)) return candidate === pattern;
  return globToRegExp(pattern).test(candidate);
}

/**
 * Resolve the candidate values a filter name addresses on a subject.
 * Returns undefined when the name is not a known filter.
 */
export function resolveFilterValues(
  subject: FilterSubject,
  name: string,
  paths: FilterPathTable,
): string[] | undefined {
  if (name.startsWith(TAG_PREFIX)) {
    const key = name.slice(TAG_PREFIX.length);
    return subject.tags.filter((tag) => tag.key === key).map((tag) => tag.value);
  }
  if (name === 'tag-key') return subject.tags.map((tag) => tag.key);
  if (name === 'tag-value') return subject.tags.map((tag) => tag.value);

  if (!Object.prototype.hasOwnProperty.call(paths, name)) return undefined;
  const path = paths[name];
  if (path === '$id') return subject.id === undefined ? [] : [subject.id];
  if (path === '$state') return subject.state === undefined ? [] : [subject.state];
  return resolvePath(subject.attributes, path).map(scalarToString);
}

export function evaluate(subject: FilterSubject, filters: readonly Filter[], paths: FilterPathTable): boolean {
  return filters.every((filter) => {
    const candidates = resolveFilterValues(subject, filter.name, paths);
    if (!candidates) return false;
    return filter.values.some((pattern) => candidates.some((candidate) => matchesPattern(candidate, pattern)));
  });
}

/** Keep the subjects that match every filter, in input order. */
export function evaluateAll<T extends FilterSubject>(
  subjects: readonly T[],
  filters: readonly Filter[],
  paths: FilterPathTable,
): T[] {
  if (filters.length === 0) return [...subjects];
  return subjects.filter((subject) => evaluate(subject, filters, paths));
}
