/**
 * Flat query-parameter decoding.
 *
 * Provider query requests encode nested structure in dotted keys:
 * `Filter.1.Name=a`, `Filter.1.Value.2=y`, `TagSpecification.1.Tag.1.Key=k`.
 * Numeric segments are 1-based sequence positions. The decoder rebuilds a
 * ParameterTree independent of the order the pairs arrive in.
 */

import { malformedParameterError, ServiceException } from '../domain/errors';
import type { ParameterTree, ValueTree } from '../domain/value-tree';

export interface QueryDecodeOptions {
  /** Accept gaps in sequence indices (compacted in index order). */
  allowSparseLists?: boolean;
  /** Segments that carry no structure, e.g. `member` in `Names.member.1`. */
  transparentSegments?: readonly string[];
}

interface TrieNode {
  value?: string;
  children: Map<string, TrieNode>;
}

const INDEX = /^[1-9]\d*$/;
const DIGITS = /^\d+$/;

function malformed(message: string): ServiceException {
  return new ServiceException(malformedParameterError(message, 'MalformedQueryString'));
}

function newNode(): TrieNode {
  return { children: new Map() };
}

function insert(root: TrieNode, key: string, value: string, transparent: ReadonlySet<string>): void {
  const segments = key.split('.');
  if (segments.some((segment) => segment.length === 0)) {
    throw malformed(`Invalid parameter name "${key}"`);
  }
  const path = segments.filter((segment) => !transparent.has(segment));
  if (path.length === 0) {
    throw malformed(`Invalid parameter name "${key}"`);
  }

  let node = root;
  for (const segment of path) {
    if (node.value !== undefined) {
      throw malformed(`Parameter "${key}" conflicts with a scalar parameter of the same prefix`);
    }
    let child = node.children.get(segment);
    if (!child) {
      child = newNode();
      node.children.set(segment, child);
    }
    node = child;
  }

  if (node.value !== undefined) {
    throw malformed(`Parameter "${key}" was specified more than once`);
  }
  if (node.children.size > 0) {
    throw malformed(`Parameter "${key}" conflicts with nested parameters of the same name`);
  }
  node.value = value;
}

function build(node: TrieNode, path: string, options: QueryDecodeOptions): ValueTree {
  if (node.value !== undefined) return node.value;

  const keys = [...node.children.keys()];
  const numeric = keys.filter((k) => DIGITS.test(k));
  if (numeric.length === 0) {
    const map: ParameterTree = {};
    for (const [key, child] of node.children) {
      map[key] = build(child, path ? `${path}.${key}` : key, options);
    }
    return map;
  }

  if (numeric.length !== keys.length) {
    throw malformed(`Parameter "${path}" mixes indexed and named members`);
  }
  const invalid = numeric.find((k) => !INDEX.test(k));
  if (invalid !== undefined) {
    throw malformed(`Invalid index "${invalid}" for parameter "${path}": indices start at 1`);
  }

  const indices = numeric.map(Number).sort((a, b) => a - b);
  if (!options.allowSparseLists) {
    const gap = indices.findIndex((index, position) => index !== position + 1);
    if (gap !== -1) {
      throw malformed(`Parameter "${path}" is missing index ${gap + 1}`);
    }
  }

  return indices.map((index) => {
    const child = node.children.get(String(index));
    if (!child) throw malformed(`Parameter "${path}" is missing index ${index}`);
    return build(child, `${path}.${index}`, options);
  });
}

/** Decode flat key/value pairs into a ParameterTree. */
export function decodeQueryParameters(
  pairs: Iterable<[string, string]>,
  options: QueryDecodeOptions = {},
): ParameterTree {
  const root = newNode();
  const transparent = new Set(options.transparentSegments ?? []);
  for (const [key, value] of pairs) {
    insert(root, key, value, transparent);
  }

  const tree: ParameterTree = {};
  for (const [key, child] of root.children) {
    if (DIGITS.test(key)) {
      throw malformed(`Invalid parameter name "${key}"`);
    }
    tree[key] = build(child, key, options);
  }
  return tree;
}

/** Collect key/value pairs from one or more urlencoded strings (query string, form body). */
export function parseFormPairs(...sources: string[]): [string, string][] {
  const pairs: [string, string][] = [];
  for (const source of sources) {
    if (!source) continue;
    for (const [key, value] of new URLSearchParams(source)) {
      pairs.push([key, value]);
    }
  }
  return pairs;
}
