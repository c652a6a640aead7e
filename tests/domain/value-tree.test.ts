import { isScalar, isSequence, isValueMap, resolvePath, scalarToString, toValueTree } from '../../src/domain/value-tree';

describe('value tree', () => {
  const instance = {
    placement: { availabilityZone: 'us-east-1a' },
    securityGroups: [{ groupId: 'sg-1' }, { groupId: 'sg-2' }],
    blockDevices: [[{ size: 8 }], [{ size: 20 }]],
  };

  test('resolves a nested mapping path to one value', () => {
    expect(resolvePath(instance, 'placement.availabilityZone')).toEqual(['us-east-1a']);
  });

  test('flattens sequences along the path', () => {
    expect(resolvePath(instance, 'securityGroups.groupId')).toEqual(['sg-1', 'sg-2']);
    expect(resolvePath(instance, 'blockDevices.size')).toEqual([8, 20]);
  });

  test('missing segments yield nothing', () => {
    expect(resolvePath(instance, 'placement.tenancy')).toEqual([]);
    expect(resolvePath(instance, 'nope.deeper')).toEqual([]);
  });

  test('a path ending on a mapping yields nothing', () => {
    expect(resolvePath(instance, 'placement')).toEqual([]);
  });

  test('sequence at the end of a path expands into scalars', () => {
    expect(resolvePath({ names: ['a', 'b'] }, 'names')).toEqual(['a', 'b']);
  });

  test('type guards distinguish the three shapes', () => {
    expect(isValueMap({})).toBe(true);
    expect(isValueMap([])).toBe(false);
    expect(isValueMap(null)).toBe(false);
    expect(isSequence([1])).toBe(true);
    expect(isScalar(null)).toBe(true);
    expect(isScalar('x')).toBe(true);
    expect(isScalar({})).toBe(false);
  });

  test('toValueTree converts parsed JSON and rejects what it cannot hold', () => {
    expect(toValueTree({ a: [1, 'b', true, null] })).toEqual({ a: [1, 'b', true, null] });
    expect(toValueTree({ a: undefined })).toBeUndefined();
    expect(toValueTree(Number.NaN)).toBeUndefined();
  });

  test('scalars render as wire strings', () => {
    expect(scalarToString(null)).toBe('');
    expect(scalarToString(true)).toBe('true');
    expect(scalarToString(42)).toBe('42');
  });
});
