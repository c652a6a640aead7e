/**
 * Security group actions.
 *
 * Rules are kept grouped by (protocol, port range) the way the provider
 * returns them. Authorize and revoke work on the individual sources inside
 * those groups: every source being authorized must be new, and every source
 * being revoked must exist.
 */

import {
  invalidParameterValueError,
  notFoundError,
  ServiceException,
  validationError,
} from '../domain/errors';
import { evaluateAll } from '../domain/filters';
import type { Resource } from '../domain/resource';
import { RESOURCE_TYPES } from '../domain/resource-types';
import type { ParameterTree, ValueMap, ValueTree } from '../domain/value-tree';
import type { HandlerContext } from '../gateway/types';
import type { ResourceStore } from '../storage/store';
import { parseCidr } from './cidr';
import { attrMaps, attrString, defineEc2Handler, tagSet } from './common';
import {
  getInteger,
  getString,
  getStringList,
  getStructList,
  paginate,
  parseFilters,
  parseTagSpecifications,
  requireString,
} from './params';
import { findDefaultVpc } from './vpc';

const PROTOCOL_NAMES: Record<string, string> = {
  '-1': '-1',
  all: '-1',
  tcp: 'tcp',
  '6': 'tcp',
  udp: 'udp',
  '17': 'udp',
  icmp: 'icmp',
  '1': 'icmp',
  icmpv6: 'icmpv6',
  '58': 'icmpv6',
};

const MAX_NAME_LENGTH = 255;

type Direction = 'ingress' | 'egress';

const PERMISSION_KEY: Record<Direction, string> = {
  ingress: 'ipPermissions',
  egress: 'ipPermissionsEgress',
};

/** One protocol/port/source triple. */
export interface AtomicRule {
  ipProtocol: string;
  fromPort?: number;
  toPort?: number;
  source: { kind: 'cidr' | 'cidr6' | 'group'; value: string; description?: string };
}

export function normalizeProtocol(raw: string): string {
  const lower = raw.toLowerCase();
  const known = PROTOCOL_NAMES[lower];
  if (known) return known;
  if (/^\d+$/.test(lower) && Number(lower) <= 255) return lower;
  throw new ServiceException(invalidParameterValueError('IpProtocol', raw, 'unknown protocol'));
}

function ruleKey(rule: AtomicRule): string {
  return [rule.ipProtocol, rule.fromPort ?? '', rule.toPort ?? '', rule.source.kind, rule.source.value].join('|');
}

function rangeKey(rule: AtomicRule): string {
  return [rule.ipProtocol, rule.fromPort ?? '', rule.toPort ?? ''].join('|');
}

function parsePorts(protocol: string, entry: ParameterTree): { fromPort?: number; toPort?: number } {
  if (protocol === '-1') return {};
  const isIcmp = protocol === 'icmp' || protocol === 'icmpv6';
  const min = isIcmp ? -1 : 0;
  const max = isIcmp ? 255 : 65535;
  const fromPort = getInteger(entry, 'FromPort', { min, max });
  const toPort = getInteger(entry, 'ToPort', { min, max });
  if (protocol === 'tcp' || protocol === 'udp') {
    if (fromPort === undefined || toPort === undefined) {
      throw new ServiceException(
        validationError('InvalidParameterValue', `FromPort and ToPort are required for protocol ${protocol}`),
      );
    }
    if (fromPort > toPort) {
      throw new ServiceException(
        validationError('InvalidParameterValue', `Invalid port range: ${fromPort} is greater than ${toPort}`),
      );
    }
  }
  return { fromPort, toPort };
}

function parsePermissionEntry(entry: ParameterTree, rules: AtomicRule[]): void {
  const ipProtocol = normalizeProtocol(requireString(entry, 'IpProtocol'));
  const ports = parsePorts(ipProtocol, entry);
  const before = rules.length;

  const legacyCidr = getString(entry, 'CidrIp');
  const ranges = getStructList(entry, 'IpRanges').map((range) => ({
    cidr: requireString(range, 'CidrIp'),
    description: getString(range, 'Description'),
  }));
  if (legacyCidr !== undefined) ranges.push({ cidr: legacyCidr, description: undefined });
  for (const range of ranges) {
    if (!parseCidr(range.cidr)) {
      throw new ServiceException(invalidParameterValueError('CidrIp', range.cidr, 'not a valid CIDR block'));
    }
    rules.push({ ipProtocol, ...ports, source: { kind: 'cidr', value: range.cidr, description: range.description } });
  }

  for (const range of getStructList(entry, 'Ipv6Ranges')) {
    const cidr = requireString(range, 'CidrIpv6');
    rules.push({ ipProtocol, ...ports, source: { kind: 'cidr6', value: cidr, description: getString(range, 'Description') } });
  }

  const legacyGroup = getString(entry, 'SourceSecurityGroupId');
  // The query wire name is `Groups`; `UserIdGroupPairs` is the model name some clients send.
  const pairEntries = getStructList(entry, 'Groups');
  const pairs = (pairEntries.length > 0 ? pairEntries : getStructList(entry, 'UserIdGroupPairs')).map((pair) =>
    requireString(pair, 'GroupId'),
  );
  if (legacyGroup !== undefined) pairs.push(legacyGroup);
  for (const groupId of pairs) {
    rules.push({ ipProtocol, ...ports, source: { kind: 'group', value: groupId } });
  }

  if (rules.length === before) {
    throw new ServiceException(
      validationError('InvalidParameterValue', 'At least one source must be specified for each permission'),
    );
  }
}

/** `IpPermissions.N` entries, or the single top-level permission of the legacy form. */
export function parsePermissions(params: ParameterTree): AtomicRule[] {
  const rules: AtomicRule[] = [];
  const entries = getStructList(params, 'IpPermissions');
  for (const entry of entries) parsePermissionEntry(entry, rules);
  if (entries.length === 0 && getString(params, 'IpProtocol') !== undefined) {
    parsePermissionEntry(params, rules);
  }
  if (rules.length === 0) {
    throw new ServiceException(validationError('MissingParameter', 'No permissions were specified'));
  }
  return rules;
}

function flattenPermissions(permissions: ValueMap[]): AtomicRule[] {
  const rules: AtomicRule[] = [];
  for (const permission of permissions) {
    const ipProtocol = attrString(permission, 'ipProtocol') ?? '-1';
    const fromPort = typeof permission.fromPort === 'number' ? permission.fromPort : undefined;
    const toPort = typeof permission.toPort === 'number' ? permission.toPort : undefined;
    const base = { ipProtocol, fromPort, toPort };
    for (const range of attrMaps(permission, 'ipRanges')) {
      rules.push({ ...base, source: { kind: 'cidr', value: attrString(range, 'cidrIp') ?? '', description: attrString(range, 'description') } });
    }
    for (const range of attrMaps(permission, 'ipv6Ranges')) {
      rules.push({ ...base, source: { kind: 'cidr6', value: attrString(range, 'cidrIpv6') ?? '', description: attrString(range, 'description') } });
    }
    for (const pair of attrMaps(permission, 'userIdGroupPairs')) {
      rules.push({ ...base, source: { kind: 'group', value: attrString(pair, 'groupId') ?? '' } });
    }
  }
  return rules;
}

function groupPermissions(rules: AtomicRule[], accountId: string): ValueMap[] {
  const grouped = new Map<string, ValueMap>();
  for (const rule of rules) {
    const key = rangeKey(rule);
    let permission = grouped.get(key);
    if (!permission) {
      permission = { ipProtocol: rule.ipProtocol, ipRanges: [], ipv6Ranges: [], userIdGroupPairs: [], prefixListIds: [] };
      if (rule.fromPort !== undefined) permission.fromPort = rule.fromPort;
      if (rule.toPort !== undefined) permission.toPort = rule.toPort;
      grouped.set(key, permission);
    }
    const { kind, value, description } = rule.source;
    const entry: ValueMap =
      kind === 'cidr' ? { cidrIp: value } : kind === 'cidr6' ? { cidrIpv6: value } : { groupId: value, userId: accountId };
    if (description !== undefined) entry.description = description;
    const listKey = kind === 'cidr' ? 'ipRanges' : kind === 'cidr6' ? 'ipv6Ranges' : 'userIdGroupPairs';
    const list = permission[listKey];
    if (Array.isArray(list)) list.push(entry);
  }
  return [...grouped.values()];
}

async function assertSourceGroupsExist(store: ResourceStore, rules: AtomicRule[]): Promise<void> {
  for (const rule of rules) {
    if (rule.source.kind !== 'group') continue;
    const source = await store.find(rule.source.value);
    if (!source || source.type !== 'security-group') {
      throw new ServiceException(
        notFoundError('security-group', RESOURCE_TYPES['security-group'].notFoundCode, rule.source.value),
      );
    }
  }
}

/** Resolve the target group from `GroupId`, or from `GroupName` in the default VPC. */
async function resolveGroup(store: ResourceStore, params: ParameterTree): Promise<Resource> {
  const groupId = getString(params, 'GroupId');
  if (groupId) return store.get('security-group', groupId);
  const groupName = getString(params, 'GroupName');
  if (!groupName) {
    throw new ServiceException(validationError('MissingParameter', 'Either GroupId or GroupName must be specified'));
  }
  const defaultVpc = await findDefaultVpc(store);
  const group = (await store.list('security-group')).find(
    (candidate) => candidate.attributes.groupName === groupName && (!defaultVpc || candidate.attributes.vpcId === defaultVpc.id),
  );
  if (!group) {
    throw new ServiceException(
      validationError('InvalidGroup.NotFound', `The security group '${groupName}' does not exist in default VPC`, {
        groupName,
      }),
    );
  }
  return group;
}

async function changePermissions(
  params: ParameterTree,
  ctx: HandlerContext,
  direction: Direction,
  change: 'authorize' | 'revoke',
): Promise<ValueMap> {
  const group = await resolveGroup(ctx.store, params);
  const rules = parsePermissions(params);
  if (change === 'authorize') await assertSourceGroupsExist(ctx.store, rules);

  const key = PERMISSION_KEY[direction];
  await ctx.store.update('security-group', group.id, (current) => {
    const existing = flattenPermissions(attrMaps(current.attributes, key));
    const present = new Set(existing.map(ruleKey));
    let next: AtomicRule[];

    if (change === 'authorize') {
      const duplicate = rules.find((rule) => present.has(ruleKey(rule)));
      if (duplicate) {
        throw new ServiceException(
          validationError(
            'InvalidPermission.Duplicate',
            `the specified rule "peer: ${duplicate.source.value}, ${duplicate.ipProtocol.toUpperCase()}, from port: ${duplicate.fromPort ?? '-1'}, to port: ${duplicate.toPort ?? '-1'}, ALLOW" already exists`,
          ),
        );
      }
      next = [...existing, ...rules];
    } else {
      const missing = rules.find((rule) => !present.has(ruleKey(rule)));
      if (missing) {
        throw new ServiceException(
          validationError(
            'InvalidPermission.NotFound',
            'The specified rule does not exist in this security group.',
            { source: missing.source.value },
          ),
        );
      }
      const removed = new Set(rules.map(ruleKey));
      next = existing.filter((rule) => !removed.has(ruleKey(rule)));
    }

    return { attributes: { ...current.attributes, [key]: groupPermissions(next, ctx.accountId) } };
  });

  ctx.logger.debug('Security group rules changed', { groupId: group.id, direction, change, rules: rules.length });
  return { return: true };
}

function renderPermissions(permissions: ValueMap[]): ValueTree[] {
  return permissions.map((permission) => {
    const { userIdGroupPairs, ...rest } = permission;
    return { ...rest, groups: userIdGroupPairs ?? [] };
  });
}

export function renderSecurityGroup(group: Resource): ValueMap {
  return {
    ownerId: group.attributes.ownerId,
    groupId: group.id,
    groupName: group.attributes.groupName,
    groupDescription: group.attributes.description,
    vpcId: group.attributes.vpcId,
    ipPermissions: renderPermissions(attrMaps(group.attributes, 'ipPermissions')),
    ipPermissionsEgress: renderPermissions(attrMaps(group.attributes, 'ipPermissionsEgress')),
    tagSet: tagSet(group.tags),
  };
}

export const securityGroupHandler = defineEc2Handler('security-group', {
  async CreateSecurityGroup(params, ctx) {
    const groupName = requireString(params, 'GroupName');
    const description = requireString(params, 'GroupDescription');
    if (groupName.length > MAX_NAME_LENGTH) {
      throw new ServiceException(invalidParameterValueError('GroupName', groupName, 'name is too long'));
    }
    if (groupName === 'default') {
      throw new ServiceException(
        validationError('InvalidGroup.Reserved', "The security group 'default' is reserved", { groupName }),
      );
    }

    let vpcId = getString(params, 'VpcId');
    if (!vpcId) {
      const defaultVpc = await findDefaultVpc(ctx.store);
      if (!defaultVpc) {
        throw new ServiceException(validationError('VPCIdNotSpecified', 'No default VPC for this user'));
      }
      vpcId = defaultVpc.id;
    }
    const tags = parseTagSpecifications(params, 'security-group');

    const groups = await ctx.store.list('security-group');
    if (groups.some((group) => group.attributes.vpcId === vpcId && group.attributes.groupName === groupName)) {
      throw new ServiceException(
        validationError('InvalidGroup.Duplicate', `The security group '${groupName}' already exists for VPC '${vpcId}'`, {
          groupName,
          vpcId,
        }),
      );
    }

    const group = await ctx.store.create(
      'security-group',
      {
        groupName,
        description,
        vpcId,
        ownerId: ctx.accountId,
        isDefault: false,
        ipPermissions: [],
        ipPermissionsEgress: [
          { ipProtocol: '-1', ipRanges: [{ cidrIp: '0.0.0.0/0' }], ipv6Ranges: [], userIdGroupPairs: [], prefixListIds: [] },
        ],
      },
      tags,
    );
    ctx.logger.info('Security group created', { groupId: group.id, vpcId });
    return { return: true, groupId: group.id, tagSet: tagSet(group.tags) };
  },

  async DescribeSecurityGroups(params, ctx) {
    const def = RESOURCE_TYPES['security-group'];
    let groups = await ctx.store.list('security-group');

    const ids = getStringList(params, 'GroupId');
    for (const id of ids) {
      if (!groups.some((group) => group.id === id)) {
        throw new ServiceException(notFoundError('security-group', def.notFoundCode, id));
      }
    }
    const names = getStringList(params, 'GroupName');
    for (const name of names) {
      if (!groups.some((group) => group.attributes.groupName === name)) {
        throw new ServiceException(
          validationError('InvalidGroup.NotFound', `The security group '${name}' does not exist`, { groupName: name }),
        );
      }
    }
    if (ids.length > 0) groups = groups.filter((group) => ids.includes(group.id));
    if (names.length > 0) groups = groups.filter((group) => names.includes(attrString(group.attributes, 'groupName') ?? ''));

    const page = paginate(evaluateAll(groups, parseFilters(params), def.filters), params);
    const body: ValueMap = { securityGroupInfo: page.items.map(renderSecurityGroup) };
    if (page.nextToken) body.nextToken = page.nextToken;
    return body;
  },

  async DeleteSecurityGroup(params, ctx) {
    const group = await resolveGroup(ctx.store, params);
    if (group.attributes.isDefault === true) {
      throw new ServiceException(
        validationError('CannotDelete', `the specified group: "${group.id}" name: "default" cannot be deleted by a user`),
      );
    }
    await ctx.store.delete('security-group', group.id);
    ctx.logger.info('Security group deleted', { groupId: group.id });
    return { return: true };
  },

  async AuthorizeSecurityGroupIngress(params, ctx) {
    return changePermissions(params, ctx, 'ingress', 'authorize');
  },

  async RevokeSecurityGroupIngress(params, ctx) {
    return changePermissions(params, ctx, 'ingress', 'revoke');
  },

  async AuthorizeSecurityGroupEgress(params, ctx) {
    return changePermissions(params, ctx, 'egress', 'authorize');
  },

  async RevokeSecurityGroupEgress(params, ctx) {
    return changePermissions(params, ctx, 'egress', 'revoke');
  },
});
