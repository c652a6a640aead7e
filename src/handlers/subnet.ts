/**
 * Subnet actions and private address bookkeeping.
 *
 * A subnet tracks the host addresses handed out to instances so that
 * `availableIpAddressCount` reflects what is actually free.
 */

import { invalidParameterValueError, ServiceException, validationError } from '../domain/errors';
import type { Resource, Tag } from '../domain/resource';
import type { ValueMap } from '../domain/value-tree';
import type { ResourceStore } from '../storage/store';
import { contains, hostAddress, Ipv4Block, overlaps, parseCidr, parseIpv4, usableAddressCount } from './cidr';
import { attrMaps, attrString, defineEc2Handler, describeResources, tagSet } from './common';
import { getBooleanAttribute, getString, parseTagSpecifications, requireString } from './params';
import { findAvailabilityZone } from './regions';
import { vpcCidr } from './vpc';

export const SUBNET_MIN_PREFIX = 16;
export const SUBNET_MAX_PREFIX = 28;

export interface SubnetSpec {
  vpcId: string;
  cidrBlock: string;
  availabilityZone?: string;
  defaultForAz?: boolean;
  mapPublicIpOnLaunch?: boolean;
  tags?: Tag[];
}

export interface SubnetScope {
  region: string;
  accountId: string;
}

function requireBlock(name: string, cidr: string): Ipv4Block {
  const block = parseCidr(cidr);
  if (!block) {
    throw new ServiceException(invalidParameterValueError(name, cidr, 'not a valid CIDR block'));
  }
  return block;
}

/** Validate and create a subnet inside an existing VPC. */
export async function createSubnet(store: ResourceStore, scope: SubnetScope, spec: SubnetSpec): Promise<Resource> {
  const vpc = await store.get('vpc', spec.vpcId);
  const block = requireBlock('CidrBlock', spec.cidrBlock);
  const vpcBlock = requireBlock('CidrBlock', vpcCidr(vpc));

  if (block.prefixLength < SUBNET_MIN_PREFIX || block.prefixLength > SUBNET_MAX_PREFIX || !contains(vpcBlock, block)) {
    throw new ServiceException(
      validationError('InvalidSubnet.Range', `The CIDR '${spec.cidrBlock}' is invalid.`, { cidrBlock: spec.cidrBlock }),
    );
  }

  const siblings = (await store.list('subnet')).filter((subnet) => subnet.attributes.vpcId === vpc.id);
  for (const sibling of siblings) {
    const siblingBlock = parseCidr(attrString(sibling.attributes, 'cidrBlock') ?? '');
    if (siblingBlock && overlaps(block, siblingBlock)) {
      throw new ServiceException(
        validationError('InvalidSubnet.Conflict', `The CIDR '${spec.cidrBlock}' conflicts with another subnet`, {
          cidrBlock: spec.cidrBlock,
          conflictsWith: sibling.id,
        }),
      );
    }
  }

  const zoneName = spec.availabilityZone ?? `${scope.region}a`;
  const zone = findAvailabilityZone(scope.region, zoneName);
  if (!zone) {
    throw new ServiceException(
      validationError('InvalidParameterValue', `Value (${zoneName}) for parameter availabilityZone is invalid.`, {
        availabilityZone: zoneName,
      }),
    );
  }

  const subnet = await store.create(
    'subnet',
    {
      vpcId: vpc.id,
      cidrBlock: spec.cidrBlock,
      availabilityZone: zone.zoneName,
      availabilityZoneId: zone.zoneId,
      availableIpAddressCount: usableAddressCount(block),
      defaultForAz: spec.defaultForAz ?? false,
      mapPublicIpOnLaunch: spec.mapPublicIpOnLaunch ?? false,
      assignIpv6AddressOnCreation: false,
      ownerId: scope.accountId,
      ipv6CidrBlockAssociationSet: [],
      allocatedAddresses: [],
    },
    spec.tags,
  );

  return store.update('subnet', subnet.id, (current) => ({
    attributes: {
      ...current.attributes,
      subnetArn: `arn:aws:ec2:${scope.region}:${scope.accountId}:subnet/${subnet.id}`,
    },
  }));
}

function allocatedAddresses(subnet: Resource): string[] {
  const value = subnet.attributes.allocatedAddresses;
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Reserve the lowest free host address in a subnet. An explicitly requested
 * address must lie inside the subnet and be free.
 */
export async function allocatePrivateIp(store: ResourceStore, subnetId: string, requested?: string): Promise<string> {
  let assigned = '';
  await store.update('subnet', subnetId, (current) => {
    const block = requireBlock('CidrBlock', attrString(current.attributes, 'cidrBlock') ?? '');
    const taken = new Set(allocatedAddresses(current));
    const capacity = usableAddressCount(block);

    if (requested !== undefined) {
      const address = parseIpv4(requested);
      const index = address === undefined ? -1 : address - block.network - 4;
      if (hostAddress(block, index) !== requested) {
        throw new ServiceException(
          validationError('InvalidParameterValue', `Address ${requested} does not fall within the subnet's address range`),
        );
      }
      if (taken.has(requested)) {
        throw new ServiceException(
          validationError('InvalidIPAddress.InUse', `Address ${requested} is in use.`, { address: requested }),
        );
      }
      assigned = requested;
    } else {
      for (let index = 0; index < capacity && !assigned; index++) {
        const candidate = hostAddress(block, index);
        if (candidate && !taken.has(candidate)) assigned = candidate;
      }
      if (!assigned) {
        throw new ServiceException(
          validationError(
            'InsufficientFreeAddressesInSubnet',
            `There are not enough free addresses in subnet '${subnetId}' to satisfy the requested number of instances.`,
          ),
        );
      }
    }

    const addresses = [...taken, assigned];
    return {
      attributes: {
        ...current.attributes,
        allocatedAddresses: addresses,
        availableIpAddressCount: capacity - addresses.length,
      },
    };
  });
  return assigned;
}

/** Return an address to the subnet's free pool. Unknown subnets are ignored. */
export async function releasePrivateIp(store: ResourceStore, subnetId: string, address: string): Promise<void> {
  if (!(await store.find(subnetId))) return;
  await store.update('subnet', subnetId, (current) => {
    const block = parseCidr(attrString(current.attributes, 'cidrBlock') ?? '');
    const addresses = allocatedAddresses(current).filter((item) => item !== address);
    return {
      attributes: {
        ...current.attributes,
        allocatedAddresses: addresses,
        availableIpAddressCount: block ? usableAddressCount(block) - addresses.length : 0,
      },
    };
  });
}

export function renderSubnet(subnet: Resource): ValueMap {
  return {
    subnetId: subnet.id,
    subnetArn: subnet.attributes.subnetArn,
    state: subnet.state,
    vpcId: subnet.attributes.vpcId,
    cidrBlock: subnet.attributes.cidrBlock,
    ipv6CidrBlockAssociationSet: subnet.attributes.ipv6CidrBlockAssociationSet,
    availableIpAddressCount: subnet.attributes.availableIpAddressCount,
    availabilityZone: subnet.attributes.availabilityZone,
    availabilityZoneId: subnet.attributes.availabilityZoneId,
    defaultForAz: subnet.attributes.defaultForAz,
    mapPublicIpOnLaunch: subnet.attributes.mapPublicIpOnLaunch,
    assignIpv6AddressOnCreation: subnet.attributes.assignIpv6AddressOnCreation,
    ownerId: subnet.attributes.ownerId,
    tagSet: tagSet(subnet.tags),
  };
}

const SUBNET_ATTRIBUTES = ['mapPublicIpOnLaunch', 'assignIpv6AddressOnCreation'];

export const subnetHandler = defineEc2Handler('subnet', {
  async CreateSubnet(params, ctx) {
    const subnet = await createSubnet(ctx.store, ctx, {
      vpcId: requireString(params, 'VpcId'),
      cidrBlock: requireString(params, 'CidrBlock'),
      availabilityZone: getString(params, 'AvailabilityZone') ?? getString(params, 'AvailabilityZoneId'),
      tags: parseTagSpecifications(params, 'subnet'),
    });
    ctx.logger.info('Subnet created', { subnetId: subnet.id, vpcId: subnet.attributes.vpcId });
    return { subnet: renderSubnet(subnet) };
  },

  async DescribeSubnets(params, ctx) {
    return describeResources(ctx.store, 'subnet', params, {
      idParam: 'SubnetId',
      listName: 'subnetSet',
      render: renderSubnet,
    });
  },

  async DeleteSubnet(params, ctx) {
    const subnetId = requireString(params, 'SubnetId');
    await ctx.store.delete('subnet', subnetId);

    // Explicit route table associations go away with the subnet.
    for (const table of await ctx.store.list('route-table')) {
      const associations = attrMaps(table.attributes, 'associations');
      if (!associations.some((association) => association.subnetId === subnetId)) continue;
      await ctx.store.update('route-table', table.id, (current) => ({
        attributes: {
          ...current.attributes,
          associations: attrMaps(current.attributes, 'associations').filter(
            (association) => association.subnetId !== subnetId,
          ),
        },
      }));
    }

    ctx.logger.info('Subnet deleted', { subnetId });
    return { return: true };
  },

  async ModifySubnetAttribute(params, ctx) {
    const subnetId = requireString(params, 'SubnetId');
    const changes: ValueMap = {};
    for (const attribute of SUBNET_ATTRIBUTES) {
      const value = getBooleanAttribute(params, attribute[0].toUpperCase() + attribute.slice(1));
      if (value !== undefined) changes[attribute] = value;
    }
    if (Object.keys(changes).length === 0) {
      throw new ServiceException(
        validationError('InvalidParameterCombination', 'At least one attribute must be specified'),
      );
    }
    await ctx.store.update('subnet', subnetId, (current) => ({ attributes: { ...current.attributes, ...changes } }));
    return { return: true };
  },
});
