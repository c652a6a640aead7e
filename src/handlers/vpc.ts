/**
 * VPC actions.
 *
 * Creating a VPC also creates its default security group and main route
 * table; both are removed with the VPC through the type's cascade rules.
 */

import { generateId } from '../domain/ids';
import { invalidParameterValueError, ServiceException, validationError } from '../domain/errors';
import type { Resource, Tag } from '../domain/resource';
import type { ValueMap } from '../domain/value-tree';
import type { ResourceStore } from '../storage/store';
import { parseCidr } from './cidr';
import { attrString, defineEc2Handler, describeResources, tagSet } from './common';
import { getBooleanAttribute, getBoolean, getString, parseTagSpecifications, requireString } from './params';

const TENANCIES = ['default', 'dedicated', 'host'];

export const VPC_MIN_PREFIX = 16;
export const VPC_MAX_PREFIX = 28;

export interface VpcSpec {
  cidrBlock: string;
  instanceTenancy?: string;
  isDefault?: boolean;
  amazonProvidedIpv6?: boolean;
  tags?: Tag[];
}

export function validateVpcCidr(cidrBlock: string): void {
  const block = parseCidr(cidrBlock);
  if (!block) {
    throw new ServiceException(invalidParameterValueError('CidrBlock', cidrBlock, 'not a valid CIDR block'));
  }
  if (block.prefixLength < VPC_MIN_PREFIX || block.prefixLength > VPC_MAX_PREFIX) {
    throw new ServiceException(
      validationError('InvalidVpc.Range', `The CIDR '${cidrBlock}' is invalid.`, { cidrBlock }),
    );
  }
}

/** Create a VPC together with its default security group and main route table. */
export async function createVpcWithDefaults(
  store: ResourceStore,
  accountId: string,
  spec: VpcSpec,
): Promise<Resource> {
  const ipv6: ValueMap[] = spec.amazonProvidedIpv6
    ? [
        {
          associationId: generateId('vpc-cidr-assoc'),
          ipv6CidrBlock: '2600:1f18:aaaa:bb00::/56',
          ipv6CidrBlockState: { state: 'associated' },
          networkBorderGroup: '',
          ipv6Pool: 'Amazon',
        },
      ]
    : [];

  const vpc = await store.create(
    'vpc',
    {
      cidrBlock: spec.cidrBlock,
      dhcpOptionsId: 'default',
      instanceTenancy: spec.instanceTenancy ?? 'default',
      isDefault: spec.isDefault ?? false,
      ownerId: accountId,
      cidrBlockAssociationSet: [
        {
          associationId: generateId('vpc-cidr-assoc'),
          cidrBlock: spec.cidrBlock,
          cidrBlockState: { state: 'associated' },
        },
      ],
      ipv6CidrBlockAssociationSet: ipv6,
      enableDnsSupport: true,
      enableDnsHostnames: spec.isDefault ?? false,
    },
    spec.tags,
  );

  const group = await store.create('security-group', {
    groupName: 'default',
    description: 'default VPC security group',
    vpcId: vpc.id,
    ownerId: accountId,
    isDefault: true,
    ipPermissions: [],
    ipPermissionsEgress: [
      { ipProtocol: '-1', ipRanges: [{ cidrIp: '0.0.0.0/0' }], ipv6Ranges: [], userIdGroupPairs: [], prefixListIds: [] },
    ],
  });
  await store.update('security-group', group.id, (current) => ({
    attributes: {
      ...current.attributes,
      ipPermissions: [
        {
          ipProtocol: '-1',
          ipRanges: [],
          ipv6Ranges: [],
          userIdGroupPairs: [{ groupId: group.id, userId: accountId }],
          prefixListIds: [],
        },
      ],
    },
  }));

  await store.create('route-table', {
    vpcId: vpc.id,
    ownerId: accountId,
    routes: [{ destinationCidrBlock: spec.cidrBlock, gatewayId: 'local', state: 'active', origin: 'CreateRouteTable' }],
    associations: [
      { routeTableAssociationId: generateId('rtbassoc'), main: true, associationState: { state: 'associated' } },
    ],
  });

  return vpc;
}

export function renderVpc(vpc: Resource): ValueMap {
  return {
    vpcId: vpc.id,
    ownerId: vpc.attributes.ownerId,
    instanceTenancy: vpc.attributes.instanceTenancy,
    cidrBlockAssociationSet: vpc.attributes.cidrBlockAssociationSet,
    ipv6CidrBlockAssociationSet: vpc.attributes.ipv6CidrBlockAssociationSet,
    isDefault: vpc.attributes.isDefault,
    state: vpc.state,
    cidrBlock: vpc.attributes.cidrBlock,
    dhcpOptionsId: vpc.attributes.dhcpOptionsId,
    tagSet: tagSet(vpc.tags),
  };
}

const VPC_ATTRIBUTES = ['enableDnsSupport', 'enableDnsHostnames', 'enableNetworkAddressUsageMetrics'];

export const vpcHandler = defineEc2Handler('vpc', {
  async CreateVpc(params, ctx) {
    const cidrBlock = requireString(params, 'CidrBlock');
    validateVpcCidr(cidrBlock);
    const instanceTenancy = getString(params, 'InstanceTenancy') ?? 'default';
    if (!TENANCIES.includes(instanceTenancy)) {
      throw new ServiceException(invalidParameterValueError('InstanceTenancy', instanceTenancy));
    }

    const vpc = await createVpcWithDefaults(ctx.store, ctx.accountId, {
      cidrBlock,
      instanceTenancy,
      amazonProvidedIpv6: getBoolean(params, 'AmazonProvidedIpv6CidrBlock') ?? false,
      tags: parseTagSpecifications(params, 'vpc'),
    });
    ctx.logger.info('VPC created', { vpcId: vpc.id, cidrBlock });
    return { vpc: renderVpc(vpc) };
  },

  async DescribeVpcs(params, ctx) {
    return describeResources(ctx.store, 'vpc', params, { idParam: 'VpcId', listName: 'vpcSet', render: renderVpc });
  },

  async DeleteVpc(params, ctx) {
    const vpcId = requireString(params, 'VpcId');
    await ctx.store.delete('vpc', vpcId);
    ctx.logger.info('VPC deleted', { vpcId });
    return { return: true };
  },

  async ModifyVpcAttribute(params, ctx) {
    const vpcId = requireString(params, 'VpcId');
    const changes: ValueMap = {};
    for (const attribute of VPC_ATTRIBUTES) {
      const value = getBooleanAttribute(params, attribute[0].toUpperCase() + attribute.slice(1));
      if (value !== undefined) changes[attribute] = value;
    }
    if (Object.keys(changes).length !== 1) {
      throw new ServiceException(
        validationError('InvalidParameterCombination', 'Exactly one attribute must be specified per request'),
      );
    }
    await ctx.store.update('vpc', vpcId, (current) => ({ attributes: { ...current.attributes, ...changes } }));
    return { return: true };
  },

  async DescribeVpcAttribute(params, ctx) {
    const vpcId = requireString(params, 'VpcId');
    const attribute = requireString(params, 'Attribute');
    if (!VPC_ATTRIBUTES.includes(attribute)) {
      throw new ServiceException(invalidParameterValueError('Attribute', attribute));
    }
    const vpc = await ctx.store.get('vpc', vpcId);
    return { vpcId: vpc.id, [attribute]: { value: vpc.attributes[attribute] ?? false } };
  },
});

/** The default VPC, if one exists. */
export async function findDefaultVpc(store: ResourceStore): Promise<Resource | undefined> {
  return (await store.list('vpc')).find((vpc) => vpc.attributes.isDefault === true);
}

export function vpcCidr(vpc: Resource): string {
  return attrString(vpc.attributes, 'cidrBlock') ?? '';
}
