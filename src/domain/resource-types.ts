/**
 * Resource type registry.
 *
 * The closed set of emulated resource types and, for each, everything the
 * store and the filter evaluator need to treat it generically: ID prefix and
 * format, the state machine's vocabulary, which attribute paths reference
 * other resources, which referencing resources are removed along with it,
 * and how provider filter names map onto its attribute tree.
 */

import type { Resource } from './resource';
import { isValueMap } from './value-tree';

export const RESOURCE_TYPE_TAGS = [
  'vpc',
  'subnet',
  'security-group',
  'internet-gateway',
  'route-table',
  'instance',
  'volume',
  'key-pair',
  'elastic-ip',
] as const;

export type ResourceTypeTag = (typeof RESOURCE_TYPE_TAGS)[number];

/** `short` is the legacy 8-hex suffix, `long` the 17-hex suffix. */
export type IdFormat = 'short' | 'long';

export const ID_SUFFIX_LENGTH: Record<IdFormat, number> = {
  short: 8,
  long: 17,
};

/** An attribute path whose string values are ids of another resource type. */
export interface ReferenceField {
  path: string;
  type: ResourceTypeTag;
}

/**
 * Referencing resources of `type` that are deleted together with the
 * referenced resource instead of blocking its deletion. `when` narrows the
 * rule to specific resources (e.g. only the VPC's default security group).
 */
export interface CascadeRule {
  type: ResourceTypeTag;
  when?: (referencing: Resource) => boolean;
}

/**
 * Filter name → attribute path. Paths are dotted and flatten sequences;
 * `$id` and `$state` address the resource itself rather than its attributes.
 */
export type FilterPathTable = Record<string, string>;

export interface ResourceTypeDefinition {
  tag: ResourceTypeTag;
  idPrefix: string;
  idFormat: IdFormat;
  states: readonly string[];
  initialState: string;
  /** References held by resources in these states are not live. */
  terminalStates: readonly string[];
  references: readonly ReferenceField[];
  cascade: readonly CascadeRule[];
  filters: FilterPathTable;
  /** Provider error code for a missing resource of this type. */
  notFoundCode: string;
}

const isDefaultResource = (resource: Resource): boolean => resource.attributes.isDefault === true;

const isMainRouteTable = (resource: Resource): boolean => {
  const associations = resource.attributes.associations;
  return Array.isArray(associations) && associations.some(
    (association) => isValueMap(association) && association.main === true,
  );
};

export const RESOURCE_TYPES: Record<ResourceTypeTag, ResourceTypeDefinition> = {
  vpc: {
    tag: 'vpc',
    idPrefix: 'vpc',
    idFormat: 'long',
    states: ['pending', 'available'],
    initialState: 'available',
    terminalStates: [],
    references: [],
    cascade: [
      { type: 'security-group', when: isDefaultResource },
      { type: 'route-table', when: isMainRouteTable },
    ],
    filters: {
      'vpc-id': '$id',
      state: '$state',
      cidr: 'cidrBlock',
      'cidr-block-association.cidr-block': 'cidrBlockAssociationSet.cidrBlock',
      'cidr-block-association.association-id': 'cidrBlockAssociationSet.associationId',
      'dhcp-options-id': 'dhcpOptionsId',
      'instance-tenancy': 'instanceTenancy',
      'is-default': 'isDefault',
      'owner-id': 'ownerId',
    },
    notFoundCode: 'InvalidVpcID.NotFound',
  },
  subnet: {
    tag: 'subnet',
    idPrefix: 'subnet',
    idFormat: 'long',
    states: ['pending', 'available'],
    initialState: 'available',
    terminalStates: [],
    references: [{ path: 'vpcId', type: 'vpc' }],
    cascade: [],
    filters: {
      'subnet-id': '$id',
      state: '$state',
      'vpc-id': 'vpcId',
      'cidr-block': 'cidrBlock',
      cidr: 'cidrBlock',
      cidrBlock: 'cidrBlock',
      'availability-zone': 'availabilityZone',
      availabilityZone: 'availabilityZone',
      'availability-zone-id': 'availabilityZoneId',
      'available-ip-address-count': 'availableIpAddressCount',
      'default-for-az': 'defaultForAz',
      defaultForAz: 'defaultForAz',
      'map-public-ip-on-launch': 'mapPublicIpOnLaunch',
      'owner-id': 'ownerId',
      'subnet-arn': 'subnetArn',
    },
    notFoundCode: 'InvalidSubnetID.NotFound',
  },
  'security-group': {
    tag: 'security-group',
    idPrefix: 'sg',
    idFormat: 'long',
    states: ['available'],
    initialState: 'available',
    terminalStates: [],
    references: [
      { path: 'vpcId', type: 'vpc' },
      { path: 'ipPermissions.userIdGroupPairs.groupId', type: 'security-group' },
      { path: 'ipPermissionsEgress.userIdGroupPairs.groupId', type: 'security-group' },
    ],
    cascade: [],
    filters: {
      'group-id': '$id',
      'group-name': 'groupName',
      description: 'description',
      'vpc-id': 'vpcId',
      'owner-id': 'ownerId',
      'ip-permission.protocol': 'ipPermissions.ipProtocol',
      'ip-permission.from-port': 'ipPermissions.fromPort',
      'ip-permission.to-port': 'ipPermissions.toPort',
      'ip-permission.cidr': 'ipPermissions.ipRanges.cidrIp',
      'ip-permission.group-id': 'ipPermissions.userIdGroupPairs.groupId',
      'egress.ip-permission.protocol': 'ipPermissionsEgress.ipProtocol',
      'egress.ip-permission.cidr': 'ipPermissionsEgress.ipRanges.cidrIp',
    },
    notFoundCode: 'InvalidGroup.NotFound',
  },
  'internet-gateway': {
    tag: 'internet-gateway',
    idPrefix: 'igw',
    idFormat: 'long',
    states: ['available'],
    initialState: 'available',
    terminalStates: [],
    references: [{ path: 'attachments.vpcId', type: 'vpc' }],
    cascade: [],
    filters: {
      'internet-gateway-id': '$id',
      'attachment.vpc-id': 'attachments.vpcId',
      'attachment.state': 'attachments.state',
      'owner-id': 'ownerId',
    },
    notFoundCode: 'InvalidInternetGatewayID.NotFound',
  },
  'route-table': {
    tag: 'route-table',
    idPrefix: 'rtb',
    idFormat: 'long',
    states: ['available'],
    initialState: 'available',
    terminalStates: [],
    references: [{ path: 'vpcId', type: 'vpc' }],
    cascade: [],
    filters: {
      'route-table-id': '$id',
      'vpc-id': 'vpcId',
      'association.main': 'associations.main',
      'association.subnet-id': 'associations.subnetId',
      'association.route-table-association-id': 'associations.routeTableAssociationId',
      'route.destination-cidr-block': 'routes.destinationCidrBlock',
      'route.gateway-id': 'routes.gatewayId',
      'route.state': 'routes.state',
      'owner-id': 'ownerId',
    },
    notFoundCode: 'InvalidRouteTableID.NotFound',
  },
  instance: {
    tag: 'instance',
    idPrefix: 'i',
    idFormat: 'long',
    states: ['pending', 'running', 'shutting-down', 'terminated', 'stopping', 'stopped'],
    initialState: 'running',
    terminalStates: ['terminated'],
    references: [
      { path: 'subnetId', type: 'subnet' },
      { path: 'vpcId', type: 'vpc' },
      { path: 'securityGroups.groupId', type: 'security-group' },
    ],
    cascade: [],
    filters: {
      'instance-id': '$id',
      'instance-state-name': '$state',
      'instance-type': 'instanceType',
      'image-id': 'imageId',
      'key-name': 'keyName',
      'subnet-id': 'subnetId',
      'vpc-id': 'vpcId',
      'availability-zone': 'placement.availabilityZone',
      tenancy: 'placement.tenancy',
      'private-ip-address': 'privateIpAddress',
      'reservation-id': 'reservationId',
      'instance.group-id': 'securityGroups.groupId',
      'instance.group-name': 'securityGroups.groupName',
      'group-id': 'securityGroups.groupId',
      'group-name': 'securityGroups.groupName',
      architecture: 'architecture',
      'owner-id': 'ownerId',
    },
    notFoundCode: 'InvalidInstanceID.NotFound',
  },
  volume: {
    tag: 'volume',
    idPrefix: 'vol',
    idFormat: 'long',
    states: ['creating', 'available', 'in-use', 'deleting', 'deleted', 'error'],
    initialState: 'available',
    terminalStates: ['deleted'],
    references: [{ path: 'attachments.instanceId', type: 'instance' }],
    cascade: [],
    filters: {
      'volume-id': '$id',
      status: '$state',
      size: 'size',
      'availability-zone': 'availabilityZone',
      'volume-type': 'volumeType',
      encrypted: 'encrypted',
      'snapshot-id': 'snapshotId',
      'attachment.instance-id': 'attachments.instanceId',
      'attachment.device': 'attachments.device',
      'attachment.status': 'attachments.state',
      'attachment.delete-on-termination': 'attachments.deleteOnTermination',
    },
    notFoundCode: 'InvalidVolume.NotFound',
  },
  'key-pair': {
    tag: 'key-pair',
    idPrefix: 'key',
    idFormat: 'long',
    states: ['available'],
    initialState: 'available',
    terminalStates: [],
    references: [],
    cascade: [],
    filters: {
      'key-pair-id': '$id',
      'key-name': 'keyName',
      fingerprint: 'keyFingerprint',
      'key-type': 'keyType',
    },
    notFoundCode: 'InvalidKeyPair.NotFound',
  },
  'elastic-ip': {
    tag: 'elastic-ip',
    idPrefix: 'eipalloc',
    idFormat: 'long',
    states: ['available'],
    initialState: 'available',
    terminalStates: [],
    references: [{ path: 'instanceId', type: 'instance' }],
    cascade: [],
    filters: {
      'allocation-id': '$id',
      'public-ip': 'publicIp',
      domain: 'domain',
      'instance-id': 'instanceId',
      'association-id': 'associationId',
      'network-border-group': 'networkBorderGroup',
      'private-ip-address': 'privateIpAddress',
      'public-ipv4-pool': 'publicIpv4Pool',
    },
    notFoundCode: 'InvalidAllocationID.NotFound',
  },
};

export function isResourceTypeTag(value: string): value is ResourceTypeTag {
  return RESOURCE_TYPE_TAGS.some((tag) => tag === value);
}

/** Find the resource type whose ID prefix matches an id, if any. */
export function resourceTypeForId(id: string): ResourceTypeTag | undefined {
  const prefix = id.slice(0, id.lastIndexOf('-'));
  return RESOURCE_TYPE_TAGS.find((tag) => RESOURCE_TYPES[tag].idPrefix === prefix);
}
