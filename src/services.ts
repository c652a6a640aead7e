/**
 * Emulated service definitions: protocol, API version and the full action
 * list each service exposes. The router refuses to start unless every
 * action listed here has a handler.
 */

import type { ServiceDefinition } from './protocol/codecs';

export const EC2_SERVICE_DEFINITION: ServiceDefinition = {
  name: 'ec2',
  protocol: 'ec2',
  apiVersion: '2016-11-15',
  xmlNamespace: 'http://ec2.amazonaws.com/doc/2016-11-15/',
  actions: [
    'CreateVpc',
    'DescribeVpcs',
    'DeleteVpc',
    'ModifyVpcAttribute',
    'DescribeVpcAttribute',
    'CreateSubnet',
    'DescribeSubnets',
    'DeleteSubnet',
    'ModifySubnetAttribute',
    'CreateSecurityGroup',
    'DescribeSecurityGroups',
    'DeleteSecurityGroup',
    'AuthorizeSecurityGroupIngress',
    'AuthorizeSecurityGroupEgress',
    'RevokeSecurityGroupIngress',
    'RevokeSecurityGroupEgress',
    'CreateInternetGateway',
    'DescribeInternetGateways',
    'DeleteInternetGateway',
    'AttachInternetGateway',
    'DetachInternetGateway',
    'CreateRouteTable',
    'DescribeRouteTables',
    'DeleteRouteTable',
    'CreateRoute',
    'DeleteRoute',
    'AssociateRouteTable',
    'DisassociateRouteTable',
    'RunInstances',
    'DescribeInstances',
    'TerminateInstances',
    'StopInstances',
    'StartInstances',
    'CreateVolume',
    'DescribeVolumes',
    'DeleteVolume',
    'AttachVolume',
    'DetachVolume',
    'CreateKeyPair',
    'ImportKeyPair',
    'DescribeKeyPairs',
    'DeleteKeyPair',
    'AllocateAddress',
    'DescribeAddresses',
    'ReleaseAddress',
    'AssociateAddress',
    'DisassociateAddress',
    'CreateTags',
    'DeleteTags',
    'DescribeTags',
    'DescribeRegions',
    'DescribeAvailabilityZones',
    'DescribeAccountAttributes',
  ],
};

export const STS_SERVICE_DEFINITION: ServiceDefinition = {
  name: 'sts',
  protocol: 'query',
  apiVersion: '2011-06-15',
  xmlNamespace: 'https://sts.amazonaws.com/doc/2011-06-15/',
  actions: ['GetCallerIdentity'],
};

export const BUILTIN_SERVICES: readonly ServiceDefinition[] = [EC2_SERVICE_DEFINITION, STS_SERVICE_DEFINITION];
