/**
 * Internet gateway actions. A gateway attaches to at most one VPC and a VPC
 * takes at most one gateway.
 */

import { dependencyViolationError, ServiceException, validationError } from '../domain/errors';
import type { Resource } from '../domain/resource';
import type { ValueMap } from '../domain/value-tree';
import { attrMaps, defineEc2Handler, describeResources, tagSet } from './common';
import { parseTagSpecifications, requireString } from './params';

export function attachedVpcIds(gateway: Resource): string[] {
  return attrMaps(gateway.attributes, 'attachments')
    .map((attachment) => attachment.vpcId)
    .filter((vpcId): vpcId is string => typeof vpcId === 'string');
}

export function renderInternetGateway(gateway: Resource): ValueMap {
  return {
    internetGatewayId: gateway.id,
    ownerId: gateway.attributes.ownerId,
    attachmentSet: attrMaps(gateway.attributes, 'attachments'),
    tagSet: tagSet(gateway.tags),
  };
}

export const internetGatewayHandler = defineEc2Handler('internet-gateway', {
  async CreateInternetGateway(params, ctx) {
    const gateway = await ctx.store.create(
      'internet-gateway',
      { ownerId: ctx.accountId, attachments: [] },
      parseTagSpecifications(params, 'internet-gateway'),
    );
    ctx.logger.info('Internet gateway created', { internetGatewayId: gateway.id });
    return { internetGateway: renderInternetGateway(gateway) };
  },

  async DescribeInternetGateways(params, ctx) {
    return describeResources(ctx.store, 'internet-gateway', params, {
      idParam: 'InternetGatewayId',
      listName: 'internetGatewaySet',
      render: renderInternetGateway,
    });
  },

  async DeleteInternetGateway(params, ctx) {
    const gatewayId = requireString(params, 'InternetGatewayId');
    const gateway = await ctx.store.get('internet-gateway', gatewayId);
    const attached = attachedVpcIds(gateway);
    if (attached.length > 0) {
      throw new ServiceException(dependencyViolationError('internet-gateway', gatewayId, attached));
    }
    await ctx.store.delete('internet-gateway', gatewayId);

    // Routes through a deleted gateway stay in their tables as blackholes.
    for (const table of await ctx.store.list('route-table')) {
      const routes = attrMaps(table.attributes, 'routes');
      if (!routes.some((route) => route.gatewayId === gatewayId)) continue;
      await ctx.store.update('route-table', table.id, (current) => ({
        attributes: {
          ...current.attributes,
          routes: attrMaps(current.attributes, 'routes').map((route) =>
            route.gatewayId === gatewayId ? { ...route, state: 'blackhole' } : route,
          ),
        },
      }));
    }

    ctx.logger.info('Internet gateway deleted', { internetGatewayId: gatewayId });
    return { return: true };
  },

  async AttachInternetGateway(params, ctx) {
    const gatewayId = requireString(params, 'InternetGatewayId');
    const vpcId = requireString(params, 'VpcId');
    const gateway = await ctx.store.get('internet-gateway', gatewayId);
    await ctx.store.get('vpc', vpcId);

    if (attachedVpcIds(gateway).length > 0) {
      throw new ServiceException(
        validationError('Resource.AlreadyAssociated', `resource ${gatewayId} is already attached to network ${attachedVpcIds(gateway)[0]}`),
      );
    }
    const others = await ctx.store.list('internet-gateway');
    if (others.some((other) => attachedVpcIds(other).includes(vpcId))) {
      throw new ServiceException(
        validationError('Resource.AlreadyAssociated', `Network ${vpcId} already has an internet gateway attached`),
      );
    }

    await ctx.store.update('internet-gateway', gatewayId, (current) => ({
      attributes: { ...current.attributes, attachments: [{ vpcId, state: 'available' }] },
    }));
    ctx.logger.info('Internet gateway attached', { internetGatewayId: gatewayId, vpcId });
    return { return: true };
  },

  async DetachInternetGateway(params, ctx) {
    const gatewayId = requireString(params, 'InternetGatewayId');
    const vpcId = requireString(params, 'VpcId');
    const gateway = await ctx.store.get('internet-gateway', gatewayId);

    if (!attachedVpcIds(gateway).includes(vpcId)) {
      throw new ServiceException(
        validationError('Gateway.NotAttached', `resource ${gatewayId} is not attached to network ${vpcId}`),
      );
    }

    await ctx.store.update('internet-gateway', gatewayId, (current) => ({
      attributes: {
        ...current.attributes,
        attachments: attrMaps(current.attributes, 'attachments').filter((attachment) => attachment.vpcId !== vpcId),
      },
    }));
    ctx.logger.info('Internet gateway detached', { internetGatewayId: gatewayId, vpcId });
    return { return: true };
  },
});
