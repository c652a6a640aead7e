/**
 * Route table actions: tables, routes and subnet associations.
 */

import { dependencyViolationError, invalidParameterValueError, ServiceException, validationError } from '../domain/errors';
import { generateId } from '../domain/ids';
import type { Resource } from '../domain/resource';
import type { ValueMap } from '../domain/value-tree';
import { parseCidr } from './cidr';
import { attrMaps, defineEc2Handler, describeResources, tagSet } from './common';
import { attachedVpcIds } from './internet-gateway';
import { getString, parseTagSpecifications, requireString } from './params';
import { vpcCidr } from './vpc';

export function isMainTable(table: Resource): boolean {
  return attrMaps(table.attributes, 'associations').some((association) => association.main === true);
}

function subnetAssociations(table: Resource): ValueMap[] {
  return attrMaps(table.attributes, 'associations').filter((association) => association.main !== true);
}

export function renderRouteTable(table: Resource): ValueMap {
  return {
    routeTableId: table.id,
    vpcId: table.attributes.vpcId,
    ownerId: table.attributes.ownerId,
    routeSet: attrMaps(table.attributes, 'routes'),
    associationSet: attrMaps(table.attributes, 'associations').map((association) => ({
      ...association,
      routeTableId: table.id,
    })),
    propagatingVgwSet: [],
    tagSet: tagSet(table.tags),
  };
}

export const routeTableHandler = defineEc2Handler('route-table', {
  async CreateRouteTable(params, ctx) {
    const vpc = await ctx.store.get('vpc', requireString(params, 'VpcId'));
    const table = await ctx.store.create(
      'route-table',
      {
        vpcId: vpc.id,
        ownerId: ctx.accountId,
        routes: [{ destinationCidrBlock: vpcCidr(vpc), gatewayId: 'local', state: 'active', origin: 'CreateRouteTable' }],
        associations: [],
      },
      parseTagSpecifications(params, 'route-table'),
    );
    ctx.logger.info('Route table created', { routeTableId: table.id, vpcId: vpc.id });
    return { routeTable: renderRouteTable(table) };
  },

  async DescribeRouteTables(params, ctx) {
    return describeResources(ctx.store, 'route-table', params, {
      idParam: 'RouteTableId',
      listName: 'routeTableSet',
      render: renderRouteTable,
    });
  },

  async DeleteRouteTable(params, ctx) {
    const routeTableId = requireString(params, 'RouteTableId');
    const table = await ctx.store.get('route-table', routeTableId);
    const associated = subnetAssociations(table)
      .map((association) => association.subnetId)
      .filter((subnetId): subnetId is string => typeof subnetId === 'string');
    if (isMainTable(table) || associated.length > 0) {
      throw new ServiceException(dependencyViolationError('route-table', routeTableId, associated));
    }
    await ctx.store.delete('route-table', routeTableId);
    ctx.logger.info('Route table deleted', { routeTableId });
    return { return: true };
  },

  async CreateRoute(params, ctx) {
    const routeTableId = requireString(params, 'RouteTableId');
    const destination = requireString(params, 'DestinationCidrBlock');
    if (!parseCidr(destination)) {
      throw new ServiceException(invalidParameterValueError('DestinationCidrBlock', destination, 'not a valid CIDR block'));
    }
    const table = await ctx.store.get('route-table', routeTableId);

    const gatewayId = getString(params, 'GatewayId');
    const instanceId = getString(params, 'InstanceId');
    if ((gatewayId === undefined) === (instanceId === undefined)) {
      throw new ServiceException(
        validationError('InvalidParameterCombination', 'Exactly one route target (GatewayId or InstanceId) must be specified'),
      );
    }

    const route: ValueMap = { destinationCidrBlock: destination, state: 'active', origin: 'CreateRoute' };
    if (gatewayId !== undefined) {
      const gateway = await ctx.store.get('internet-gateway', gatewayId);
      if (!attachedVpcIds(gateway).includes(String(table.attributes.vpcId))) {
        throw new ServiceException(
          validationError(
            'InvalidParameterValue',
            `route table ${routeTableId} and network gateway ${gatewayId} belong to different networks`,
          ),
        );
      }
      route.gatewayId = gatewayId;
    } else if (instanceId !== undefined) {
      const instance = await ctx.store.get('instance', instanceId);
      route.instanceId = instance.id;
      route.instanceOwnerId = ctx.accountId;
    }

    await ctx.store.update('route-table', routeTableId, (current) => {
      const routes = attrMaps(current.attributes, 'routes');
      if (routes.some((existing) => existing.destinationCidrBlock === destination)) {
        throw new ServiceException(
          validationError(
            'RouteAlreadyExists',
            `The route identified by ${destination} already exists.`,
            { routeTableId, destinationCidrBlock: destination },
          ),
        );
      }
      return { attributes: { ...current.attributes, routes: [...routes, route] } };
    });
    return { return: true };
  },

  async DeleteRoute(params, ctx) {
    const routeTableId = requireString(params, 'RouteTableId');
    const destination = requireString(params, 'DestinationCidrBlock');
    await ctx.store.update('route-table', routeTableId, (current) => {
      const routes = attrMaps(current.attributes, 'routes');
      const route = routes.find((existing) => existing.destinationCidrBlock === destination);
      if (!route) {
        throw new ServiceException(
          validationError(
            'InvalidRoute.NotFound',
            `no route with destination-cidr-block ${destination} in route table ${routeTableId}`,
          ),
        );
      }
      if (route.gatewayId === 'local') {
        throw new ServiceException(
          validationError('InvalidParameterValue', `cannot remove local route ${destination} in route table ${routeTableId}`),
        );
      }
      return {
        attributes: {
          ...current.attributes,
          routes: routes.filter((existing) => existing.destinationCidrBlock !== destination),
        },
      };
    });
    return { return: true };
  },

  async AssociateRouteTable(params, ctx) {
    const routeTableId = requireString(params, 'RouteTableId');
    const subnetId = requireString(params, 'SubnetId');
    const table = await ctx.store.get('route-table', routeTableId);
    const subnet = await ctx.store.get('subnet', subnetId);
    if (subnet.attributes.vpcId !== table.attributes.vpcId) {
      throw new ServiceException(
        validationError(
          'InvalidParameterValue',
          `Route table ${routeTableId} and subnet ${subnetId} belong to different networks`,
        ),
      );
    }

    const tables = await ctx.store.list('route-table');
    const existing = tables.find((candidate) =>
      subnetAssociations(candidate).some((association) => association.subnetId === subnetId),
    );
    if (existing) {
      throw new ServiceException(
        validationError(
          'Resource.AlreadyAssociated',
          `the specified association for route table ${existing.id} conflicts with an existing association`,
        ),
      );
    }

    const associationId = generateId('rtbassoc');
    await ctx.store.update('route-table', routeTableId, (current) => ({
      attributes: {
        ...current.attributes,
        associations: [
          ...attrMaps(current.attributes, 'associations'),
          { routeTableAssociationId: associationId, subnetId, main: false, associationState: { state: 'associated' } },
        ],
      },
    }));
    return { associationId, associationState: { state: 'associated' } };
  },

  async DisassociateRouteTable(params, ctx) {
    const associationId = requireString(params, 'AssociationId');
    const tables = await ctx.store.list('route-table');
    const table = tables.find((candidate) =>
      attrMaps(candidate.attributes, 'associations').some(
        (association) => association.routeTableAssociationId === associationId,
      ),
    );
    if (!table) {
      throw new ServiceException(
        validationError('InvalidAssociationID.NotFound', `The association ID '${associationId}' does not exist`),
      );
    }
    if (isMainTable(table) && !subnetAssociations(table).some((a) => a.routeTableAssociationId === associationId)) {
      throw new ServiceException(
        validationError('InvalidParameterValue', `cannot disassociate the main route table association ${associationId}`),
      );
    }

    await ctx.store.update('route-table', table.id, (current) => ({
      attributes: {
        ...current.attributes,
        associations: attrMaps(current.attributes, 'associations').filter(
          (association) => association.routeTableAssociationId !== associationId,
        ),
      },
    }));
    return { return: true };
  },
});
