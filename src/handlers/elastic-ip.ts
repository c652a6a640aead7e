/**
 * Elastic IP actions. Addresses are drawn from the documentation ranges
 * 203.0.113.0/24 and 198.51.100.0/24.
 */

import { randomInt } from 'crypto';
import { ServiceException, validationError } from '../domain/errors';
import { evaluateAll } from '../domain/filters';
import { generateId } from '../domain/ids';
import type { Resource } from '../domain/resource';
import { RESOURCE_TYPES } from '../domain/resource-types';
import type { ParameterTree, ValueMap } from '../domain/value-tree';
import type { ResourceStore } from '../storage/store';
import { formatIpv4, parseIpv4 } from './cidr';
import { attrString, defineEc2Handler, tagSet, withoutKeys } from './common';
import {
  getBoolean,
  getString,
  getStringList,
  paginate,
  parseFilters,
  parseTagSpecifications,
  requireString,
} from './params';

const ADDRESS_POOLS = ['203.0.113.0', '198.51.100.0'];

export const MAX_ELASTIC_IPS = 5;

const ASSOCIATION_KEYS = ['instanceId', 'associationId', 'privateIpAddress', 'networkInterfaceOwnerId'];

function poolAddresses(): string[] {
  const addresses: string[] = [];
  for (const pool of ADDRESS_POOLS) {
    const base = parseIpv4(pool) ?? 0;
    for (let host = 1; host < 255; host++) addresses.push(formatIpv4(base + host));
  }
  return addresses;
}

function addressNotFound(publicIp: string): ServiceException {
  return new ServiceException(
    validationError('InvalidAddress.NotFound', `Address '${publicIp}' not found.`, { publicIp }),
  );
}

/** Resolve the address named by `AllocationId` or `PublicIp`. */
async function resolveAddress(store: ResourceStore, params: ParameterTree): Promise<Resource> {
  const allocationId = getString(params, 'AllocationId');
  if (allocationId) return store.get('elastic-ip', allocationId);
  const publicIp = getString(params, 'PublicIp');
  if (!publicIp) {
    throw new ServiceException(validationError('MissingParameter', 'Either AllocationId or PublicIp must be specified'));
  }
  const address = (await store.list('elastic-ip')).find((candidate) => candidate.attributes.publicIp === publicIp);
  if (!address) throw addressNotFound(publicIp);
  return address;
}

/** Drop every address association held by an instance. */
export async function disassociateAddressesOf(store: ResourceStore, instanceId: string): Promise<void> {
  for (const address of await store.list('elastic-ip')) {
    if (address.attributes.instanceId !== instanceId) continue;
    await store.update('elastic-ip', address.id, (current) => ({
      attributes: withoutKeys(current.attributes, ASSOCIATION_KEYS),
    }));
  }
}

export function renderAddress(address: Resource): ValueMap {
  const rendered: ValueMap = {
    publicIp: address.attributes.publicIp,
    allocationId: address.id,
    domain: address.attributes.domain,
  };
  for (const key of ASSOCIATION_KEYS) {
    const value = address.attributes[key];
    if (value !== undefined) rendered[key] = value;
  }
  rendered.publicIpv4Pool = address.attributes.publicIpv4Pool;
  rendered.networkBorderGroup = address.attributes.networkBorderGroup;
  rendered.tagSet = tagSet(address.tags);
  return rendered;
}

export const elasticIpHandler = defineEc2Handler('elastic-ip', {
  async AllocateAddress(params, ctx) {
    const domain = getString(params, 'Domain') ?? 'vpc';
    if (domain !== 'vpc' && domain !== 'standard') {
      throw new ServiceException(validationError('InvalidParameterValue', `Invalid value '${domain}' for domain.`));
    }
    const tags = parseTagSpecifications(params, 'elastic-ip');

    const existing = await ctx.store.list('elastic-ip');
    if (existing.length >= MAX_ELASTIC_IPS) {
      throw new ServiceException(
        validationError('AddressLimitExceeded', 'The maximum number of addresses has been reached.'),
      );
    }
    const taken = new Set(existing.map((address) => attrString(address.attributes, 'publicIp')));
    const free = poolAddresses().filter((candidate) => !taken.has(candidate));
    if (free.length === 0) {
      throw new ServiceException(
        validationError('AddressLimitExceeded', 'The maximum number of addresses has been reached.'),
      );
    }
    const publicIp = free[randomInt(free.length)];

    const address = await ctx.store.create(
      'elastic-ip',
      { publicIp, domain: 'vpc', publicIpv4Pool: 'amazon', networkBorderGroup: ctx.region },
      tags,
    );
    ctx.logger.info('Address allocated', { allocationId: address.id, publicIp });
    return {
      publicIp,
      allocationId: address.id,
      domain: 'vpc',
      publicIpv4Pool: 'amazon',
      networkBorderGroup: ctx.region,
    };
  },

  async DescribeAddresses(params, ctx) {
    const def = RESOURCE_TYPES['elastic-ip'];
    let addresses = await ctx.store.list('elastic-ip');

    const ids = getStringList(params, 'AllocationId');
    for (const id of ids) {
      if (!addresses.some((address) => address.id === id)) {
        throw new ServiceException(
          validationError(def.notFoundCode, `The allocation ID '${id}' does not exist`, { allocationId: id }),
        );
      }
    }
    const publicIps = getStringList(params, 'PublicIp');
    for (const publicIp of publicIps) {
      if (!addresses.some((address) => address.attributes.publicIp === publicIp)) throw addressNotFound(publicIp);
    }
    if (ids.length > 0) addresses = addresses.filter((address) => ids.includes(address.id));
    if (publicIps.length > 0) {
      addresses = addresses.filter((address) => publicIps.includes(attrString(address.attributes, 'publicIp') ?? ''));
    }

    const page = paginate(evaluateAll(addresses, parseFilters(params), def.filters), params);
    const body: ValueMap = { addressesSet: page.items.map(renderAddress) };
    if (page.nextToken) body.nextToken = page.nextToken;
    return body;
  },

  async ReleaseAddress(params, ctx) {
    const address = await resolveAddress(ctx.store, params);
    if (address.attributes.associationId !== undefined) {
      throw new ServiceException(
        validationError('InvalidIPAddress.InUse', `Address ${address.attributes.publicIp} is in use.`, {
          allocationId: address.id,
        }),
      );
    }
    await ctx.store.delete('elastic-ip', address.id);
    ctx.logger.info('Address released', { allocationId: address.id });
    return { return: true };
  },

  async AssociateAddress(params, ctx) {
    const address = await resolveAddress(ctx.store, params);
    const instance = await ctx.store.get('instance', requireString(params, 'InstanceId'));
    if (instance.state !== 'running' && instance.state !== 'stopped' && instance.state !== 'pending') {
      throw new ServiceException(
        validationError(
          'IncorrectInstanceState',
          `The instance '${instance.id}' is not in a valid state for this operation.`,
        ),
      );
    }

    const current = attrString(address.attributes, 'instanceId');
    const allowReassociation = getBoolean(params, 'AllowReassociation') ?? false;
    if (current !== undefined && current !== instance.id && !allowReassociation) {
      throw new ServiceException(
        validationError('Resource.AlreadyAssociated', `resource ${address.id} is already associated with ${current}`),
      );
    }

    // An instance holds one elastic IP on its primary address; a new one replaces it.
    for (const other of await ctx.store.list('elastic-ip')) {
      if (other.id !== address.id && other.attributes.instanceId === instance.id) {
        await ctx.store.update('elastic-ip', other.id, (state) => ({
          attributes: withoutKeys(state.attributes, ASSOCIATION_KEYS),
        }));
      }
    }

    const associationId = generateId('eipassoc');
    await ctx.store.update('elastic-ip', address.id, (state) => ({
      attributes: {
        ...state.attributes,
        instanceId: instance.id,
        associationId,
        privateIpAddress: instance.attributes.privateIpAddress ?? null,
        networkInterfaceOwnerId: ctx.accountId,
      },
    }));
    ctx.logger.info('Address associated', { allocationId: address.id, instanceId: instance.id });
    return { return: true, associationId };
  },

  async DisassociateAddress(params, ctx) {
    const associationId = getString(params, 'AssociationId');
    const publicIp = getString(params, 'PublicIp');
    const addresses = await ctx.store.list('elastic-ip');

    let address: Resource | undefined;
    if (associationId) {
      address = addresses.find((candidate) => candidate.attributes.associationId === associationId);
      if (!address) {
        throw new ServiceException(
          validationError('InvalidAssociationID.NotFound', `The association ID '${associationId}' does not exist`),
        );
      }
    } else if (publicIp) {
      address = addresses.find((candidate) => candidate.attributes.publicIp === publicIp);
      if (!address) throw addressNotFound(publicIp);
    } else {
      throw new ServiceException(
        validationError('MissingParameter', 'Either AssociationId or PublicIp must be specified'),
      );
    }

    const target = address;
    await ctx.store.update('elastic-ip', target.id, (current) => ({
      attributes: withoutKeys(current.attributes, ASSOCIATION_KEYS),
    }));
    ctx.logger.info('Address disassociated', { allocationId: target.id });
    return { return: true };
  },
});
