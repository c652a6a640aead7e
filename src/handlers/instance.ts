/**
 * Instance actions.
 *
 * RunInstances places every instance of a reservation in one subnet, gives
 * each a private address from that subnet and an attached root volume.
 * Instances launch straight into `running` and stop straight into `stopped`
 * so that clients polling for those states never wait.
 */

import { missingParameterError, ServiceException, validationError } from '../domain/errors';
import { generateId } from '../domain/ids';
import type { Resource } from '../domain/resource';
import { RESOURCE_TYPES } from '../domain/resource-types';
import type { ParameterTree, ValueMap } from '../domain/value-tree';
import type { HandlerContext } from '../gateway/types';
import type { ResourceStore } from '../storage/store';
import { attrMaps, attrString, defineEc2Handler, selectResources, tagSet } from './common';
import { disassociateAddressesOf } from './elastic-ip';
import { findKeyPairByName, keyPairNotFound } from './key-pair';
import {
  getBoolean,
  getInteger,
  getString,
  getStringList,
  getStruct,
  getStructList,
  paginate,
  parseTagSpecifications,
  requireString,
} from './params';
import { allocatePrivateIp, releasePrivateIp } from './subnet';
import { createVolume, releaseVolume, validateVolumeSpec } from './volume';
import type { VolumeSpec } from './volume';
import { findDefaultVpc } from './vpc';

export const INSTANCE_STATE_CODES: Record<string, number> = {
  pending: 0,
  running: 16,
  'shutting-down': 32,
  terminated: 48,
  stopping: 64,
  stopped: 80,
};

export const MAX_INSTANCES = 20;

const AMI_ID = /^ami-[0-9a-f]{8,17}$/;
const INSTANCE_TYPE = /^[a-z][a-z0-9-]*\.[a-z0-9]+$/;

const ROOT_DEVICE_NAME = '/dev/xvda';
const ROOT_VOLUME_SIZE = 8;

const TAGGABLE_ON_LAUNCH = ['instance', 'volume'];

interface BlockDevice {
  deviceName: string;
  volumeSize: number;
  volumeType?: string;
  iops?: number;
  encrypted?: boolean;
  deleteOnTermination: boolean;
}

interface Placement {
  subnet: Resource;
  groups: Resource[];
}

function instanceState(state: string): ValueMap {
  return { code: INSTANCE_STATE_CODES[state] ?? 0, name: state };
}

function incorrectState(instanceId: string, state: string, action: string): ServiceException {
  return new ServiceException(
    validationError(
      'IncorrectInstanceState',
      `The instance '${instanceId}' is not in a state from which it can be ${action}.`,
      { instanceId, state },
    ),
  );
}

function parseBlockDevices(params: ParameterTree): BlockDevice[] {
  const devices = getStructList(params, 'BlockDeviceMapping').flatMap((mapping): BlockDevice[] => {
    const ebs = getStruct(mapping, 'Ebs');
    if (!ebs) return [];
    return [
      {
        deviceName: requireString(mapping, 'DeviceName'),
        volumeSize: getInteger(ebs, 'VolumeSize') ?? ROOT_VOLUME_SIZE,
        volumeType: getString(ebs, 'VolumeType'),
        iops: getInteger(ebs, 'Iops'),
        encrypted: getBoolean(ebs, 'Encrypted'),
        deleteOnTermination: getBoolean(ebs, 'DeleteOnTermination') ?? true,
      },
    ];
  });
  if (!devices.some((device) => device.deviceName === ROOT_DEVICE_NAME)) {
    devices.unshift({ deviceName: ROOT_DEVICE_NAME, volumeSize: ROOT_VOLUME_SIZE, deleteOnTermination: true });
  }
  return devices;
}

async function resolveSubnet(store: ResourceStore, params: ParameterTree): Promise<Resource> {
  const subnetId = getString(params, 'SubnetId');
  if (subnetId) return store.get('subnet', subnetId);

  const placement = getStruct(params, 'Placement');
  const zone = placement ? getString(placement, 'AvailabilityZone') : undefined;
  const defaultVpc = await findDefaultVpc(store);
  const candidates = (await store.list('subnet')).filter(
    (subnet) =>
      subnet.attributes.vpcId === defaultVpc?.id &&
      subnet.attributes.defaultForAz === true &&
      (zone === undefined || subnet.attributes.availabilityZone === zone),
  );
  if (!defaultVpc || candidates.length === 0) {
    throw new ServiceException(
      validationError('VPCIdNotSpecified', 'No default VPC for this user. A SubnetId must be specified.'),
    );
  }
  return candidates[0];
}

async function resolveSecurityGroups(store: ResourceStore, params: ParameterTree, vpcId: string): Promise<Resource[]> {
  const def = RESOURCE_TYPES['security-group'];
  const all = await store.list('security-group');
  const selected: Resource[] = [];

  for (const groupId of getStringList(params, 'SecurityGroupId')) {
    const group = all.find((candidate) => candidate.id === groupId);
    if (!group) {
      throw new ServiceException(
        validationError(def.notFoundCode, `The security group '${groupId}' does not exist`, { groupId }),
      );
    }
    if (group.attributes.vpcId !== vpcId) {
      throw new ServiceException(
        validationError(
          'InvalidParameter',
          `Security group ${groupId} and subnet belong to different networks.`,
        ),
      );
    }
    selected.push(group);
  }
  for (const groupName of getStringList(params, 'SecurityGroup')) {
    const group = all.find((candidate) => candidate.attributes.vpcId === vpcId && candidate.attributes.groupName === groupName);
    if (!group) {
      throw new ServiceException(
        validationError(def.notFoundCode, `The security group '${groupName}' does not exist in VPC '${vpcId}'`, {
          groupName,
        }),
      );
    }
    if (!selected.some((existing) => existing.id === group.id)) selected.push(group);
  }

  if (selected.length === 0) {
    const fallback = all.find((group) => group.attributes.vpcId === vpcId && group.attributes.isDefault === true);
    if (fallback) selected.push(fallback);
  }
  return selected;
}

async function resolvePlacement(store: ResourceStore, params: ParameterTree): Promise<Placement> {
  const subnet = await resolveSubnet(store, params);
  const vpcId = attrString(subnet.attributes, 'vpcId') ?? '';
  return { subnet, groups: await resolveSecurityGroups(store, params, vpcId) };
}

function privateDnsName(address: string, region: string): string {
  const host = `ip-${address.replace(/\./g, '-')}`;
  return region === 'us-east-1' ? `${host}.ec2.internal` : `${host}.${region}.compute.internal`;
}

/** Elastic IPs keyed by the instance they are associated with. */
async function addressesByInstance(store: ResourceStore): Promise<Map<string, string>> {
  const byInstance = new Map<string, string>();
  for (const address of await store.list('elastic-ip')) {
    const instanceId = attrString(address.attributes, 'instanceId');
    const publicIp = attrString(address.attributes, 'publicIp');
    if (instanceId && publicIp) byInstance.set(instanceId, publicIp);
  }
  return byInstance;
}

export interface RenderLookups {
  volumes: Resource[];
  addresses: Map<string, string>;
}

async function renderLookups(store: ResourceStore): Promise<RenderLookups> {
  return { volumes: await store.list('volume'), addresses: await addressesByInstance(store) };
}

export function renderInstance(instance: Resource, lookups: RenderLookups): ValueMap {
  const blockDeviceMapping: ValueMap[] = [];
  for (const volume of lookups.volumes) {
    for (const attachment of attrMaps(volume.attributes, 'attachments')) {
      if (attachment.instanceId !== instance.id) continue;
      blockDeviceMapping.push({
        deviceName: attachment.device,
        ebs: {
          volumeId: volume.id,
          status: attachment.state,
          attachTime: attachment.attachTime,
          deleteOnTermination: attachment.deleteOnTermination,
        },
      });
    }
  }

  const publicIp = lookups.addresses.get(instance.id) ?? attrString(instance.attributes, 'publicIpAddress');
  const live = instance.state !== 'terminated';
  const rendered: ValueMap = {
    instanceId: instance.id,
    imageId: instance.attributes.imageId,
    instanceState: instanceState(instance.state),
    privateDnsName: live ? instance.attributes.privateDnsName : '',
    dnsName: '',
    reason: instance.attributes.stateTransitionReason ?? '',
    amiLaunchIndex: instance.attributes.amiLaunchIndex,
    productCodes: [],
    instanceType: instance.attributes.instanceType,
    launchTime: instance.attributes.launchTime,
    placement: instance.attributes.placement,
    monitoring: { state: 'disabled' },
    subnetId: live ? instance.attributes.subnetId : null,
    vpcId: live ? instance.attributes.vpcId : null,
    privateIpAddress: live ? instance.attributes.privateIpAddress : null,
    sourceDestCheck: true,
    groupSet: attrMaps(instance.attributes, 'securityGroups'),
    architecture: instance.attributes.architecture,
    rootDeviceType: 'ebs',
    rootDeviceName: ROOT_DEVICE_NAME,
    blockDeviceMapping,
    virtualizationType: 'hvm',
    clientToken: instance.attributes.clientToken ?? '',
    tagSet: tagSet(instance.tags),
    hypervisor: 'xen',
    ebsOptimized: false,
  };
  if (instance.attributes.keyName !== undefined) rendered.keyName = instance.attributes.keyName;
  if (publicIp && instance.state === 'running') rendered.ipAddress = publicIp;
  return rendered;
}

async function terminateInstance(store: ResourceStore, instance: Resource): Promise<void> {
  for (const volume of await store.list('volume')) {
    const attachment = attrMaps(volume.attributes, 'attachments').find((entry) => entry.instanceId === instance.id);
    if (!attachment) continue;
    await releaseVolume(store, volume.id);
    if (attachment.deleteOnTermination === true) await store.delete('volume', volume.id);
  }
  await disassociateAddressesOf(store, instance.id);

  const subnetId = attrString(instance.attributes, 'subnetId');
  const address = attrString(instance.attributes, 'privateIpAddress');
  if (subnetId && address) await releasePrivateIp(store, subnetId, address);

  await store.update('instance', instance.id, (current) => ({
    attributes: {
      ...current.attributes,
      stateTransitionReason: `User initiated (${new Date().toISOString()})`,
    },
    state: 'terminated',
  }));
}

type Transition = 'start' | 'stop' | 'terminate';

/**
 * Apply a state transition to every listed instance. All ids are resolved
 * and every transition is checked before any instance changes.
 */
async function transitionInstances(params: ParameterTree, ctx: HandlerContext, transition: Transition): Promise<ValueMap> {
  const ids = getStringList(params, 'InstanceId');
  if (ids.length === 0) {
    throw new ServiceException(missingParameterError('InstanceId'));
  }
  const instances: Resource[] = [];
  for (const id of ids) instances.push(await ctx.store.get('instance', id));

  for (const instance of instances) {
    if (transition === 'stop' && !['pending', 'running', 'stopping', 'stopped'].includes(instance.state)) {
      throw incorrectState(instance.id, instance.state, 'stopped');
    }
    if (transition === 'start' && !['pending', 'running', 'stopped'].includes(instance.state)) {
      throw incorrectState(instance.id, instance.state, 'started');
    }
  }

  const changes: ValueMap[] = [];
  for (const instance of instances) {
    let current = instance.state;
    if (transition === 'terminate' && current !== 'terminated') {
      await terminateInstance(ctx.store, instance);
      current = 'terminated';
    } else if (transition === 'stop' && current !== 'stopped') {
      await ctx.store.update('instance', instance.id, (state) => ({
        attributes: {
          ...state.attributes,
          stateTransitionReason: `User initiated (${new Date().toISOString()})`,
        },
        state: 'stopped',
      }));
      current = 'stopped';
    } else if (transition === 'start' && current !== 'running') {
      await ctx.store.update('instance', instance.id, (state) => ({
        attributes: { ...state.attributes, stateTransitionReason: '' },
        state: 'running',
      }));
      current = 'running';
    }
    changes.push({
      instanceId: instance.id,
      currentState: instanceState(current),
      previousState: instanceState(instance.state),
    });
  }

  ctx.logger.info('Instance state changed', { transition, instanceIds: ids });
  return { instancesSet: changes };
}

export const instanceHandler = defineEc2Handler('instance', {
  async RunInstances(params, ctx) {
    const imageId = requireString(params, 'ImageId');
    if (!AMI_ID.test(imageId)) {
      throw new ServiceException(
        validationError('InvalidAMIID.Malformed', `Invalid id: "${imageId}" (expecting "ami-...")`, { imageId }),
      );
    }
    const minCount = getInteger(params, 'MinCount', { min: 1 });
    const maxCount = getInteger(params, 'MaxCount', { min: 1 });
    if (minCount === undefined) throw new ServiceException(missingParameterError('MinCount'));
    if (maxCount === undefined) throw new ServiceException(missingParameterError('MaxCount'));
    if (minCount > maxCount) {
      throw new ServiceException(
        validationError('InvalidParameterValue', 'MinCount must be less than or equal to MaxCount'),
      );
    }
    const instanceType = getString(params, 'InstanceType') ?? 'm1.small';
    if (!INSTANCE_TYPE.test(instanceType)) {
      throw new ServiceException(
        validationError('InvalidParameterValue', `Invalid value '${instanceType}' for InstanceType.`),
      );
    }
    const keyName = getString(params, 'KeyName');
    if (keyName !== undefined && !(await findKeyPairByName(ctx.store, keyName))) throw keyPairNotFound(keyName);

    const requestedAddress = getString(params, 'PrivateIpAddress');
    if (requestedAddress !== undefined && maxCount > 1) {
      throw new ServiceException(
        validationError(
          'InvalidParameterCombination',
          'Cannot specify a private IP address when launching more than one instance',
        ),
      );
    }
    const instanceTags = parseTagSpecifications(params, 'instance', TAGGABLE_ON_LAUNCH);
    const volumeTags = parseTagSpecifications(params, 'volume', TAGGABLE_ON_LAUNCH);
    const devices = parseBlockDevices(params);
    const { subnet, groups } = await resolvePlacement(ctx.store, params);

    const live = (await ctx.store.list('instance')).filter((instance) => instance.state !== 'terminated').length;
    const freeAddresses = typeof subnet.attributes.availableIpAddressCount === 'number' ? subnet.attributes.availableIpAddressCount : 0;
    const count = Math.min(maxCount, MAX_INSTANCES - live, freeAddresses);
    if (count < minCount) {
      const code = MAX_INSTANCES - live < minCount ? 'InstanceLimitExceeded' : 'InsufficientFreeAddressesInSubnet';
      throw new ServiceException(
        validationError(code, `Unable to launch ${minCount} instances: capacity for ${Math.max(count, 0)} remains.`),
      );
    }

    const reservationId = generateId('r');
    const zone = attrString(subnet.attributes, 'availabilityZone') ?? '';
    const volumes = devices.map((device) => {
      const spec: VolumeSpec = {
        size: device.volumeSize,
        availabilityZone: zone,
        volumeType: device.volumeType,
        iops: device.iops,
        encrypted: device.encrypted,
        tags: volumeTags,
      };
      validateVolumeSpec(spec);
      return { device, spec };
    });
    const groupSet = groups.map((group) => ({ groupId: group.id, groupName: group.attributes.groupName }));
    const launchTime = new Date().toISOString();
    const clientToken = getString(params, 'ClientToken');
    const created: Resource[] = [];

    for (let index = 0; index < count; index++) {
      const privateIpAddress = await allocatePrivateIp(ctx.store, subnet.id, requestedAddress);
      const attributes: ValueMap = {
        imageId,
        instanceType,
        reservationId,
        ownerId: ctx.accountId,
        amiLaunchIndex: index,
        subnetId: subnet.id,
        vpcId: subnet.attributes.vpcId,
        privateIpAddress,
        privateDnsName: privateDnsName(privateIpAddress, ctx.region),
        placement: { availabilityZone: zone, groupName: '', tenancy: 'default' },
        securityGroups: groupSet,
        architecture: 'x86_64',
        launchTime,
        stateTransitionReason: '',
      };
      if (keyName !== undefined) attributes.keyName = keyName;
      if (clientToken !== undefined) attributes.clientToken = clientToken;
      if (subnet.attributes.mapPublicIpOnLaunch === true) {
        const [, , c = '0', d = '0'] = privateIpAddress.split('.');
        attributes.publicIpAddress = `54.0.${c}.${d}`;
      }

      const instance = await ctx.store.create('instance', attributes, instanceTags);
      for (const { device, spec } of volumes) {
        await createVolume(
          ctx.store,
          spec,
          { instanceId: instance.id, device: device.deviceName, deleteOnTermination: device.deleteOnTermination },
          launchTime,
        );
      }
      created.push(instance);
    }

    ctx.logger.info('Instances launched', {
      reservationId,
      subnetId: subnet.id,
      instanceIds: created.map((instance) => instance.id),
    });
    const lookups = await renderLookups(ctx.store);
    return {
      reservationId,
      ownerId: ctx.accountId,
      groupSet,
      instancesSet: created.map((instance) => renderInstance(instance, lookups)),
    };
  },

  async DescribeInstances(params, ctx) {
    const selected = await selectResources(ctx.store, 'instance', params, 'InstanceId');
    const page = paginate(selected, params);
    const lookups = await renderLookups(ctx.store);

    const reservations = new Map<string, ValueMap[]>();
    for (const instance of page.items) {
      const reservationId = attrString(instance.attributes, 'reservationId') ?? '';
      const members = reservations.get(reservationId) ?? [];
      members.push(renderInstance(instance, lookups));
      reservations.set(reservationId, members);
    }

    const reservationSet: ValueMap[] = [];
    for (const [reservationId, instancesSet] of reservations) {
      reservationSet.push({ reservationId, ownerId: ctx.accountId, groupSet: [], instancesSet });
    }
    const body: ValueMap = { reservationSet };
    if (page.nextToken) body.nextToken = page.nextToken;
    return body;
  },

  async TerminateInstances(params, ctx) {
    return transitionInstances(params, ctx, 'terminate');
  },

  async StopInstances(params, ctx) {
    return transitionInstances(params, ctx, 'stop');
  },

  async StartInstances(params, ctx) {
    return transitionInstances(params, ctx, 'start');
  },
});
