/**
 * EBS volume actions and the attach/detach bookkeeping shared with instances.
 */

import { ServiceException, validationError } from '../domain/errors';
import type { Resource, Tag } from '../domain/resource';
import { isValueMap, ValueMap } from '../domain/value-tree';
import type { ResourceStore } from '../storage/store';
import { attrMaps, attrString, defineEc2Handler, describeResources, tagSet } from './common';
import { getBoolean, getInteger, getString, parseTagSpecifications, requireString } from './params';
import { findAvailabilityZone } from './regions';

interface VolumeTypeLimits {
  minSize: number;
  maxSize: number;
  /** Provisioned IOPS bounds, when the type takes an `Iops` parameter. */
  iops?: { min: number; max: number; required: boolean };
}

const VOLUME_TYPES: Record<string, VolumeTypeLimits> = {
  standard: { minSize: 1, maxSize: 1024 },
  gp2: { minSize: 1, maxSize: 16384 },
  gp3: { minSize: 1, maxSize: 16384, iops: { min: 3000, max: 16000, required: false } },
  io1: { minSize: 4, maxSize: 16384, iops: { min: 100, max: 64000, required: true } },
  io2: { minSize: 4, maxSize: 16384, iops: { min: 100, max: 64000, required: true } },
  st1: { minSize: 125, maxSize: 16384 },
  sc1: { minSize: 125, maxSize: 16384 },
};

const GP3_BASELINE_IOPS = 3000;

export interface VolumeSpec {
  size: number;
  availabilityZone: string;
  volumeType?: string;
  iops?: number;
  encrypted?: boolean;
  tags?: Tag[];
}

export interface VolumeAttachment {
  instanceId: string;
  device: string;
  deleteOnTermination: boolean;
}

function defaultIops(volumeType: string, size: number): number | undefined {
  if (volumeType === 'gp2') return Math.min(Math.max(100, size * 3), 16000);
  if (volumeType === 'gp3') return GP3_BASELINE_IOPS;
  return undefined;
}

export function validateVolumeSpec(spec: VolumeSpec): void {
  const volumeType = spec.volumeType ?? 'gp2';
  const limits = VOLUME_TYPES[volumeType];
  if (!limits) {
    throw new ServiceException(
      validationError('InvalidParameterValue', `Value (${volumeType}) for parameter volumeType is invalid.`),
    );
  }
  if (spec.size < limits.minSize || spec.size > limits.maxSize) {
    throw new ServiceException(
      validationError(
        'InvalidParameterValue',
        `Volume of ${spec.size}GiB is outside the ${limits.minSize}-${limits.maxSize}GiB range for ${volumeType}.`,
      ),
    );
  }
  if (!limits.iops && spec.iops !== undefined) {
    throw new ServiceException(
      validationError('InvalidParameterCombination', `The parameter iops is not supported for ${volumeType} volumes.`),
    );
  }
  if (limits.iops) {
    if (limits.iops.required && spec.iops === undefined) {
      throw new ServiceException(validationError('MissingParameter', `The request must contain the parameter iops`));
    }
    if (spec.iops !== undefined && (spec.iops < limits.iops.min || spec.iops > limits.iops.max)) {
      throw new ServiceException(
        validationError('InvalidParameterValue', `Iops ${spec.iops} is outside the supported range for ${volumeType}.`),
      );
    }
  }
}

/** Create a volume, optionally already attached to an instance. */
export async function createVolume(
  store: ResourceStore,
  spec: VolumeSpec,
  attachment?: VolumeAttachment,
  attachTime = new Date().toISOString(),
): Promise<Resource> {
  validateVolumeSpec(spec);
  const volumeType = spec.volumeType ?? 'gp2';
  const attributes: ValueMap = {
    size: spec.size,
    availabilityZone: spec.availabilityZone,
    volumeType,
    encrypted: spec.encrypted ?? false,
    snapshotId: '',
    multiAttachEnabled: false,
    attachments: attachment ? [{ ...attachment, state: 'attached', attachTime }] : [],
  };
  const iops = spec.iops ?? defaultIops(volumeType, spec.size);
  if (iops !== undefined) attributes.iops = iops;

  const volume = await store.create('volume', attributes, spec.tags);
  return attachment ? store.update('volume', volume.id, () => ({ state: 'in-use' })) : volume;
}

/** Clear a volume's attachment and make it available again. */
export async function releaseVolume(store: ResourceStore, volumeId: string): Promise<Resource> {
  return store.update('volume', volumeId, (current) => ({
    attributes: { ...current.attributes, attachments: [] },
    state: 'available',
  }));
}

function renderAttachments(volume: Resource): ValueMap[] {
  return attrMaps(volume.attributes, 'attachments').map((attachment) => ({
    volumeId: volume.id,
    instanceId: attachment.instanceId,
    device: attachment.device,
    status: attachment.state,
    attachTime: attachment.attachTime,
    deleteOnTermination: attachment.deleteOnTermination,
  }));
}

export function renderVolume(volume: Resource): ValueMap {
  const rendered: ValueMap = {
    volumeId: volume.id,
    size: volume.attributes.size,
    snapshotId: volume.attributes.snapshotId,
    availabilityZone: volume.attributes.availabilityZone,
    status: volume.state,
    createTime: volume.createdAt,
    attachmentSet: renderAttachments(volume),
    volumeType: volume.attributes.volumeType,
    encrypted: volume.attributes.encrypted,
    multiAttachEnabled: volume.attributes.multiAttachEnabled,
    tagSet: tagSet(volume.tags),
  };
  if (volume.attributes.iops !== undefined) rendered.iops = volume.attributes.iops;
  return rendered;
}

export const volumeHandler = defineEc2Handler('volume', {
  async CreateVolume(params, ctx) {
    const zoneName = requireString(params, 'AvailabilityZone');
    const zone = findAvailabilityZone(ctx.region, zoneName);
    if (!zone) {
      throw new ServiceException(
        validationError('InvalidParameterValue', `Value (${zoneName}) for parameter availabilityZone is invalid.`),
      );
    }
    const snapshotId = getString(params, 'SnapshotId');
    if (snapshotId !== undefined) {
      throw new ServiceException(
        validationError('InvalidSnapshot.NotFound', `The snapshot '${snapshotId}' does not exist.`),
      );
    }
    const size = getInteger(params, 'Size');
    if (size === undefined) {
      throw new ServiceException(validationError('MissingParameter', 'The request must contain the parameter size'));
    }

    const volume = await createVolume(ctx.store, {
      size,
      availabilityZone: zone.zoneName,
      volumeType: getString(params, 'VolumeType'),
      iops: getInteger(params, 'Iops'),
      encrypted: getBoolean(params, 'Encrypted'),
      tags: parseTagSpecifications(params, 'volume'),
    });
    ctx.logger.info('Volume created', { volumeId: volume.id, size });
    return renderVolume(volume);
  },

  async DescribeVolumes(params, ctx) {
    return describeResources(ctx.store, 'volume', params, {
      idParam: 'VolumeId',
      listName: 'volumeSet',
      render: renderVolume,
    });
  },

  async DeleteVolume(params, ctx) {
    const volumeId = requireString(params, 'VolumeId');
    const volume = await ctx.store.get('volume', volumeId);
    if (volume.state === 'in-use') {
      const instanceId = attrString(attrMaps(volume.attributes, 'attachments')[0] ?? {}, 'instanceId') ?? '';
      throw new ServiceException(
        validationError('VolumeInUse', `Volume ${volumeId} is currently attached to ${instanceId}`, {
          volumeId,
          instanceId,
        }),
      );
    }
    await ctx.store.delete('volume', volumeId);
    ctx.logger.info('Volume deleted', { volumeId });
    return { return: true };
  },

  async AttachVolume(params, ctx) {
    const volumeId = requireString(params, 'VolumeId');
    const instanceId = requireString(params, 'InstanceId');
    const device = requireString(params, 'Device');
    const volume = await ctx.store.get('volume', volumeId);
    const instance = await ctx.store.get('instance', instanceId);

    if (volume.state !== 'available') {
      throw new ServiceException(
        validationError('IncorrectState', `vol '${volumeId}' is in the '${volume.state}' state.`, {
          volumeId,
          state: volume.state,
        }),
      );
    }
    if (instance.state !== 'running' && instance.state !== 'stopped') {
      throw new ServiceException(
        validationError(
          'IncorrectInstanceState',
          `The instance '${instanceId}' is not in the 'running' or 'stopped' states.`,
        ),
      );
    }
    const placement = instance.attributes.placement;
    const instanceZone = isValueMap(placement) ? attrString(placement, 'availabilityZone') : undefined;
    if (instanceZone !== volume.attributes.availabilityZone) {
      throw new ServiceException(
        validationError(
          'InvalidVolume.ZoneMismatch',
          `The volume '${volumeId}' is not in the same availability zone as instance '${instanceId}'`,
        ),
      );
    }
    const volumes = await ctx.store.list('volume');
    const deviceTaken = volumes.some((other) =>
      attrMaps(other.attributes, 'attachments').some(
        (attachment) => attachment.instanceId === instanceId && attachment.device === device,
      ),
    );
    if (deviceTaken) {
      throw new ServiceException(
        validationError('InvalidParameterValue', `Attachment point ${device} is already in use`, { device }),
      );
    }

    const attachTime = new Date().toISOString();
    await ctx.store.update('volume', volumeId, (current) => ({
      attributes: {
        ...current.attributes,
        attachments: [{ instanceId, device, state: 'attached', attachTime, deleteOnTermination: false }],
      },
      state: 'in-use',
    }));
    ctx.logger.info('Volume attached', { volumeId, instanceId, device });
    return { volumeId, instanceId, device, status: 'attached', attachTime, deleteOnTermination: false };
  },

  async DetachVolume(params, ctx) {
    const volumeId = requireString(params, 'VolumeId');
    const volume = await ctx.store.get('volume', volumeId);
    const attachment = attrMaps(volume.attributes, 'attachments')[0];
    if (!attachment) {
      throw new ServiceException(
        validationError('IncorrectState', `Volume '${volumeId}' is in the '${volume.state}' state.`, {
          volumeId,
          state: volume.state,
        }),
      );
    }
    const instanceId = getString(params, 'InstanceId');
    if (instanceId !== undefined && attachment.instanceId !== instanceId) {
      throw new ServiceException(
        validationError(
          'IncorrectState',
          `Volume '${volumeId}' is not attached to instance '${instanceId}'`,
        ),
      );
    }
    const device = getString(params, 'Device');
    if (device !== undefined && attachment.device !== device) {
      throw new ServiceException(
        validationError('InvalidAttachment.NotFound', `Volume '${volumeId}' is not attached at '${device}'`),
      );
    }

    await releaseVolume(ctx.store, volumeId);
    ctx.logger.info('Volume detached', { volumeId, instanceId: attachment.instanceId });
    return {
      volumeId,
      instanceId: attachment.instanceId,
      device: attachment.device,
      status: 'detached',
      attachTime: attachment.attachTime,
    };
  },
});
