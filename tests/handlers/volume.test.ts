import { createHarness, Harness, listAt, mapAt, stringAt } from '../helpers';

describe('Volume actions', () => {
  let h: Harness;
  let subnetId: string;

  async function createVolume(params: Record<string, string | number | boolean> = {}): Promise<string> {
    return stringAt(await h.ok('CreateVolume', { AvailabilityZone: 'us-east-1a', Size: 10, ...params }), 'volumeId');
  }

  async function describeVolume(volumeId: string) {
    return listAt(await h.ok('DescribeVolumes', { 'VolumeId.1': volumeId }), 'volumeSet')[0];
  }

  async function launch(): Promise<string> {
    const body = await h.ok('RunInstances', { ImageId: 'ami-12345678', MinCount: 1, MaxCount: 1, SubnetId: subnetId });
    return stringAt(listAt(body, 'instancesSet')[0], 'instanceId');
  }

  beforeEach(async () => {
    h = createHarness();
    const vpcId = stringAt(mapAt(await h.ok('CreateVpc', { CidrBlock: '10.0.0.0/16' }), 'vpc'), 'vpcId');
    subnetId = stringAt(
      mapAt(await h.ok('CreateSubnet', { VpcId: vpcId, CidrBlock: '10.0.1.0/24', AvailabilityZone: 'us-east-1a' }), 'subnet'),
      'subnetId',
    );
  });

  test('CreateVolume returns an available volume with type defaults', async () => {
    const body = await h.ok('CreateVolume', { AvailabilityZone: 'us-east-1a', Size: 50 });
    expect(stringAt(body, 'volumeId')).toMatch(/^vol-[0-9a-f]{17}$/);
    expect(body.status).toBe('available');
    expect(body.size).toBe(50);
    expect(body.volumeType).toBe('gp2');
    expect(body.iops).toBe(150);
    expect(body.encrypted).toBe(false);
    expect(body.attachmentSet).toEqual([]);
  });

  test('provisioned IOPS rules per volume type', async () => {
    expect((await describeVolume(await createVolume({ VolumeType: 'io1', Iops: 500 }))).iops).toBe(500);
    expect((await describeVolume(await createVolume({ VolumeType: 'sc1', Size: 500 }))).iops).toBeUndefined();
    expect(await h.fail('CreateVolume', { AvailabilityZone: 'us-east-1a', Size: 10, VolumeType: 'io1' })).toBe(
      'MissingParameter',
    );
    expect(await h.fail('CreateVolume', { AvailabilityZone: 'us-east-1a', Size: 10, Iops: 500 })).toBe(
      'InvalidParameterCombination',
    );
    expect(await h.fail('CreateVolume', { AvailabilityZone: 'us-east-1a', Size: 10, VolumeType: 'gp3', Iops: 20000 })).toBe(
      'InvalidParameterValue',
    );
  });

  test('size, type, zone and snapshot are validated', async () => {
    expect(await h.fail('CreateVolume', { AvailabilityZone: 'us-east-1a' })).toBe('MissingParameter');
    expect(await h.fail('CreateVolume', { AvailabilityZone: 'us-east-1a', Size: 0 })).toBe('InvalidParameterValue');
    expect(await h.fail('CreateVolume', { AvailabilityZone: 'us-east-1a', Size: 100, VolumeType: 'st1' })).toBe(
      'InvalidParameterValue',
    );
    expect(await h.fail('CreateVolume', { AvailabilityZone: 'us-east-1a', Size: 10, VolumeType: 'floppy' })).toBe(
      'InvalidParameterValue',
    );
    expect(await h.fail('CreateVolume', { AvailabilityZone: 'eu-west-1a', Size: 10 })).toBe('InvalidParameterValue');
    expect(await h.fail('CreateVolume', { AvailabilityZone: 'us-east-1a', SnapshotId: 'snap-12345678' })).toBe(
      'InvalidSnapshot.NotFound',
    );
  });

  test('attach and detach move the volume between available and in-use', async () => {
    const volumeId = await createVolume();
    const instanceId = await launch();

    const attached = await h.ok('AttachVolume', { VolumeId: volumeId, InstanceId: instanceId, Device: '/dev/sdf' });
    expect(attached.status).toBe('attached');
    expect(attached.device).toBe('/dev/sdf');

    const volume = await describeVolume(volumeId);
    expect(volume.status).toBe('in-use');
    expect(listAt(volume, 'attachmentSet').map((a) => [a.instanceId, a.device, a.status])).toEqual([
      [instanceId, '/dev/sdf', 'attached'],
    ]);

    const byInstance = await h.ok('DescribeVolumes', {
      'Filter.1.Name': 'attachment.instance-id',
      'Filter.1.Value.1': instanceId,
    });
    expect(listAt(byInstance, 'volumeSet')).toHaveLength(2);

    const detached = await h.ok('DetachVolume', { VolumeId: volumeId });
    expect(detached.status).toBe('detached');
    expect(detached.instanceId).toBe(instanceId);
    expect((await describeVolume(volumeId)).status).toBe('available');
    expect(await h.fail('DetachVolume', { VolumeId: volumeId })).toBe('IncorrectState');
  });

  test('attachment conflicts', async () => {
    const volumeId = await createVolume();
    const instanceId = await launch();

    expect(await h.fail('AttachVolume', { VolumeId: volumeId, InstanceId: instanceId, Device: '/dev/xvda' })).toBe(
      'InvalidParameterValue',
    );
    await h.ok('AttachVolume', { VolumeId: volumeId, InstanceId: instanceId, Device: '/dev/sdf' });
    expect(await h.fail('AttachVolume', { VolumeId: volumeId, InstanceId: instanceId, Device: '/dev/sdg' })).toBe(
      'IncorrectState',
    );
    expect(await h.fail('DeleteVolume', { VolumeId: volumeId })).toBe('VolumeInUse');
    expect(await h.fail('DetachVolume', { VolumeId: volumeId, InstanceId: 'i-0000000000000000f' })).toBe('IncorrectState');
    expect(await h.fail('DetachVolume', { VolumeId: volumeId, Device: '/dev/sdz' })).toBe('InvalidAttachment.NotFound');

    const elsewhere = await createVolume({ AvailabilityZone: 'us-east-1b' });
    expect(await h.fail('AttachVolume', { VolumeId: elsewhere, InstanceId: instanceId, Device: '/dev/sdg' })).toBe(
      'InvalidVolume.ZoneMismatch',
    );
  });

  test('terminated instances cannot take volumes and release attached ones', async () => {
    const volumeId = await createVolume();
    const instanceId = await launch();
    await h.ok('AttachVolume', { VolumeId: volumeId, InstanceId: instanceId, Device: '/dev/sdf' });
    await h.ok('TerminateInstances', { 'InstanceId.1': instanceId });

    const volume = await describeVolume(volumeId);
    expect(volume.status).toBe('available');
    expect(volume.attachmentSet).toEqual([]);
    expect(await h.fail('AttachVolume', { VolumeId: volumeId, InstanceId: instanceId, Device: '/dev/sdf' })).toBe(
      'IncorrectInstanceState',
    );
  });

  test('DeleteVolume removes the volume', async () => {
    const volumeId = await createVolume();
    expect(await h.ok('DeleteVolume', { VolumeId: volumeId })).toEqual({ return: true });
    expect(await h.fail('DescribeVolumes', { 'VolumeId.1': volumeId })).toBe('InvalidVolume.NotFound');
    expect(await h.fail('DeleteVolume', { VolumeId: volumeId })).toBe('InvalidVolume.NotFound');
  });
});
