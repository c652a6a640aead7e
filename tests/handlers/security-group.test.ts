import { normalizeProtocol } from '../../src/handlers/security-group';
import { createVpcWithDefaults } from '../../src/handlers/vpc';
import { createHarness, Harness, listAt, mapAt, stringAt, TEST_ACCOUNT, thrownCode } from '../helpers';

describe('Security group actions', () => {
  let h: Harness;
  let vpcId: string;

  async function createGroup(name: string, vpc = vpcId): Promise<string> {
    return stringAt(await h.ok('CreateSecurityGroup', { GroupName: name, GroupDescription: `${name} group`, VpcId: vpc }), 'groupId');
  }

  async function describeGroup(groupId: string) {
    return listAt(await h.ok('DescribeSecurityGroups', { 'GroupId.1': groupId }), 'securityGroupInfo')[0];
  }

  const SSH_FROM_OFFICE = {
    'IpPermissions.1.IpProtocol': 'tcp',
    'IpPermissions.1.FromPort': 22,
    'IpPermissions.1.ToPort': 22,
    'IpPermissions.1.IpRanges.1.CidrIp': '10.0.0.0/8',
  };

  beforeEach(async () => {
    h = createHarness();
    vpcId = stringAt(mapAt(await h.ok('CreateVpc', { CidrBlock: '10.0.0.0/16' }), 'vpc'), 'vpcId');
  });

  test('CreateSecurityGroup returns the id and allows all egress', async () => {
    const body = await h.ok('CreateSecurityGroup', { GroupName: 'web', GroupDescription: 'web servers', VpcId: vpcId });
    expect(body.return).toBe(true);
    const groupId = stringAt(body, 'groupId');
    expect(groupId).toMatch(/^sg-[0-9a-f]{17}$/);

    const group = await describeGroup(groupId);
    expect(group.groupName).toBe('web');
    expect(group.groupDescription).toBe('web servers');
    expect(group.vpcId).toBe(vpcId);
    expect(group.ipPermissions).toEqual([]);
    expect(group.ipPermissionsEgress).toEqual([
      { ipProtocol: '-1', ipRanges: [{ cidrIp: '0.0.0.0/0' }], ipv6Ranges: [], prefixListIds: [], groups: [] },
    ]);
  });

  test('names are unique per VPC and "default" is reserved', async () => {
    await createGroup('web');
    expect(await h.fail('CreateSecurityGroup', { GroupName: 'web', GroupDescription: 'x', VpcId: vpcId })).toBe(
      'InvalidGroup.Duplicate',
    );
    expect(await h.fail('CreateSecurityGroup', { GroupName: 'default', GroupDescription: 'x', VpcId: vpcId })).toBe(
      'InvalidGroup.Reserved',
    );
  });

  test('without a VpcId the default VPC is required', async () => {
    expect(await h.fail('CreateSecurityGroup', { GroupName: 'web', GroupDescription: 'x' })).toBe('VPCIdNotSpecified');
  });

  test('a description is required', async () => {
    expect(await h.fail('CreateSecurityGroup', { GroupName: 'web', VpcId: vpcId })).toBe('MissingParameter');
  });

  test('authorize ingress adds a grouped permission', async () => {
    const groupId = await createGroup('web');
    await h.ok('AuthorizeSecurityGroupIngress', { GroupId: groupId, ...SSH_FROM_OFFICE });
    const group = await describeGroup(groupId);
    expect(group.ipPermissions).toEqual([
      {
        ipProtocol: 'tcp',
        fromPort: 22,
        toPort: 22,
        ipRanges: [{ cidrIp: '10.0.0.0/8' }],
        ipv6Ranges: [],
        prefixListIds: [],
        groups: [],
      },
    ]);
  });

  test('sources with the same protocol and ports share one permission', async () => {
    const groupId = await createGroup('web');
    await h.ok('AuthorizeSecurityGroupIngress', { GroupId: groupId, ...SSH_FROM_OFFICE });
    await h.ok('AuthorizeSecurityGroupIngress', {
      GroupId: groupId,
      'IpPermissions.1.IpProtocol': '6',
      'IpPermissions.1.FromPort': 22,
      'IpPermissions.1.ToPort': 22,
      'IpPermissions.1.IpRanges.1.CidrIp': '192.168.0.0/16',
      'IpPermissions.1.IpRanges.1.Description': 'vpn',
    });
    const permissions = listAt(await describeGroup(groupId), 'ipPermissions');
    expect(permissions).toHaveLength(1);
    expect(permissions[0].ipRanges).toEqual([{ cidrIp: '10.0.0.0/8' }, { cidrIp: '192.168.0.0/16', description: 'vpn' }]);
  });

  test('authorizing an existing rule is InvalidPermission.Duplicate and changes nothing', async () => {
    const groupId = await createGroup('web');
    await h.ok('AuthorizeSecurityGroupIngress', { GroupId: groupId, ...SSH_FROM_OFFICE });
    expect(
      await h.fail('AuthorizeSecurityGroupIngress', {
        GroupId: groupId,
        ...SSH_FROM_OFFICE,
        'IpPermissions.1.IpRanges.2.CidrIp': '172.16.0.0/12',
      }),
    ).toBe('InvalidPermission.Duplicate');
    const permissions = listAt(await describeGroup(groupId), 'ipPermissions');
    expect(permissions[0].ipRanges).toEqual([{ cidrIp: '10.0.0.0/8' }]);
  });

  test('revoke removes an existing rule and rejects a missing one', async () => {
    const groupId = await createGroup('web');
    await h.ok('AuthorizeSecurityGroupIngress', { GroupId: groupId, ...SSH_FROM_OFFICE });
    await h.ok('RevokeSecurityGroupIngress', { GroupId: groupId, ...SSH_FROM_OFFICE });
    expect((await describeGroup(groupId)).ipPermissions).toEqual([]);
    expect(await h.fail('RevokeSecurityGroupIngress', { GroupId: groupId, ...SSH_FROM_OFFICE })).toBe(
      'InvalidPermission.NotFound',
    );
  });

  test('egress rules are managed separately', async () => {
    const groupId = await createGroup('web');
    await h.ok('RevokeSecurityGroupEgress', {
      GroupId: groupId,
      'IpPermissions.1.IpProtocol': '-1',
      'IpPermissions.1.IpRanges.1.CidrIp': '0.0.0.0/0',
    });
    await h.ok('AuthorizeSecurityGroupEgress', {
      GroupId: groupId,
      'IpPermissions.1.IpProtocol': 'tcp',
      'IpPermissions.1.FromPort': 443,
      'IpPermissions.1.ToPort': 443,
      'IpPermissions.1.IpRanges.1.CidrIp': '0.0.0.0/0',
    });
    const group = await describeGroup(groupId);
    expect(group.ipPermissions).toEqual([]);
    expect(listAt(group, 'ipPermissionsEgress').map((p) => [p.ipProtocol, p.fromPort])).toEqual([['tcp', 443]]);
  });

  test('tcp and udp rules need ports, and ranges must be ordered', async () => {
    const groupId = await createGroup('web');
    expect(
      await h.fail('AuthorizeSecurityGroupIngress', {
        GroupId: groupId,
        'IpPermissions.1.IpProtocol': 'tcp',
        'IpPermissions.1.IpRanges.1.CidrIp': '0.0.0.0/0',
      }),
    ).toBe('InvalidParameterValue');
    expect(
      await h.fail('AuthorizeSecurityGroupIngress', {
        GroupId: groupId,
        'IpPermissions.1.IpProtocol': 'udp',
        'IpPermissions.1.FromPort': 100,
        'IpPermissions.1.ToPort': 50,
        'IpPermissions.1.IpRanges.1.CidrIp': '0.0.0.0/0',
      }),
    ).toBe('InvalidParameterValue');
  });

  test('a permission without sources is rejected', async () => {
    const groupId = await createGroup('web');
    expect(
      await h.fail('AuthorizeSecurityGroupIngress', {
        GroupId: groupId,
        'IpPermissions.1.IpProtocol': 'icmp',
        'IpPermissions.1.FromPort': -1,
        'IpPermissions.1.ToPort': -1,
      }),
    ).toBe('InvalidParameterValue');
    expect(await h.fail('AuthorizeSecurityGroupIngress', { GroupId: groupId })).toBe('MissingParameter');
  });

  test('the legacy top-level permission form is accepted', async () => {
    const groupId = await createGroup('web');
    await h.ok('AuthorizeSecurityGroupIngress', {
      GroupId: groupId,
      IpProtocol: 'tcp',
      FromPort: 80,
      ToPort: 80,
      CidrIp: '0.0.0.0/0',
    });
    const permissions = listAt(await describeGroup(groupId), 'ipPermissions');
    expect(permissions.map((p) => [p.ipProtocol, p.fromPort, p.toPort])).toEqual([['tcp', 80, 80]]);
  });

  test('group sources must exist and then block deletion of the source group', async () => {
    const web = await createGroup('web');
    const lb = await createGroup('lb');
    const fromLb = {
      GroupId: web,
      'IpPermissions.1.IpProtocol': 'tcp',
      'IpPermissions.1.FromPort': 80,
      'IpPermissions.1.ToPort': 80,
      'IpPermissions.1.Groups.1.GroupId': lb,
    };

    expect(
      await h.fail('AuthorizeSecurityGroupIngress', {
        ...fromLb,
        'IpPermissions.1.Groups.1.GroupId': 'sg-0000000000000000f',
      }),
    ).toBe('InvalidGroup.NotFound');

    await h.ok('AuthorizeSecurityGroupIngress', fromLb);
    const permissions = listAt(await describeGroup(web), 'ipPermissions');
    expect(permissions[0].groups).toEqual([{ groupId: lb, userId: TEST_ACCOUNT }]);

    const referencing = await h.ok('DescribeSecurityGroups', {
      'Filter.1.Name': 'ip-permission.group-id',
      'Filter.1.Value.1': lb,
    });
    expect(listAt(referencing, 'securityGroupInfo').map((g) => g.groupId)).toEqual([web]);

    expect(await h.fail('DeleteSecurityGroup', { GroupId: lb })).toBe('DependencyViolation');
    await h.ok('RevokeSecurityGroupIngress', fromLb);
    expect(await h.ok('DeleteSecurityGroup', { GroupId: lb })).toEqual({ return: true });
  });

  test('group sources are also read from UserIdGroupPairs', async () => {
    const web = await createGroup('web');
    const lb = await createGroup('lb');
    await h.ok('AuthorizeSecurityGroupIngress', {
      GroupId: web,
      'IpPermissions.1.IpProtocol': 'tcp',
      'IpPermissions.1.FromPort': 443,
      'IpPermissions.1.ToPort': 443,
      'IpPermissions.1.UserIdGroupPairs.1.GroupId': lb,
    });
    const permissions = listAt(await describeGroup(web), 'ipPermissions');
    expect(permissions[0].groups).toEqual([{ groupId: lb, userId: TEST_ACCOUNT }]);
  });

  test('the default group cannot be deleted', async () => {
    const [defaultGroup] = (await h.store.list('security-group')).filter((g) => g.attributes.vpcId === vpcId);
    expect(await h.fail('DeleteSecurityGroup', { GroupId: defaultGroup.id })).toBe('CannotDelete');
  });

  test('DescribeSecurityGroups by name and by filter', async () => {
    const web = await createGroup('web');
    await h.ok('AuthorizeSecurityGroupIngress', { GroupId: web, ...SSH_FROM_OFFICE });

    const byName = await h.ok('DescribeSecurityGroups', { 'GroupName.1': 'web' });
    expect(listAt(byName, 'securityGroupInfo').map((g) => g.groupId)).toEqual([web]);

    const byCidr = await h.ok('DescribeSecurityGroups', {
      'Filter.1.Name': 'ip-permission.cidr',
      'Filter.1.Value.1': '10.*',
    });
    expect(listAt(byCidr, 'securityGroupInfo').map((g) => g.groupId)).toEqual([web]);

    expect(await h.fail('DescribeSecurityGroups', { 'GroupName.1': 'nope' })).toBe('InvalidGroup.NotFound');
    expect(await h.fail('DescribeSecurityGroups', { 'GroupId.1': 'sg-0000000000000000f' })).toBe('InvalidGroup.NotFound');
  });

  test('groups in the default VPC are addressable by name', async () => {
    await createVpcWithDefaults(h.store, TEST_ACCOUNT, { cidrBlock: '172.31.0.0/16', isDefault: true });
    const created = await h.ok('CreateSecurityGroup', { GroupName: 'web', GroupDescription: 'web' });
    const groupId = stringAt(created, 'groupId');

    await h.ok('AuthorizeSecurityGroupIngress', { GroupName: 'web', ...SSH_FROM_OFFICE });
    expect(listAt(await describeGroup(groupId), 'ipPermissions')).toHaveLength(1);
    expect(await h.ok('DeleteSecurityGroup', { GroupName: 'web' })).toEqual({ return: true });
  });
});

describe('protocol names', () => {
  test('names and numbers normalize to the provider form', () => {
    expect(normalizeProtocol('TCP')).toBe('tcp');
    expect(normalizeProtocol('17')).toBe('udp');
    expect(normalizeProtocol('all')).toBe('-1');
    expect(normalizeProtocol('47')).toBe('47');
  });

  test('unknown protocols are rejected', () => {
    expect(thrownCode(() => normalizeProtocol('carrier-pigeon'))).toBe('InvalidParameterValue');
    expect(thrownCode(() => normalizeProtocol('300'))).toBe('InvalidParameterValue');
  });
});
