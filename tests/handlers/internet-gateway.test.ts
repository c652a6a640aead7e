import { createHarness, Harness, listAt, mapAt, stringAt } from '../helpers';

async function createVpc(h: Harness, cidr = '10.0.0.0/16'): Promise<string> {
  return stringAt(mapAt(await h.ok('CreateVpc', { CidrBlock: cidr }), 'vpc'), 'vpcId');
}

async function createGateway(h: Harness): Promise<string> {
  return stringAt(mapAt(await h.ok('CreateInternetGateway'), 'internetGateway'), 'internetGatewayId');
}

describe('Internet gateway actions', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  test('a new gateway is detached', async () => {
    const body = await h.ok('CreateInternetGateway');
    const gateway = mapAt(body, 'internetGateway');
    expect(gateway.internetGatewayId).toMatch(/^igw-[0-9a-f]{17}$/);
    expect(gateway.attachmentSet).toEqual([]);
    expect(gateway.ownerId).toBe('123456789012');
  });

  test('attach and detach round trip', async () => {
    const vpcId = await createVpc(h);
    const igw = await createGateway(h);

    await h.ok('AttachInternetGateway', { InternetGatewayId: igw, VpcId: vpcId });
    const attached = await h.ok('DescribeInternetGateways', {
      'Filter.1.Name': 'attachment.vpc-id',
      'Filter.1.Value.1': vpcId,
    });
    expect(listAt(attached, 'internetGatewaySet')[0].attachmentSet).toEqual([{ vpcId, state: 'available' }]);

    await h.ok('DetachInternetGateway', { InternetGatewayId: igw, VpcId: vpcId });
    const detached = await h.ok('DescribeInternetGateways', { 'InternetGatewayId.1': igw });
    expect(listAt(detached, 'internetGatewaySet')[0].attachmentSet).toEqual([]);
  });

  test('a gateway attaches to one VPC and a VPC takes one gateway', async () => {
    const a = await createVpc(h, '10.0.0.0/16');
    const b = await createVpc(h, '10.1.0.0/16');
    const first = await createGateway(h);
    const second = await createGateway(h);

    await h.ok('AttachInternetGateway', { InternetGatewayId: first, VpcId: a });
    expect(await h.fail('AttachInternetGateway', { InternetGatewayId: first, VpcId: b })).toBe(
      'Resource.AlreadyAssociated',
    );
    expect(await h.fail('AttachInternetGateway', { InternetGatewayId: second, VpcId: a })).toBe(
      'Resource.AlreadyAssociated',
    );
  });

  test('attaching to a missing VPC is InvalidVpcID.NotFound', async () => {
    const igw = await createGateway(h);
    expect(await h.fail('AttachInternetGateway', { InternetGatewayId: igw, VpcId: 'vpc-0000000000000000f' })).toBe(
      'InvalidVpcID.NotFound',
    );
  });

  test('detaching from a VPC it is not attached to is Gateway.NotAttached', async () => {
    const vpcId = await createVpc(h);
    const igw = await createGateway(h);
    expect(await h.fail('DetachInternetGateway', { InternetGatewayId: igw, VpcId: vpcId })).toBe('Gateway.NotAttached');
  });

  test('an attached gateway cannot be deleted', async () => {
    const vpcId = await createVpc(h);
    const igw = await createGateway(h);
    await h.ok('AttachInternetGateway', { InternetGatewayId: igw, VpcId: vpcId });
    expect(await h.fail('DeleteInternetGateway', { InternetGatewayId: igw })).toBe('DependencyViolation');

    await h.ok('DetachInternetGateway', { InternetGatewayId: igw, VpcId: vpcId });
    expect(await h.ok('DeleteInternetGateway', { InternetGatewayId: igw })).toEqual({ return: true });
    expect(await h.fail('DescribeInternetGateways', { 'InternetGatewayId.1': igw })).toBe(
      'InvalidInternetGatewayID.NotFound',
    );
  });

  test('routes through a deleted gateway become blackholes', async () => {
    const vpcId = await createVpc(h);
    const igw = await createGateway(h);
    await h.ok('AttachInternetGateway', { InternetGatewayId: igw, VpcId: vpcId });
    const table = stringAt(mapAt(await h.ok('CreateRouteTable', { VpcId: vpcId }), 'routeTable'), 'routeTableId');
    await h.ok('CreateRoute', { RouteTableId: table, DestinationCidrBlock: '0.0.0.0/0', GatewayId: igw });

    await h.ok('DetachInternetGateway', { InternetGatewayId: igw, VpcId: vpcId });
    await h.ok('DeleteInternetGateway', { InternetGatewayId: igw });

    const described = await h.ok('DescribeRouteTables', { 'RouteTableId.1': table });
    expect(listAt(described, 'routeTableSet')[0].routeSet).toEqual([
      { destinationCidrBlock: '10.0.0.0/16', gatewayId: 'local', state: 'active', origin: 'CreateRouteTable' },
      { destinationCidrBlock: '0.0.0.0/0', state: 'blackhole', origin: 'CreateRoute', gatewayId: igw },
    ]);
  });
});
