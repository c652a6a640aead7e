import express from 'express';
import { createErrorHandler } from '../src/api/middleware';
import { DEFAULT_CONFIG } from '../src/config';
import { Gateway } from '../src/gateway/gateway';
import { XML_DECLARATION } from '../src/protocol/xml';
import { createApp, createAppContext, DEFAULT_VPC_CIDR, seedDefaultNetwork } from '../src/server';
import { EC2_SERVICE_DEFINITION } from '../src/services';

interface HttpResult {
  status: number;
  contentType: string;
  text: string;
}

// Serve the app on an ephemeral port for a single request.
async function request(
  app: express.Application,
  method: string,
  path: string,
  body?: string,
  headers: Record<string, string> = {},
): Promise<HttpResult> {
  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  try {
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    const res = await fetch(`http://127.0.0.1:${port}${path}`, { method, headers, body });
    return { status: res.status, contentType: res.headers.get('content-type') ?? '', text: await res.text() };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

const FORM = { 'Content-Type': 'application/x-www-form-urlencoded; charset=utf-8' };

const TEST_CONFIG = { ...DEFAULT_CONFIG, accountId: '123456789012' };

describe('HTTP server', () => {
  test('health check reports the region and services', async () => {
    const app = createApp(createAppContext(TEST_CONFIG));
    const res = await request(app, 'GET', '/health');
    expect(res.status).toBe(200);
    const body: unknown = JSON.parse(res.text);
    expect(body).toMatchObject({ status: 'ok', storage: 'memory', region: 'us-east-1', services: ['ec2', 'sts'] });
  });

  test('form-encoded EC2 requests get XML responses', async () => {
    const ctx = createAppContext(TEST_CONFIG);
    const vpc = await seedDefaultNetwork(ctx);
    const res = await request(createApp(ctx), 'POST', '/', 'Action=DescribeVpcs&Version=2016-11-15', FORM);

    expect(res.status).toBe(200);
    expect(res.contentType).toContain('xml');
    expect(res.text.startsWith(`${XML_DECLARATION}<DescribeVpcsResponse xmlns="${EC2_SERVICE_DEFINITION.xmlNamespace}">`)).toBe(true);
    expect(res.text).toContain(`<vpcId>${vpc.id}</vpcId>`);
    expect(res.text).toContain(`<cidrBlock>${DEFAULT_VPC_CIDR}</cidrBlock>`);
  });

  test('query-string requests are accepted on GET', async () => {
    const app = createApp(createAppContext(TEST_CONFIG));
    const res = await request(app, 'GET', '/?Action=DescribeRegions&Version=2016-11-15&RegionName.1=eu-west-1');
    expect(res.status).toBe(200);
    expect(res.text).toContain('<regionName>eu-west-1</regionName>');
    expect(res.text).not.toContain('<regionName>us-east-1</regionName>');
  });

  test('provider errors keep the service envelope', async () => {
    const app = createApp(createAppContext(TEST_CONFIG));
    const res = await request(app, 'POST', '/', 'Action=LaunchRockets&Version=2016-11-15', FORM);
    expect(res.status).toBe(400);
    expect(res.text).toContain('<Code>InvalidAction</Code>');
  });

  test('a SigV4 credential scope selects the service', async () => {
    const app = createApp(createAppContext(TEST_CONFIG));
    const res = await request(app, 'POST', '/', 'Action=GetCallerIdentity&Version=2011-06-15', {
      ...FORM,
      Authorization:
        'AWS4-HMAC-SHA256 Credential=test-access-key/20240101/us-east-1/sts/aws4_request, SignedHeaders=host, Signature=test-signature',
    });
    expect(res.status).toBe(200);
    expect(res.text).toContain('<Arn>arn:aws:iam::123456789012:root</Arn>');
  });
});

describe('createErrorHandler', () => {
  function failingApp(error: unknown): express.Application {
    const ctx = createAppContext(TEST_CONFIG);
    const gateway = new Gateway({
      router: ctx.router,
      store: ctx.store,
      region: TEST_CONFIG.region,
      accountId: TEST_CONFIG.accountId,
      defaultService: 'ec2',
      requestId: () => 'req-http',
    });
    const app = express();
    app.get('/', () => {
      throw error;
    });
    app.use(createErrorHandler(gateway));
    return app;
  }

  function ec2Error(code: string, message: string): string {
    return (
      XML_DECLARATION +
      `<Response><Errors><Error><Code>${code}</Code><Message>${message}</Message></Error></Errors>` +
      '<RequestID>req-http</RequestID></Response>'
    );
  }

  test('transport failures keep their status and use the EC2 error envelope', async () => {
    const tooLarge = Object.assign(new Error('request entity too large'), { status: 413 });
    const res = await request(failingApp(tooLarge), 'GET', '/');
    expect(res.status).toBe(413);
    expect(res.contentType).toContain('text/xml');
    expect(res.text).toBe(ec2Error('RequestEntityTooLarge', 'request entity too large'));

    const malformed = Object.assign(new Error('bad encoding'), { status: 415 });
    const second = await request(failingApp(malformed), 'GET', '/');
    expect(second.status).toBe(415);
    expect(second.text).toBe(ec2Error('MalformedRequest', 'bad encoding'));
  });

  test('an unreadable body on the app is MalformedRequest in XML', async () => {
    const app = createApp(createAppContext(TEST_CONFIG));
    const res = await request(app, 'POST', '/', 'Action=DescribeVpcs', {
      'Content-Type': 'application/x-www-form-urlencoded; charset=bogus',
    });
    expect(res.status).toBe(415);
    expect(res.text.startsWith(`${XML_DECLARATION}<Response><Errors><Error><Code>MalformedRequest</Code>`)).toBe(true);
  });

  test('unexpected errors are 500 InternalError', async () => {
    const res = await request(failingApp(new Error('boom')), 'GET', '/');
    expect(res.status).toBe(500);
    expect(res.text).toBe(ec2Error('InternalError', 'boom'));
  });
});

describe('seedDefaultNetwork', () => {
  test('creates a default VPC with one default subnet per zone', async () => {
    const ctx = createAppContext(TEST_CONFIG);
    const vpc = await seedDefaultNetwork(ctx);
    expect(vpc.attributes.isDefault).toBe(true);
    expect(vpc.attributes.cidrBlock).toBe(DEFAULT_VPC_CIDR);

    const subnets = await ctx.store.list('subnet');
    expect(subnets.map((s) => [s.attributes.cidrBlock, s.attributes.availabilityZone, s.attributes.defaultForAz])).toEqual([
      ['172.31.0.0/20', 'us-east-1a', true],
      ['172.31.16.0/20', 'us-east-1b', true],
      ['172.31.32.0/20', 'us-east-1c', true],
    ]);
    expect((await ctx.store.list('security-group')).map((g) => g.attributes.groupName)).toEqual(['default']);
  });

  test('is idempotent', async () => {
    const ctx = createAppContext(TEST_CONFIG);
    const first = await seedDefaultNetwork(ctx);
    const second = await seedDefaultNetwork(ctx);
    expect(second.id).toBe(first.id);
    expect(await ctx.store.list('vpc')).toHaveLength(1);
    expect(await ctx.store.list('subnet')).toHaveLength(3);
  });

  test('legacy id types allocate short ids', async () => {
    const ctx = createAppContext({ ...TEST_CONFIG, legacyIdTypes: ['vpc'] });
    const vpc = await seedDefaultNetwork(ctx);
    expect(vpc.id).toMatch(/^vpc-[0-9a-f]{8}$/);
    expect((await ctx.store.list('subnet'))[0].id).toMatch(/^subnet-[0-9a-f]{17}$/);
  });
});
