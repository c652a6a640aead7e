import { Gateway, requestedServiceName } from '../../src/gateway/gateway';
import { ActionRouter, RegistrationError } from '../../src/gateway/router';
import type { HandlerContext, ResourceHandler } from '../../src/gateway/types';
import type { ServiceDefinition } from '../../src/protocol/codecs';
import { EC2_SERVICE_DEFINITION, STS_SERVICE_DEFINITION } from '../../src/services';
import { createMemoryStore } from '../../src/storage/memory-store';
import { setLogHandler, LogEntry } from '../../src/logger';

const widgets: ServiceDefinition = {
  name: 'widgets',
  protocol: 'json',
  apiVersion: '2020-01-01',
  targetPrefix: 'WidgetService',
  jsonVersion: '1.1',
  actions: ['ListWidgets'],
};

const ec2Lite: ServiceDefinition = { ...EC2_SERVICE_DEFINITION, actions: ['DescribeVpcs', 'Explode'] };
const stsLite: ServiceDefinition = STS_SERVICE_DEFINITION;

const seen: HandlerContext[] = [];

const handlers: ResourceHandler[] = [
  {
    name: 'vpc',
    service: 'ec2',
    actions: {
      async DescribeVpcs(params, ctx) {
        seen.push(ctx);
        return { vpcSet: [], echo: params.VpcId ?? null };
      },
      async Explode() {
        throw new Error('kaboom');
      },
    },
  },
  {
    name: 'sts',
    service: 'sts',
    actions: {
      async GetCallerIdentity(_params, ctx) {
        return { account: ctx.accountId };
      },
    },
  },
  {
    name: 'widgets',
    service: 'widgets',
    actions: {
      async ListWidgets(params) {
        return { widgets: [], limit: params.MaxResults ?? null };
      },
    },
  },
];

function createGateway(): Gateway {
  const router = ActionRouter.build([ec2Lite, stsLite, widgets], handlers);
  return new Gateway({
    router,
    store: createMemoryStore(),
    region: 'eu-west-1',
    accountId: '123456789012',
    defaultService: 'ec2',
    requestId: () => 'req-1',
  });
}

const SIGV4_STS =
  'AWS4-HMAC-SHA256 Credential=AKIDEXAMPLE/20240101/us-east-1/sts/aws4_request, SignedHeaders=host, Signature=abc';

describe('service resolution', () => {
  const router = ActionRouter.build([ec2Lite, stsLite, widgets], handlers);

  test('target header wins over the credential scope', () => {
    expect(
      requestedServiceName({ 'x-amz-target': 'WidgetService.ListWidgets', authorization: SIGV4_STS }, router),
    ).toBe('widgets');
  });

  test('credential scope names the service', () => {
    expect(requestedServiceName({ authorization: SIGV4_STS }, router)).toBe('sts');
  });

  test('nothing identifies no service', () => {
    expect(requestedServiceName({}, router)).toBeUndefined();
  });
});

describe('Gateway', () => {
  beforeEach(() => {
    seen.length = 0;
  });

  test('routes ec2 requests by default and passes the request context', async () => {
    const gateway = createGateway();
    const result = await gateway.dispatch({
      method: 'POST',
      headers: {},
      query: '',
      body: 'Action=DescribeVpcs&Version=2016-11-15&VpcId.1=vpc-1',
    });
    expect(result.outcome).toEqual({ shape: 'result', body: { vpcSet: [], echo: ['vpc-1'] } });
    expect(result.action).toBe('DescribeVpcs');
    expect(seen[0].requestId).toBe('req-1');
    expect(seen[0].region).toBe('eu-west-1');
  });

  test('renders ec2 results as XML', async () => {
    const response = await createGateway().handle({ method: 'GET', headers: {}, query: 'Action=DescribeVpcs', body: '' });
    expect(response.status).toBe(200);
    expect(response.body).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>' +
        '<DescribeVpcsResponse xmlns="http://ec2.amazonaws.com/doc/2016-11-15/">' +
        '<requestId>req-1</requestId><vpcSet/></DescribeVpcsResponse>',
    );
  });

  test('dispatches query-protocol services by credential scope', async () => {
    const response = await createGateway().handle({
      method: 'POST',
      headers: { authorization: SIGV4_STS },
      query: '',
      body: 'Action=GetCallerIdentity&Version=2011-06-15',
    });
    expect(response.body).toContain('<GetCallerIdentityResult><Account>123456789012</Account></GetCallerIdentityResult>');
  });

  test('dispatches json services by target header', async () => {
    const response = await createGateway().handle({
      method: 'POST',
      headers: { 'x-amz-target': 'WidgetService.ListWidgets' },
      query: '',
      body: '{"MaxResults":3}',
    });
    expect(response.headers['Content-Type']).toBe('application/x-amz-json-1.1');
    expect(JSON.parse(response.body)).toEqual({ Widgets: [], Limit: 3 });
  });

  test('an unsupported action is InvalidAction in the service envelope', async () => {
    const response = await createGateway().handle({ method: 'POST', headers: {}, query: '', body: 'Action=LaunchRocket' });
    expect(response.status).toBe(400);
    expect(response.body).toContain('<Code>InvalidAction</Code>');
  });

  test('a missing action is MissingParameter', async () => {
    const result = await createGateway().dispatch({ method: 'POST', headers: {}, query: '', body: 'VpcId.1=vpc-1' });
    expect(result.outcome.shape === 'error' && result.outcome.error.code).toBe('MissingParameter');
  });

  test('an unknown service falls back to the default envelope', async () => {
    const result = await createGateway().dispatch({
      method: 'POST',
      headers: { 'x-amz-target': 'Nope.DoThing' },
      query: '',
      body: '',
    });
    expect(result.service.name).toBe('ec2');
    expect(result.outcome.shape === 'error' && result.outcome.error.code).toBe('InvalidAction');
  });

  test('malformed input is rendered, not thrown', async () => {
    const result = await createGateway().dispatch({
      method: 'POST',
      headers: {},
      query: '',
      body: 'Action=DescribeVpcs&VpcId.2=vpc-1',
    });
    expect(result.outcome.shape === 'error' && result.outcome.error.code).toBe('MalformedQueryString');
  });

  test('unexpected handler failures become InternalError and are logged', async () => {
    const entries: LogEntry[] = [];
    setLogHandler((entry) => entries.push(entry));
    try {
      const response = await createGateway().handle({ method: 'POST', headers: {}, query: '', body: 'Action=Explode' });
      expect(response.status).toBe(500);
      expect(response.body).toContain('<Code>InternalError</Code><Message>kaboom</Message>');
      const failure = entries.find((entry) => entry.message === 'Request failed');
      expect(failure?.context).toMatchObject({
        requestId: 'req-1',
        action: 'Explode',
        code: 'InternalError',
        errorName: 'Error',
        message: 'kaboom',
      });
    } finally {
      setLogHandler(() => undefined);
    }
  });

  test('an unregistered default service is a registration error', () => {
    const router = ActionRouter.build([stsLite], [handlers[1]]);
    expect(
      () => new Gateway({ router, store: createMemoryStore(), region: 'r', accountId: 'a', defaultService: 'ec2' }),
    ).toThrow(RegistrationError);
  });
});
