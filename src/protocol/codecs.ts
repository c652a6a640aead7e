/**
 * Wire protocol codecs.
 *
 * One codec per protocol family, selected through the service table. A
 * codec turns a raw HTTP request into (action, parameters) and a handler's
 * generic result or error into the exact envelope that protocol's clients
 * expect. Naming, casing and envelope wrapping live here and nowhere else.
 */

import {
  httpStatusFor,
  malformedParameterError,
  ServiceError,
  ServiceException,
} from '../domain/errors';
import {
  isSequence,
  isValueMap,
  ParameterTree,
  toValueTree,
  ValueMap,
  ValueTree,
} from '../domain/value-tree';
import { decodeQueryParameters, parseFormPairs } from './query-decoder';
import { content, element, XML_DECLARATION, XmlStyle } from './xml';

export type ProtocolKind = 'ec2' | 'query' | 'json';

/** Static description of an emulated service. */
export interface ServiceDefinition {
  name: string;
  protocol: ProtocolKind;
  apiVersion: string;
  /** XML namespace for ec2/query responses. */
  xmlNamespace?: string;
  /** `X-Amz-Target` prefix for json services, e.g. `AWSCognitoIdentityService`. */
  targetPrefix?: string;
  /** Content type version for json services. */
  jsonVersion?: '1.0' | '1.1';
  /** Every action the service exposes. Each must have a registered handler. */
  actions: readonly string[];
}

export interface RawRequest {
  method: string;
  /** Lower-cased header names. */
  headers: Record<string, string | undefined>;
  /** URL query string without the leading `?`. */
  query: string;
  body: string;
}

export interface DecodedRequest {
  action?: string;
  params: ParameterTree;
}

export interface WireResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface ProtocolCodec {
  kind: ProtocolKind;
  decode(service: ServiceDefinition, request: RawRequest): DecodedRequest;
  encodeResult(service: ServiceDefinition, action: string, body: ValueMap, requestId: string): WireResponse;
  encodeError(service: ServiceDefinition, error: ServiceError, requestId: string): WireResponse;
}

export function pascalCase(key: string): string {
  return key.length === 0 ? key : key[0].toUpperCase() + key.slice(1);
}

function identity(key: string): string {
  return key;
}

const XML_CONTENT_TYPE = 'text/xml';

function takeAction(params: ParameterTree): string | undefined {
  const action = params.Action;
  delete params.Action;
  delete params.Version;
  if (action === undefined) return undefined;
  if (typeof action !== 'string') {
    throw new ServiceException(malformedParameterError('Parameter "Action" must be a single value', 'MalformedQueryString'));
  }
  return action;
}

function namespaceAttr(service: ServiceDefinition): string {
  return service.xmlNamespace ? ` xmlns="${service.xmlNamespace}"` : '';
}

// ─── EC2 ────────────────────────────────────────────────────────────────────

const EC2_STYLE: XmlStyle = { listItemName: 'item', elementName: identity };

export const ec2Codec: ProtocolCodec = {
  kind: 'ec2',

  decode(_service, request) {
    const params = decodeQueryParameters(parseFormPairs(request.query, request.body), {
      allowSparseLists: false,
    });
    return { action: takeAction(params), params };
  },

  encodeResult(service, action, body, requestId) {
    const name = `${action}Response`;
    const inner = element('requestId', requestId, EC2_STYLE) + content(body, EC2_STYLE);
    return {
      status: 200,
      headers: { 'Content-Type': XML_CONTENT_TYPE },
      body: `${XML_DECLARATION}<${name}${namespaceAttr(service)}>${inner}</${name}>`,
    };
  },

  encodeError(_service, error, requestId) {
    const document = element(
      'Response',
      {
        Errors: { Error: { Code: error.code, Message: error.message } },
        RequestID: requestId,
      },
      EC2_STYLE,
    );
    return {
      status: httpStatusFor(error),
      headers: { 'Content-Type': XML_CONTENT_TYPE },
      body: `${XML_DECLARATION}${document}`,
    };
  },
};

// ─── Query (awsQuery) ───────────────────────────────────────────────────────

const QUERY_STYLE: XmlStyle = { listItemName: 'member', elementName: pascalCase };

export const queryCodec: ProtocolCodec = {
  kind: 'query',

  decode(_service, request) {
    const params = decodeQueryParameters(parseFormPairs(request.query, request.body), {
      allowSparseLists: false,
      transparentSegments: ['member'],
    });
    return { action: takeAction(params), params };
  },

  encodeResult(service, action, body, requestId) {
    const name = `${action}Response`;
    const result = element(`${action}Result`, body, QUERY_STYLE);
    const metadata = element('ResponseMetadata', { RequestId: requestId }, QUERY_STYLE);
    return {
      status: 200,
      headers: { 'Content-Type': XML_CONTENT_TYPE },
      body: `<${name}${namespaceAttr(service)}>${result}${metadata}</${name}>`,
    };
  },

  encodeError(service, error, requestId) {
    const type = httpStatusFor(error) >= 500 ? 'Receiver' : 'Sender';
    const inner =
      element('Error', { Type: type, Code: error.code, Message: error.message }, QUERY_STYLE) +
      element('RequestId', requestId, QUERY_STYLE);
    return {
      status: httpStatusFor(error),
      headers: { 'Content-Type': XML_CONTENT_TYPE },
      body: `<ErrorResponse${namespaceAttr(service)}>${inner}</ErrorResponse>`,
    };
  },
};

// ─── JSON (awsJson1_0 / awsJson1_1) ─────────────────────────────────────────

function toPascalTree(value: ValueTree): ValueTree {
  if (isSequence(value)) return value.map(toPascalTree);
  if (isValueMap(value)) {
    const out: ValueMap = {};
    for (const [key, child] of Object.entries(value)) {
      if (child !== null) out[pascalCase(key)] = toPascalTree(child);
    }
    return out;
  }
  return value;
}

function jsonContentType(service: ServiceDefinition): string {
  return `application/x-amz-json-${service.jsonVersion ?? '1.1'}`;
}

export const jsonCodec: ProtocolCodec = {
  kind: 'json',

  decode(service, request) {
    const target = request.headers['x-amz-target'];
    const prefix = `${service.targetPrefix ?? ''}.`;
    const action = target && target.startsWith(prefix) ? target.slice(prefix.length) : undefined;

    if (request.body.trim() === '') return { action, params: {} };

    let parsed: unknown;
    try {
      parsed = JSON.parse(request.body);
    } catch {
      throw new ServiceException(malformedParameterError('Request body is not valid JSON', 'SerializationException'));
    }
    const tree = toValueTree(parsed);
    if (!isValueMap(tree)) {
      throw new ServiceException(malformedParameterError('Request body must be a JSON object', 'SerializationException'));
    }
    return { action, params: tree };
  },

  encodeResult(service, _action, body, requestId) {
    return {
      status: 200,
      headers: { 'Content-Type': jsonContentType(service), 'x-amzn-RequestId': requestId },
      body: JSON.stringify(toPascalTree(body)),
    };
  },

  encodeError(service, error, requestId) {
    return {
      status: httpStatusFor(error),
      headers: {
        'Content-Type': jsonContentType(service),
        'x-amzn-RequestId': requestId,
        'x-amzn-ErrorType': error.code,
      },
      body: JSON.stringify({ __type: error.code, message: error.message }),
    };
  },
};

export const PROTOCOL_CODECS: Record<ProtocolKind, ProtocolCodec> = {
  ec2: ec2Codec,
  query: queryCodec,
  json: jsonCodec,
};
