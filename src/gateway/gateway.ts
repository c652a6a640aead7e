/**
 * Request gateway: decode → route → invoke → encode.
 *
 * The gateway knows protocols and the routing table, never resource
 * semantics. Every failure, whether thrown by the decoder, the router, a
 * handler or the store, is recovered here and rendered in the resolved
 * service's error envelope.
 */

import { v4 as uuid } from 'uuid';
import {
  ErrorCategory,
  internalError,
  isServiceException,
  missingParameterError,
  ServiceError,
  ServiceException,
  unsupportedActionError,
} from '../domain/errors';
import { errorFields, forRequest, Logger, logger as rootLogger } from '../logger';
import {
  PROTOCOL_CODECS,
  RawRequest,
  ServiceDefinition,
  WireResponse,
} from '../protocol/codecs';
import type { ResourceStore } from '../storage/store';
import { ActionRouter, RegistrationError } from './router';
import type { ActionOutcome, HandlerContext } from './types';

export interface GatewayOptions {
  router: ActionRouter;
  store: ResourceStore;
  region: string;
  accountId: string;
  /** Service assumed when the request names none. */
  defaultService: string;
  logger?: Logger;
  requestId?: () => string;
}

export interface DispatchResult {
  service: ServiceDefinition;
  action?: string;
  requestId: string;
  outcome: ActionOutcome;
}

const CREDENTIAL_SCOPE = /Credential=[^/,\s]+\/\d{8}\/[^/]+\/([^/]+)\/aws4_request/;

/**
 * Name the service a request addresses: the `X-Amz-Target` prefix, else the
 * SigV4 credential scope, else undefined.
 */
export function requestedServiceName(
  headers: Record<string, string | undefined>,
  router: ActionRouter,
): string | undefined {
  const target = headers['x-amz-target'];
  if (target) {
    const dot = target.lastIndexOf('.');
    const prefix = dot === -1 ? target : target.slice(0, dot);
    return router.serviceByTargetPrefix(prefix)?.name ?? prefix;
  }
  const authorization = headers.authorization;
  const match = authorization ? CREDENTIAL_SCOPE.exec(authorization) : null;
  return match ? match[1] : undefined;
}

function toServiceError(err: unknown): ServiceError {
  if (isServiceException(err)) return err.serviceError;
  return internalError(err instanceof Error ? err.message : 'Unknown error');
}

export class Gateway {
  private readonly fallback: ServiceDefinition;
  private readonly log: Logger;
  private readonly nextRequestId: () => string;

  constructor(private readonly options: GatewayOptions) {
    const fallback = options.router.service(options.defaultService);
    if (!fallback) {
      throw new RegistrationError(`Default service "${options.defaultService}" is not registered`);
    }
    this.fallback = fallback;
    this.log = options.logger ?? rootLogger.child({ module: 'gateway' });
    this.nextRequestId = options.requestId ?? (() => uuid());
  }

  async handle(request: RawRequest): Promise<WireResponse> {
    const { service, action, requestId, outcome } = await this.dispatch(request);
    const codec = PROTOCOL_CODECS[service.protocol];
    if (outcome.shape === 'result') {
      return codec.encodeResult(service, action ?? '', outcome.body, requestId);
    }
    return codec.encodeError(service, outcome.error, requestId);
  }

  /** Render an error raised outside dispatch in the default service's envelope, under a fresh request id. */
  renderError(error: ServiceError): WireResponse {
    return PROTOCOL_CODECS[this.fallback.protocol].encodeError(this.fallback, error, this.nextRequestId());
  }

  async dispatch(request: RawRequest): Promise<DispatchResult> {
    const requestId = this.nextRequestId();
    let service = this.fallback;
    let action: string | undefined;
    let log = forRequest(this.log, { requestId });

    try {
      const name = requestedServiceName(request.headers, this.options.router) ?? this.options.defaultService;
      const resolved = this.options.router.service(name);
      if (!resolved) {
        throw new ServiceException(unsupportedActionError(name, request.headers['x-amz-target'] ?? 'unknown'));
      }
      service = resolved;

      const decoded = PROTOCOL_CODECS[service.protocol].decode(service, request);
      action = decoded.action;
      if (!action) {
        throw new ServiceException(missingParameterError('Action'));
      }
      log = forRequest(this.log, { requestId, service: service.name, action });

      const route = this.options.router.resolve(service.name, action);
      if (!route) {
        throw new ServiceException(unsupportedActionError(service.name, action));
      }

      const ctx: HandlerContext = {
        store: this.options.store,
        requestId,
        region: this.options.region,
        accountId: this.options.accountId,
        logger: log,
      };
      const body = await route.invoke(decoded.params, ctx);
      log.debug('Request completed', { handler: route.handler.name });
      return { service, action, requestId, outcome: { shape: 'result', body } };
    } catch (err) {
      const error = toServiceError(err);
      if (error.category === ErrorCategory.Internal) {
        log.error('Request failed', { code: error.code, ...errorFields(err) });
      } else {
        log.info('Request rejected', { code: error.code, category: error.category });
      }
      return { service, action, requestId, outcome: { shape: 'error', error } };
    }
  }
}
