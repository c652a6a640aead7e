/**
 * Provider protocol routes.
 *
 * GET / — query-string requests
 * POST / — form-encoded (ec2, query) and JSON requests
 *
 * Both hand the raw request to the gateway, which picks the service and
 * writes the response in that service's wire format.
 */

import { NextFunction, Request, Response, Router } from 'express';
import type { Gateway } from '../gateway/gateway';
import type { RawRequest } from '../protocol/codecs';

/** Flatten an Express request into the gateway's transport-neutral form. */
export function toRawRequest(req: Request): RawRequest {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  const url = req.originalUrl;
  const queryStart = url.indexOf('?');
  return {
    method: req.method,
    headers,
    query: queryStart === -1 ? '' : url.slice(queryStart + 1),
    // Without a body the text parser leaves its `{}` placeholder.
    body: typeof req.body === 'string' ? req.body : '',
  };
}

export function createProtocolRoutes(gateway: Gateway): Router {
  const router = Router();

  const handle = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const response = await gateway.handle(toRawRequest(req));
      res.status(response.status).set(response.headers).send(response.body);
    } catch (err) {
      next(err);
    }
  };

  router.get('/', handle);
  router.post('/', handle);

  return router;
}
