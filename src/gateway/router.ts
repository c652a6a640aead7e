/**
 * Action routing table.
 *
 * Built once at startup from the service definitions and the handler
 * registrations, then passed by reference into the gateway. Registration
 * mistakes (unknown service, duplicate action, an action the service does
 * not declare, a declared action with no handler) throw at build time.
 */

import type { ServiceDefinition } from '../protocol/codecs';
import type { ActionHandler, ResourceHandler } from './types';

export class RegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistrationError';
  }
}

export interface RouteEntry {
  handler: ResourceHandler;
  invoke: ActionHandler;
}

function routeKey(service: string, action: string): string {
  return `${service}:${action}`;
}

export class ActionRouter {
  private constructor(
    private readonly services: ReadonlyMap<string, ServiceDefinition>,
    private readonly routes: ReadonlyMap<string, RouteEntry>,
  ) {}

  static build(services: readonly ServiceDefinition[], handlers: readonly ResourceHandler[]): ActionRouter {
    const serviceMap = new Map<string, ServiceDefinition>();
    for (const service of services) {
      if (serviceMap.has(service.name)) {
        throw new RegistrationError(`Service "${service.name}" is defined more than once`);
      }
      serviceMap.set(service.name, service);
    }

    const routes = new Map<string, RouteEntry>();
    for (const handler of handlers) {
      const service = serviceMap.get(handler.service);
      if (!service) {
        throw new RegistrationError(`Handler "${handler.name}" targets unknown service "${handler.service}"`);
      }
      for (const [action, invoke] of Object.entries(handler.actions)) {
        if (!service.actions.includes(action)) {
          throw new RegistrationError(
            `Handler "${handler.name}" registers ${action}, which service "${service.name}" does not declare`,
          );
        }
        const key = routeKey(service.name, action);
        const existing = routes.get(key);
        if (existing) {
          throw new RegistrationError(
            `${service.name}:${action} is registered by both "${existing.handler.name}" and "${handler.name}"`,
          );
        }
        routes.set(key, { handler, invoke });
      }
    }

    for (const service of serviceMap.values()) {
      const missing = service.actions.filter((action) => !routes.has(routeKey(service.name, action)));
      if (missing.length > 0) {
        throw new RegistrationError(`Service "${service.name}" has no handler for: ${missing.join(', ')}`);
      }
    }

    return new ActionRouter(serviceMap, routes);
  }

  service(name: string): ServiceDefinition | undefined {
    return this.services.get(name);
  }

  serviceByTargetPrefix(prefix: string): ServiceDefinition | undefined {
    return [...this.services.values()].find((service) => service.targetPrefix === prefix);
  }

  resolve(service: string, action: string): RouteEntry | undefined {
    return this.routes.get(routeKey(service, action));
  }

  /** Number of registered (service, action) routes. */
  get size(): number {
    return this.routes.size;
  }
}
