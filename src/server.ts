/**
 * Express server configuration.
 *
 * Assembles the store, the routing table and the gateway, and mounts the
 * provider protocol behind the HTTP middleware.
 */

import express from 'express';
import { DEFAULT_CONFIG, EmulatorConfig } from './config';
import type { Resource } from './domain/resource';
import { Gateway } from './gateway/gateway';
import { ActionRouter } from './gateway/router';
import { builtinHandlers } from './handlers';
import { availabilityZones } from './handlers/regions';
import { createSubnet } from './handlers/subnet';
import { createVpcWithDefaults, findDefaultVpc } from './handlers/vpc';
import { createErrorHandler, requestLogger } from './api/middleware';
import { createProtocolRoutes } from './api/protocol';
import { BUILTIN_SERVICES } from './services';
import { createMemoryStore } from './storage/memory-store';
import type { ResourceStore } from './storage/store';
import { logger } from './logger';

const startTime = Date.now();

export const DEFAULT_VPC_CIDR = '172.31.0.0/16';

/** Application context containing all services. */
export interface AppContext {
  config: EmulatorConfig;
  store: ResourceStore;
  router: ActionRouter;
  gateway: Gateway;
}

/** Create the application context. Throws RegistrationError on a broken routing table. */
export function createAppContext(config: EmulatorConfig = DEFAULT_CONFIG, store?: ResourceStore): AppContext {
  const appStore = store ?? createMemoryStore({ legacyTypes: config.legacyIdTypes });
  const router = ActionRouter.build(BUILTIN_SERVICES, builtinHandlers());
  const gateway = new Gateway({
    router,
    store: appStore,
    region: config.region,
    accountId: config.accountId,
    defaultService: config.defaultService,
  });

  return { config, store: appStore, router, gateway };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(requestLogger);

  // Every content type is read as text; the gateway's codecs decode it.
  app.use(express.text({ type: () => true, limit: '10mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      region: ctx.config.region,
      services: BUILTIN_SERVICES.map((service) => service.name),
    });
  });

  app.use('/', createProtocolRoutes(ctx.gateway));

  // Error handler
  app.use(createErrorHandler(ctx.gateway));

  return app;
}

/**
 * Seed the default VPC: 172.31.0.0/16 with one /20 default subnet per
 * availability zone, plus the security group and main route table every
 * VPC gets. Does nothing when a default VPC already exists.
 */
export async function seedDefaultNetwork(ctx: AppContext): Promise<Resource> {
  const existing = await findDefaultVpc(ctx.store);
  if (existing) return existing;

  const vpc = await createVpcWithDefaults(ctx.store, ctx.config.accountId, {
    cidrBlock: DEFAULT_VPC_CIDR,
    isDefault: true,
  });

  const zones = availabilityZones(ctx.config.region);
  for (const [index, zone] of zones.entries()) {
    await createSubnet(
      ctx.store,
      { region: ctx.config.region, accountId: ctx.config.accountId },
      {
        vpcId: vpc.id,
        cidrBlock: `172.31.${index * 16}.0/20`,
        availabilityZone: zone.zoneName,
        defaultForAz: true,
        mapPublicIpOnLaunch: true,
      },
    );
  }

  logger.info('Default network seeded', { vpcId: vpc.id, subnets: zones.length });
  return vpc;
}
