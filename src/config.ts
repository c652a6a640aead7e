/**
 * Runtime configuration.
 *
 * Read once from environment variables at startup. Invalid values fail fast
 * so a misconfigured emulator never starts serving requests.
 */

import { LogLevel, parseLogLevel } from './logger';
import { isResourceTypeTag, ResourceTypeTag } from './domain/resource-types';

export interface EmulatorConfig {
  port: number;
  host: string;
  region: string;
  accountId: string;
  logLevel: LogLevel;
  /** Resource types that allocate the short 8-hex legacy ID form. */
  legacyIdTypes: ResourceTypeTag[];
  /** Create the default VPC, subnets and security group at startup. */
  seedDefaultVpc: boolean;
  /** Service used when a request carries neither a target header nor a credential scope. */
  defaultService: string;
}

export const DEFAULT_CONFIG: EmulatorConfig = {
  port: 4566,
  host: '0.0.0.0',
  region: 'us-east-1',
  accountId: '000000000000',
  logLevel: LogLevel.Info,
  legacyIdTypes: [],
  seedDefaultVpc: true,
  defaultService: 'ec2',
};

/** Raised for an invalid environment variable. */
export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError('PORT', `expected an integer between 0 and 65535, got "${raw}"`);
  }
  return port;
}

function parseBoolean(variable: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '0':
    case 'false':
    case 'no':
      return false;
    default:
      throw new ConfigError(variable, `expected true or false, got "${raw}"`);
  }
}

function parseLegacyIdTypes(raw: string): ResourceTypeTag[] {
  const types: ResourceTypeTag[] = [];
  for (const entry of raw.split(',').map((s) => s.trim()).filter(Boolean)) {
    if (!isResourceTypeTag(entry)) {
      throw new ConfigError('LEGACY_ID_TYPES', `unknown resource type "${entry}"`);
    }
    types.push(entry);
  }
  return types;
}

function parseAccountId(raw: string): string {
  if (!/^\d{12}$/.test(raw)) {
    throw new ConfigError('EMULATOR_ACCOUNT_ID', 'expected a 12-digit account id');
  }
  return raw;
}

/** Build the configuration from an environment map (defaults to process.env). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EmulatorConfig {
  const logLevelRaw = env.LOG_LEVEL;
  let logLevel = DEFAULT_CONFIG.logLevel;
  if (logLevelRaw) {
    const parsed = parseLogLevel(logLevelRaw);
    if (!parsed) {
      throw new ConfigError('LOG_LEVEL', `expected one of ${Object.values(LogLevel).join(', ')}`);
    }
    logLevel = parsed;
  }

  return {
    port: env.PORT ? parsePort(env.PORT) : DEFAULT_CONFIG.port,
    host: env.HOST || DEFAULT_CONFIG.host,
    region: env.AWS_DEFAULT_REGION || env.AWS_REGION || DEFAULT_CONFIG.region,
    accountId: env.EMULATOR_ACCOUNT_ID ? parseAccountId(env.EMULATOR_ACCOUNT_ID) : DEFAULT_CONFIG.accountId,
    logLevel,
    legacyIdTypes: env.LEGACY_ID_TYPES ? parseLegacyIdTypes(env.LEGACY_ID_TYPES) : [],
    seedDefaultVpc: env.SEED_DEFAULT_VPC
      ? parseBoolean('SEED_DEFAULT_VPC', env.SEED_DEFAULT_VPC)
      : DEFAULT_CONFIG.seedDefaultVpc,
    defaultService: DEFAULT_CONFIG.defaultService,
  };
}
