/**
 * Collector Configuration
 *
 * JSON file on disk, validated with zod, with sink credentials overridable
 * from the environment (after dotenv has loaded `.env`). Durations are
 * written in seconds and handed to the rest of the collector in ms.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { TransportSelection } from '../ble-bridge/PlatformConfig';
import { MANAGEMENT_DEFAULTS, DiscoveryOptions, PollOptions } from '../ble-management/types';
import { isValidAddress, normalizeAddress } from '../registry-management/DeviceIdentifier';

export const DEFAULT_CONFIG_FILE = 'collector.json';

/** Environment variable → config key */
const ENV_OVERRIDES = {
  INFLUX_TOKEN: 'token',
  INFLUX_HOST: 'host',
  INFLUX_ORG: 'org',
  INFLUX_BUCKET: 'bucket',
} as const;

const { discovery, polling } = MANAGEMENT_DEFAULTS;

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

const positiveSeconds = z.number().finite().positive();

export const ConfigFileSchema = z
  .object({
    bucket: z.string().min(1),
    measurement: z.string().min(1),
    host: z.string().url(),
    org: z.string().min(1),
    token: z.string().min(1),
    tags: z
      .record(z.string().min(1), z.string())
      .refine(tags => Object.keys(tags).length > 0, { message: 'At least one device is required' }),
    interval: positiveSeconds,

    readTimeout: positiveSeconds.default(polling.readTimeoutMs / 1000),
    maxConcurrentReads: z.number().int().positive().default(polling.maxConcurrentReads),
    maxConsecutiveReadFailures: z.number().int().nonnegative().default(polling.maxConsecutiveReadFailures),

    retryDelay: positiveSeconds.default(discovery.retryDelayMs / 1000),
    retryBackoffMultiplier: z.number().finite().min(1).default(discovery.retryBackoffMultiplier),
    maxRetryDelay: positiveSeconds.default(discovery.maxRetryDelayMs / 1000),
    startupTimeout: z.number().finite().nonnegative().default(discovery.startupTimeoutMs / 1000),
    reconcileInterval: positiveSeconds.default(discovery.reconcileIntervalMs / 1000),
    scanWindow: positiveSeconds.default(discovery.scanWindowMs / 1000),
    namePattern: z.string().default(discovery.namePattern),

    transport: z.enum(['auto', 'noble', 'node-ble', 'mock']).default('auto'),
    statusEvery: z.number().int().nonnegative().default(6),
  })
  .superRefine((config, ctx) => {
    const owners = new Map<string, string>();
    for (const [name, address] of Object.entries(config.tags)) {
      if (!isValidAddress(address)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tags', name],
          message: `Invalid hardware address "${address}"`,
        });
        continue;
      }

      const normalized = normalizeAddress(address);
      const owner = owners.get(normalized);
      if (owner !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tags', name],
          message: `Address ${normalized} is already assigned to ${owner}`,
        });
      } else {
        owners.set(normalized, name);
      }
    }

    if (config.maxRetryDelay < config.retryDelay) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxRetryDelay'],
        message: 'Must not be shorter than retryDelay',
      });
    }
  });

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Resolved Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface SinkConfig {
  url: string;
  org: string;
  token: string;
  bucket: string;
  measurement: string;
}

export interface CollectorConfig {
  sink: SinkConfig;
  /** Logical name → normalized hardware address */
  devices: Record<string, string>;
  transport: TransportSelection;
  discovery: DiscoveryOptions;
  polling: PollOptions;
  /** Ticks between status summaries; 0 disables them */
  statusEvery: number;
}

export type ConfigErrorKind = 'Unreadable' | 'Invalid';

export class ConfigError extends Error {
  constructor(
    public readonly kind: ConfigErrorKind,
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Environment = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const toMs = (seconds: number): number => Math.round(seconds * 1000);

// ─────────────────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────────────────

/**
 * CLI argument, else COLLECTOR_CONFIG, else ./collector.json
 */
export function resolveConfigPath(
  argv: readonly string[] = process.argv.slice(2),
  env: Environment = process.env,
  cwd: string = process.cwd()
): string {
  const requested = argv[0] || env.COLLECTOR_CONFIG || DEFAULT_CONFIG_FILE;
  return path.resolve(cwd, requested);
}

/**
 * Validate parsed JSON, apply environment overrides and convert to runtime units
 */
export function parseConfig(raw: unknown, env: Environment = process.env): CollectorConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid', 'Configuration must be a JSON object');
  }

  const merged: Record<string, unknown> = { ...raw };
  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value) {
      merged[key] = value;
    }
  }

  const result = ConfigFileSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError('Invalid', `Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return toCollectorConfig(result.data);
}

export function loadConfig(filePath: string, env: Environment = process.env): CollectorConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError('Unreadable', `Cannot read configuration ${filePath}: ${message}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError('Invalid', `Configuration ${filePath} is not valid JSON: ${message}`);
  }

  return parseConfig(raw, env);
}

function toCollectorConfig(file: ConfigFile): CollectorConfig {
  const devices: Record<string, string> = {};
  for (const [name, address] of Object.entries(file.tags)) {
    devices[name] = normalizeAddress(address);
  }

  return {
    sink: {
      url: file.host,
      org: file.org,
      token: file.token,
      bucket: file.bucket,
      measurement: file.measurement,
    },
    devices,
    transport: file.transport,
    discovery: {
      namePattern: file.namePattern,
      scanWindowMs: toMs(file.scanWindow),
      retryDelayMs: toMs(file.retryDelay),
      retryBackoffMultiplier: file.retryBackoffMultiplier,
      maxRetryDelayMs: toMs(file.maxRetryDelay),
      startupTimeoutMs: toMs(file.startupTimeout),
      reconcileIntervalMs: toMs(file.reconcileInterval),
    },
    polling: {
      intervalMs: toMs(file.interval),
      readTimeoutMs: toMs(file.readTimeout),
      maxConcurrentReads: file.maxConcurrentReads,
      maxConsecutiveReadFailures: file.maxConsecutiveReadFailures,
    },
    statusEvery: file.statusEvery,
  };
}
