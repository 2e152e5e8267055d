/**
 * Configuration loader for the instrument broker.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 * - Environment variable overrides for the startup settings
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  AppConfig,
  BrokerConnectionConfig,
  ChannelConfig,
  InstrumentConfig,
  LeaseConfig,
  LogLevel,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';

type Env = Record<string, string | undefined>;

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: env CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Environment used for substitution and overrides (default: process.env) */
  env?: Env;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'debug', 'info', 'warn', 'error'];

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

function substituteEnvVars(value: string, env: Env): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    return defaultValue ?? '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVarsRecursive(item, env));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * YAML values substituted from env arrive as strings; accept numeric strings.
 */
function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return undefined;
}

function requirePositive(value: unknown, path: string): number | undefined {
  if (value === undefined) return undefined;
  const n = toNumber(value);
  if (n === undefined || n <= 0) {
    throw new ConfigValidationError('must be a positive number', path, value);
  }
  return n;
}

function requireSection(value: unknown, path: string): Record<string, unknown> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be an object', path, value);
  }
  return value;
}

function optionalString(value: unknown, path: string): string | undefined {
  if (value === undefined || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new ConfigValidationError('must be a string', path, value);
  }
  return value;
}

function resolveBroker(raw: unknown): BrokerConnectionConfig {
  const c = requireSection(raw, 'broker');
  const defaults = DEFAULT_CONFIG.broker;

  const transport = c['transport'] ?? defaults.transport;
  if (transport !== 'mqtt' && transport !== 'memory') {
    throw new ConfigValidationError('transport must be one of: mqtt, memory', 'broker.transport', transport);
  }

  const port = c['port'] === undefined ? defaults.port : toNumber(c['port']);
  if (port === undefined || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', 'broker.port', c['port']);
  }

  const username = optionalString(c['username'], 'broker.username');
  const password = optionalString(c['password'], 'broker.password');

  return {
    transport,
    host: optionalString(c['host'], 'broker.host') ?? defaults.host,
    port,
    clientId: optionalString(c['clientId'], 'broker.clientId') ?? defaults.clientId,
    ...(username ? { username } : {}),
    ...(password ? { password } : {}),
  };
}

function resolveLeases(raw: unknown): LeaseConfig {
  const c = requireSection(raw, 'leases');
  const defaults = DEFAULT_CONFIG.leases;
  const leases: LeaseConfig = {
    defaultLeaseSeconds: requirePositive(c['defaultLeaseSeconds'], 'leases.defaultLeaseSeconds') ?? defaults.defaultLeaseSeconds,
    maxLeaseSeconds: requirePositive(c['maxLeaseSeconds'], 'leases.maxLeaseSeconds') ?? defaults.maxLeaseSeconds,
    sweepIntervalSeconds: requirePositive(c['sweepIntervalSeconds'], 'leases.sweepIntervalSeconds') ?? defaults.sweepIntervalSeconds,
  };
  if (leases.defaultLeaseSeconds > leases.maxLeaseSeconds) {
    throw new ConfigValidationError('defaultLeaseSeconds must not exceed maxLeaseSeconds', 'leases.defaultLeaseSeconds', leases.defaultLeaseSeconds);
  }
  return leases;
}

function resolveChannels(raw: unknown): ChannelConfig[] {
  if (raw === undefined) {
    return DEFAULT_CONFIG.channels.map((channel) => ({ ...channel }));
  }
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ConfigValidationError('must be a non-empty array', 'channels', raw);
  }

  const channels = raw.map((entry: unknown, index): ChannelConfig => {
    const path = `channels[${index}]`;
    // Bare strings are accepted as channel ids.
    const c: Record<string, unknown> = typeof entry === 'string' ? { id: entry } : requireSection(entry, path);
    const id = c['id'];
    if (typeof id !== 'string' || !/^[A-Za-z0-9_.-]+$/.test(id)) {
      throw new ConfigValidationError('id is required and may only contain letters, digits, ".", "_" and "-"', `${path}.id`, id);
    }
    const usbPort = optionalString(c['usbPort'], `${path}.usbPort`);
    const instrumentChannel = c['instrumentChannel'] === undefined ? undefined : toNumber(c['instrumentChannel']);
    const invalidChannel = instrumentChannel === undefined
      ? c['instrumentChannel'] !== undefined
      : !Number.isInteger(instrumentChannel) || instrumentChannel < 1;
    if (invalidChannel) {
      throw new ConfigValidationError('instrumentChannel must be a positive integer', `${path}.instrumentChannel`, c['instrumentChannel']);
    }
    return {
      id,
      ...(usbPort ? { usbPort } : {}),
      ...(instrumentChannel !== undefined ? { instrumentChannel } : {}),
    };
  });

  const ids = channels.map((channel) => channel.id);
  const duplicates = ids.filter((id, i) => ids.indexOf(id) !== i);
  if (duplicates.length > 0) {
    throw new ConfigValidationError(`duplicate channel IDs: ${duplicates.join(', ')}`, 'channels', null);
  }
  return channels;
}

function resolveInstrument(raw: unknown): InstrumentConfig {
  const c = requireSection(raw, 'instrument');
  const defaults = DEFAULT_CONFIG.instrument;

  const driver = c['driver'] ?? defaults.driver;
  if (driver !== 'simulated' && driver !== 'sidecar') {
    throw new ConfigValidationError('driver must be one of: simulated, sidecar', 'instrument.driver', driver);
  }
  const command = optionalString(c['command'], 'instrument.command');
  if (driver === 'sidecar' && !command) {
    throw new ConfigValidationError('command is required when driver is "sidecar"', 'instrument.command', command);
  }
  const args = c['args'] ?? defaults.args;
  if (!Array.isArray(args) || args.some((arg) => typeof arg !== 'string')) {
    throw new ConfigValidationError('args must be an array of strings', 'instrument.args', args);
  }

  const simulated = requireSection(c['simulated'], 'instrument.simulated');
  const points = simulated['pointsPerTechnique'] === undefined
    ? defaults.simulated.pointsPerTechnique
    : toNumber(simulated['pointsPerTechnique']);
  if (points === undefined || !Number.isInteger(points) || points < 0) {
    throw new ConfigValidationError('pointsPerTechnique must be a non-negative integer', 'instrument.simulated.pointsPerTechnique', simulated['pointsPerTechnique']);
  }
  const periodMs = simulated['periodMs'] === undefined ? defaults.simulated.periodMs : toNumber(simulated['periodMs']);
  if (periodMs === undefined || periodMs < 0) {
    throw new ConfigValidationError('periodMs must be a non-negative number', 'instrument.simulated.periodMs', simulated['periodMs']);
  }

  return {
    driver,
    ...(command ? { command } : {}),
    args: args.map(String),
    timeoutSeconds: requirePositive(c['timeoutSeconds'], 'instrument.timeoutSeconds') ?? defaults.timeoutSeconds,
    simulated: { pointsPerTechnique: points, periodMs },
  };
}

/**
 * Validate raw (parsed, substituted) configuration and merge it over defaults.
 */
export function resolveConfig(raw: unknown): AppConfig {
  if (raw === null || raw === undefined) {
    raw = {};
  }
  if (!isRecord(raw)) {
    throw new ConfigValidationError('must be an object', '', raw);
  }

  const logLevel = raw['logLevel'] ?? DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new ConfigValidationError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, 'logLevel', logLevel);
  }

  const presence = requireSection(raw['presence'], 'presence');
  const http = requireSection(raw['http'], 'http');
  const httpPort = http['port'] === undefined ? DEFAULT_CONFIG.http.port : toNumber(http['port']);
  if (httpPort === undefined || !Number.isInteger(httpPort) || httpPort < 0 || httpPort > 65535) {
    throw new ConfigValidationError('port must be a number between 0 and 65535', 'http.port', http['port']);
  }

  const historyLimit = requirePositive(raw['invocationHistoryLimit'], 'invocationHistoryLimit');

  return {
    broker: resolveBroker(raw['broker']),
    leases: resolveLeases(raw['leases']),
    presence: {
      intervalSeconds: requirePositive(presence['intervalSeconds'], 'presence.intervalSeconds') ?? DEFAULT_CONFIG.presence.intervalSeconds,
    },
    channels: resolveChannels(raw['channels']),
    instrument: resolveInstrument(raw['instrument']),
    http: {
      enabled: toBoolean(http['enabled']) ?? DEFAULT_CONFIG.http.enabled,
      host: optionalString(http['host'], 'http.host') ?? DEFAULT_CONFIG.http.host,
      port: httpPort,
    },
    logLevel,
    invocationHistoryLimit: historyLimit !== undefined ? Math.floor(historyLimit) : DEFAULT_CONFIG.invocationHistoryLimit,
  };
}

/**
 * Apply the startup overrides (BROKER_HOST, BROKER_PORT, DEFAULT_LEASE_SECONDS,
 * SWEEP_INTERVAL_SECONDS, CHANNEL_IDS, LOG_LEVEL) on top of a resolved config.
 */
export function applyEnvOverrides(config: AppConfig, env: Env): AppConfig {
  const overridden: Record<string, unknown> = {
    broker: {
      ...config.broker,
      ...(env['BROKER_HOST'] ? { host: env['BROKER_HOST'] } : {}),
      ...(env['BROKER_PORT'] ? { port: env['BROKER_PORT'] } : {}),
      ...(env['BROKER_TRANSPORT'] ? { transport: env['BROKER_TRANSPORT'] } : {}),
    },
    leases: {
      ...config.leases,
      ...(env['DEFAULT_LEASE_SECONDS'] ? { defaultLeaseSeconds: env['DEFAULT_LEASE_SECONDS'] } : {}),
      ...(env['SWEEP_INTERVAL_SECONDS'] ? { sweepIntervalSeconds: env['SWEEP_INTERVAL_SECONDS'] } : {}),
    },
    presence: config.presence,
    channels: env['CHANNEL_IDS']
      ? env['CHANNEL_IDS'].split(',').map((id) => id.trim()).filter(Boolean)
      : config.channels,
    instrument: config.instrument,
    http: {
      ...config.http,
      ...(env['HTTP_PORT'] ? { port: env['HTTP_PORT'] } : {}),
    },
    logLevel: env['LOG_LEVEL'] ?? config.logLevel,
    invocationHistoryLimit: config.invocationHistoryLimit,
  };
  // Re-run validation so overrides get the same checks as the file.
  return resolveConfig(overridden);
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath
    ?? env['CONFIG_PATH']
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  let parsed: unknown = {};
  if (existsSync(absolutePath)) {
    const content = await readFile(absolutePath, 'utf-8');
    try {
      parsed = parseYaml(content);
    } catch (err) {
      throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  const substituted = substituteEnvVarsRecursive(parsed ?? {}, env);

  return applyEnvOverrides(resolveConfig(substituted), env);
}

/**
 * Lease and sweep durations in milliseconds, the unit the broker works in.
 */
export function leaseTimings(config: AppConfig): { defaultLeaseMs: number; maxLeaseMs: number; sweepIntervalMs: number } {
  return {
    defaultLeaseMs: config.leases.defaultLeaseSeconds * 1000,
    maxLeaseMs: config.leases.maxLeaseSeconds * 1000,
    sweepIntervalMs: config.leases.sweepIntervalSeconds * 1000,
  };
}
