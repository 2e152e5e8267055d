import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { applyEnvOverrides, ConfigValidationError, leaseTimings, loadConfig, resolveConfig } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('config loader', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'broker-config-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('resolveConfig', () => {
    it('returns defaults for an empty document', () => {
      expect(resolveConfig(undefined)).toEqual(DEFAULT_CONFIG);
      expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
    });

    it('accepts bare channel ids and channel objects', () => {
      const config = resolveConfig({
        channels: ['chan-a', { id: 'chan-b', usbPort: 'USB1', instrumentChannel: 4 }],
      });
      expect(config.channels).toEqual([
        { id: 'chan-a' },
        { id: 'chan-b', usbPort: 'USB1', instrumentChannel: 4 },
      ]);
    });

    it('accepts numeric strings', () => {
      const config = resolveConfig({ broker: { port: '1884' }, leases: { defaultLeaseSeconds: '30' } });
      expect(config.broker.port).toBe(1884);
      expect(config.leases.defaultLeaseSeconds).toBe(30);
    });

    it('rejects duplicate channel ids', () => {
      expect(() => resolveConfig({ channels: ['a', 'b', 'a'] })).toThrow(
        "Config validation error at 'channels': duplicate channel IDs: a",
      );
    });

    it('rejects a default lease above the maximum', () => {
      expect(() => resolveConfig({ leases: { defaultLeaseSeconds: 100, maxLeaseSeconds: 50 } })).toThrow(
        ConfigValidationError,
      );
    });

    it('reports the offending path', () => {
      try {
        resolveConfig({ broker: { transport: 'amqp' } });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigValidationError);
        if (err instanceof ConfigValidationError) {
          expect(err.path).toBe('broker.transport');
          expect(err.value).toBe('amqp');
        }
      }
    });

    it('requires a command for the sidecar driver', () => {
      expect(() => resolveConfig({ instrument: { driver: 'sidecar' } })).toThrow(
        'command is required when driver is "sidecar"',
      );
    });

    it('rejects a bad instrument channel', () => {
      expect(() => resolveConfig({ channels: [{ id: 'a', instrumentChannel: 0 }] })).toThrow(
        "Config validation error at 'channels[0].instrumentChannel'",
      );
    });
  });

  describe('applyEnvOverrides', () => {
    it('applies the startup overrides', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, {
        BROKER_HOST: 'mqtt.lab.internal',
        BROKER_PORT: '8883',
        DEFAULT_LEASE_SECONDS: '60',
        SWEEP_INTERVAL_SECONDS: '2',
        CHANNEL_IDS: 'chan-1, chan-2,,chan-3',
        LOG_LEVEL: 'debug',
      });
      expect(config.broker.host).toBe('mqtt.lab.internal');
      expect(config.broker.port).toBe(8883);
      expect(config.leases.defaultLeaseSeconds).toBe(60);
      expect(config.leases.sweepIntervalSeconds).toBe(2);
      expect(config.channels).toEqual([{ id: 'chan-1' }, { id: 'chan-2' }, { id: 'chan-3' }]);
      expect(config.logLevel).toBe('debug');
    });

    it('validates override values', () => {
      expect(() => applyEnvOverrides(DEFAULT_CONFIG, { LOG_LEVEL: 'verbose' })).toThrow(
        "Config validation error at 'logLevel'",
      );
    });
  });

  describe('loadConfig', () => {
    it('falls back to defaults when the file is missing', async () => {
      const config = await loadConfig({ configPath: join(dir, 'missing.yaml'), env: {} });
      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('reads YAML and substitutes environment variables', async () => {
      const path = join(dir, 'config.yaml');
      await writeFile(
        path,
        [
          'broker:',
          '  transport: memory',
          '  clientId: ${BROKER_CLIENT_ID:-lab-broker}',
          '  password: ${BROKER_PASSWORD}',
          'leases:',
          '  defaultLeaseSeconds: 30',
          'channels:',
          '  - chan-a',
          '  - id: chan-b',
          '    usbPort: USB1',
        ].join('\n'),
      );

      const config = await loadConfig({ configPath: path, env: { BROKER_PASSWORD: 'test-secret' } });
      expect(config.broker).toEqual({
        transport: 'memory',
        host: 'localhost',
        port: 1883,
        clientId: 'lab-broker',
        password: 'test-secret',
      });
      expect(config.leases.defaultLeaseSeconds).toBe(30);
      expect(config.channels).toEqual([{ id: 'chan-a' }, { id: 'chan-b', usbPort: 'USB1' }]);
    });

    it('honours CONFIG_PATH', async () => {
      const path = join(dir, 'other.yaml');
      await writeFile(path, 'logLevel: warn\n');
      const config = await loadConfig({ env: { CONFIG_PATH: path } });
      expect(config.logLevel).toBe('warn');
    });
  });

  it('converts lease settings to milliseconds', () => {
    expect(leaseTimings(DEFAULT_CONFIG)).toEqual({
      defaultLeaseMs: 120_000,
      maxLeaseMs: 3_600_000,
      sweepIntervalMs: 5_000,
    });
  });
});
