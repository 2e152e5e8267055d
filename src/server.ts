/**
 * Server entry point for the instrument broker.
 *
 * This module:
 * - Initializes all components (transport, registry, reservations, dispatcher)
 * - Starts the broker host, presence beacon and lease sweeper
 * - Creates the Fastify ops server with routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify, { type FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';

import { BrokerHost } from './broker/BrokerHost.js';
import { ChannelRegistry } from './broker/ChannelRegistry.js';
import { LeaseSweeper } from './broker/LeaseSweeper.js';
import { ReservationManager } from './broker/ReservationManager.js';
import { TechniqueDispatcher } from './broker/TechniqueDispatcher.js';
import { leaseTimings, loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { systemClock, type Clock } from './core/clock.js';
import { DeviceStateStore } from './devices/DeviceStateStore.js';
import type { InstrumentDriver } from './instrument/InstrumentDriver.js';
import { SidecarInstrument } from './instrument/SidecarInstrument.js';
import { SimulatedInstrument } from './instrument/SimulatedInstrument.js';
import { componentLogger, createLogger, errorMessage, type Logger } from './logging/logger.js';
import { PresenceBeacon, presenceWill } from './presence/PresenceBeacon.js';
import { InMemoryBus, InMemoryTransport } from './transport/InMemoryTransport.js';
import { MqttTransport } from './transport/MqttTransport.js';
import type { Transport, Unsubscribe } from './transport/types.js';
import { createBrokerHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { HealthResponse } from './api/types.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  logger: Logger;
  clock: Clock;
  transport: Transport;
  /** Present when the transport is in-process */
  bus?: InMemoryBus;
  driver: InstrumentDriver;
  registry: ChannelRegistry;
  manager: ReservationManager;
  dispatcher: TechniqueDispatcher;
  sweeper: LeaseSweeper;
  beacon: PresenceBeacon;
  host: BrokerHost;
  devices: DeviceStateStore;
  /** Set while the broker is started */
  deviceSubscription?: Unsubscribe;
}

/**
 * Collaborators a caller (usually a test) may supply instead of the ones
 * built from configuration.
 */
export interface AppOverrides {
  logger?: Logger;
  clock?: Clock;
  bus?: InMemoryBus;
  transport?: Transport;
  driver?: InstrumentDriver;
}

function createTransport(config: AppConfig, logger: Logger, clock: Clock, bus: InMemoryBus | undefined): Transport {
  const { broker } = config;
  const will = presenceWill(clock);
  if (broker.transport === 'memory') {
    return new InMemoryTransport(bus ?? new InMemoryBus(componentLogger(logger, 'bus')), {
      clientId: broker.clientId,
      will,
    });
  }
  return new MqttTransport({
    clientId: broker.clientId,
    will,
    host: broker.host,
    port: broker.port,
    ...(broker.username !== undefined ? { username: broker.username } : {}),
    ...(broker.password !== undefined ? { password: broker.password } : {}),
    logger: componentLogger(logger, 'mqtt'),
  });
}

function createDriver(config: AppConfig, logger: Logger): InstrumentDriver {
  const { instrument } = config;
  if (instrument.driver === 'sidecar' && instrument.command) {
    return new SidecarInstrument({
      command: instrument.command,
      args: instrument.args,
      timeoutMs: instrument.timeoutSeconds * 1000,
      logger: componentLogger(logger, 'instrument'),
    });
  }
  return new SimulatedInstrument({
    pointsPerTechnique: instrument.simulated.pointsPerTechnique,
    periodMs: instrument.simulated.periodMs,
    logger: componentLogger(logger, 'instrument'),
  });
}

/**
 * Initialize all application components. Nothing is connected or started.
 */
export function initializeApp(config: AppConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const clock = overrides.clock ?? systemClock;
  const timings = leaseTimings(config);

  const bus = overrides.bus ?? (config.broker.transport === 'memory' && !overrides.transport
    ? new InMemoryBus(componentLogger(logger, 'bus'))
    : undefined);
  const transport = overrides.transport ?? createTransport(config, logger, clock, bus);
  const driver = overrides.driver ?? createDriver(config, logger);

  const registry = new ChannelRegistry();
  for (const channel of config.channels) {
    registry.create(channel.id, {
      ...(channel.usbPort !== undefined ? { usbPort: channel.usbPort } : {}),
      ...(channel.instrumentChannel !== undefined ? { instrumentChannel: channel.instrumentChannel } : {}),
    });
  }

  const manager = new ReservationManager(registry, {
    defaultLeaseMs: timings.defaultLeaseMs,
    maxLeaseMs: timings.maxLeaseMs,
    clock,
    logger: componentLogger(logger, 'reservations'),
  });
  const dispatcher = new TechniqueDispatcher(registry, manager, {
    driver,
    historyLimit: config.invocationHistoryLimit,
    clock,
    logger: componentLogger(logger, 'dispatcher'),
  });
  const sweeper = new LeaseSweeper(manager, timings.sweepIntervalMs, componentLogger(logger, 'sweeper'));
  const beacon = new PresenceBeacon(transport, {
    intervalMs: config.presence.intervalSeconds * 1000,
    channels: () => registry.list().map((channel) => channel.id),
    clock,
    logger: componentLogger(logger, 'presence'),
  });
  const host = new BrokerHost({
    transport,
    manager,
    dispatcher,
    clock,
    logger: componentLogger(logger, 'host'),
  });
  const devices = new DeviceStateStore(componentLogger(logger, 'devices'));

  logger.info(
    { channels: registry.size, transport: config.broker.transport, driver: driver.kind },
    'Broker initialized',
  );

  return {
    config,
    logger,
    clock,
    transport,
    ...(bus ? { bus } : {}),
    driver,
    registry,
    manager,
    dispatcher,
    sweeper,
    beacon,
    host,
    devices,
  };
}

/**
 * Connects the transport and starts serving reservations.
 */
export async function startBroker(ctx: AppContext): Promise<void> {
  await ctx.transport.connect();
  await ctx.host.start();
  ctx.deviceSubscription = await ctx.devices.attach(ctx.transport);
  await ctx.beacon.start();
  ctx.sweeper.start();
  ctx.logger.info(
    { channels: ctx.registry.list().map((channel) => channel.id), clientId: ctx.transport.clientId },
    'Broker started',
  );
}

/**
 * Shutdown sequence: end every reservation (notifying holders and waiters),
 * let aborted runs settle, stop the sweep and the beacon, disconnect.
 */
export async function shutdownBroker(ctx: AppContext): Promise<void> {
  const affected = await ctx.manager.releaseAll('Broker shutting down');
  await ctx.dispatcher.drain();
  await ctx.host.flush();
  ctx.sweeper.stop();
  await ctx.beacon.stop();
  await ctx.host.stop();
  if (ctx.deviceSubscription && ctx.transport.isConnected()) {
    await ctx.deviceSubscription();
  }
  delete ctx.deviceSubscription;
  ctx.dispatcher.close();
  await ctx.transport.disconnect();
  ctx.logger.info({ affected }, 'Broker stopped');
}

function health(ctx: AppContext): HealthResponse {
  const channels = ctx.registry.list();
  const sweeper = ctx.sweeper.status();
  const connected = ctx.transport.isConnected();
  return {
    status: connected ? 'ok' : 'degraded',
    timestamp: new Date(ctx.clock.wallMs()).toISOString(),
    components: {
      transport: { kind: ctx.config.broker.transport, connected },
      channels: {
        total: channels.length,
        free: channels.filter((channel) => channel.state === 'free').length,
        reserved: channels.filter((channel) => channel.state === 'reserved').length,
        running: channels.filter((channel) => channel.state === 'running').length,
      },
      invocations: { running: ctx.dispatcher.runningCount() },
      sweeper: { running: sweeper.running, errorStreak: sweeper.errorStreak },
    },
  };
}

/**
 * Create and configure the Fastify ops server.
 */
export async function createServer(ctx: AppContext) {
  const loggerInstance: FastifyBaseLogger = componentLogger(ctx.logger, 'http');
  const fastify = Fastify({ loggerInstance });

  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  const brokerHandlers = createBrokerHandlers(ctx);

  // Register API routes with /api prefix
  await fastify.register(async (instance) => {
    registerRoutes(instance, {
      brokerHandlers,
      health: () => health(ctx),
    });
  }, { prefix: '/api' });

  return fastify;
}

/**
 * Start the broker and, when enabled, the ops server.
 */
export async function startServer(config: AppConfig): Promise<void> {
  const ctx = initializeApp(config);
  const { logger } = ctx;

  try {
    await startBroker(ctx);

    const fastify = config.http.enabled ? await createServer(ctx) : null;
    if (fastify) {
      await fastify.listen({ port: config.http.port, host: config.http.host });
    }

    let stopping = false;
    const shutdown = async (signal: string) => {
      if (stopping) return;
      stopping = true;
      logger.info({ signal }, 'Shutting down');
      try {
        await shutdownBroker(ctx);
        await fastify?.close();
        process.exit(0);
      } catch (err) {
        logger.error({ err: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (err) {
    logger.error({ err: errorMessage(err) }, 'Failed to start broker');
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const config = await loadConfig();
  await startServer(config);
}

// Run if executed directly
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch((err: unknown) => {
    console.error('Failed to start broker:', err);
    process.exit(1);
  });
}
