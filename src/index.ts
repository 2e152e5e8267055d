/**
 * instrument-broker: shared access to a multi-channel potentiostat over a
 * publish/subscribe transport.
 *
 * This is the main entry point for the library.
 */

// Configuration
export * from './config/types.js';
export { loadConfig, resolveConfig, applyEnvOverrides, leaseTimings, ConfigValidationError } from './config/loader.js';

// Logging
export { createLogger, componentLogger, silentLogger, type Logger } from './logging/logger.js';

// Core utilities
export { ManualClock, systemClock, type Clock } from './core/clock.js';

// Transport
export * from './transport/types.js';
export * from './transport/topics.js';
export { InMemoryBus, InMemoryTransport } from './transport/InMemoryTransport.js';
export { MqttTransport, type MqttTransportOptions } from './transport/MqttTransport.js';

// Wire messages
export * from './protocol/messages.js';

// Broker
export * from './broker/errors.js';
export * from './broker/ChannelRegistry.js';
export * from './broker/ReservationManager.js';
export * from './broker/TechniqueDispatcher.js';
export * from './broker/LeaseSweeper.js';
export * from './broker/BrokerHost.js';
export * from './presence/PresenceBeacon.js';
export * from './devices/DeviceStateStore.js';

// Instrument drivers
export * from './instrument/InstrumentDriver.js';
export * from './instrument/SimulatedInstrument.js';
export * from './instrument/SidecarInstrument.js';

// Client library
export * from './client/ChannelClient.js';
export * from './client/DeviceClient.js';

// Server
export { initializeApp, startBroker, shutdownBroker, createServer, type AppContext, type AppOverrides } from './server.js';
