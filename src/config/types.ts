/**
 * Configuration types for the instrument broker.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to broker configuration.
 */

export type LogLevel = 'silent' | 'debug' | 'info' | 'warn' | 'error';
export type TransportKind = 'mqtt' | 'memory';
export type InstrumentDriverKind = 'simulated' | 'sidecar';

/**
 * Top-level broker configuration.
 */
export interface AppConfig {
  broker: BrokerConnectionConfig;
  leases: LeaseConfig;
  presence: PresenceConfig;
  channels: ChannelConfig[];
  instrument: InstrumentConfig;
  http: HttpConfig;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** Number of finished invocations kept in memory for dedupe and the ops API (default: 500) */
  invocationHistoryLimit: number;
}

/**
 * Messaging transport settings.
 */
export interface BrokerConnectionConfig {
  /** 'mqtt' talks to an external MQTT broker; 'memory' keeps everything in-process */
  transport: TransportKind;
  /** MQTT broker host (default: 'localhost') */
  host: string;
  /** MQTT broker port (default: 1883) */
  port: number;
  /** Client id the broker process connects with (default: 'instrument-broker') */
  clientId: string;
  username?: string;
  password?: string;
}

/**
 * Reservation lease settings.
 */
export interface LeaseConfig {
  /** Lease granted when a request names none (default: 120) */
  defaultLeaseSeconds: number;
  /** Upper bound on a requested lease (default: 3600) */
  maxLeaseSeconds: number;
  /** Interval of the expiry sweep (default: 5) */
  sweepIntervalSeconds: number;
}

/**
 * Presence beacon settings.
 */
export interface PresenceConfig {
  /** Heartbeat period on broker/presence (default: 5) */
  intervalSeconds: number;
}

/**
 * One reservable instrument channel.
 */
export interface ChannelConfig {
  /** Channel id used in topics, e.g. 'chan-1' */
  id: string;
  /** Instrument port the channel lives on (default: 'USB0') */
  usbPort?: string;
  /** 1-based channel number on the instrument (default: position in the list) */
  instrumentChannel?: number;
}

/**
 * Instrument driver settings.
 */
export interface InstrumentConfig {
  driver: InstrumentDriverKind;
  /** Bridge executable for the sidecar driver */
  command?: string;
  /** Arguments passed to the bridge executable */
  args: string[];
  /** Hard limit on one job (default: 7200) */
  timeoutSeconds: number;
  simulated: SimulatedInstrumentConfig;
}

export interface SimulatedInstrumentConfig {
  /** Data points emitted per technique (default: 5) */
  pointsPerTechnique: number;
  /** Delay between points (default: 200) */
  periodMs: number;
}

/**
 * Ops HTTP API settings.
 */
export interface HttpConfig {
  enabled: boolean;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Port to listen on (default: 3080) */
  port: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  broker: {
    transport: 'mqtt',
    host: 'localhost',
    port: 1883,
    clientId: 'instrument-broker',
  },
  leases: {
    defaultLeaseSeconds: 120,
    maxLeaseSeconds: 3600,
    sweepIntervalSeconds: 5,
  },
  presence: {
    intervalSeconds: 5,
  },
  channels: [{ id: 'chan-1' }],
  instrument: {
    driver: 'simulated',
    args: [],
    timeoutSeconds: 7200,
    simulated: {
      pointsPerTechnique: 5,
      periodMs: 200,
    },
  },
  http: {
    enabled: true,
    host: '0.0.0.0',
    port: 3080,
  },
  logLevel: 'info',
  invocationHistoryLimit: 500,
};
