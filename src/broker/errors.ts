export type BrokerErrorCode =
  | 'NOT_HOLDER'
  | 'CHANNEL_BUSY'
  | 'CHANNEL_NOT_FOUND'
  | 'LEASE_EXPIRED'
  | 'REVOKED'
  | 'BROKER_SHUTDOWN'
  | 'INVOCATION_FAILED'
  | 'INVOCATION_CANCELLED'
  | 'INVOCATION_NOT_FOUND'
  | 'TIMEOUT'
  | 'TRANSPORT_UNAVAILABLE'
  | 'BAD_REQUEST';

const STATUS_CODES: Record<BrokerErrorCode, number> = {
  NOT_HOLDER: 409,
  CHANNEL_BUSY: 409,
  CHANNEL_NOT_FOUND: 404,
  LEASE_EXPIRED: 410,
  REVOKED: 410,
  BROKER_SHUTDOWN: 503,
  INVOCATION_FAILED: 502,
  INVOCATION_CANCELLED: 409,
  INVOCATION_NOT_FOUND: 404,
  TIMEOUT: 504,
  TRANSPORT_UNAVAILABLE: 503,
  BAD_REQUEST: 400,
};

const CODES = new Set<string>(Object.keys(STATUS_CODES));

export function isBrokerErrorCode(value: unknown): value is BrokerErrorCode {
  return typeof value === 'string' && CODES.has(value);
}

export class BrokerError extends Error {
  readonly code: BrokerErrorCode;
  readonly statusCode: number;
  /** Opaque instrument code for INVOCATION_FAILED, or the reason code for INVOCATION_CANCELLED. */
  readonly detailCode: string | undefined;

  constructor(code: BrokerErrorCode, message: string, detailCode?: string) {
    super(message);
    this.name = 'BrokerError';
    this.code = code;
    this.statusCode = STATUS_CODES[code];
    this.detailCode = detailCode;
  }
}
