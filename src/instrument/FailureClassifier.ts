export type FailureClass = 'transient' | 'terminal' | 'unknown';

export type FailureClassification = {
  failureClass: FailureClass;
  retryRecommended: boolean;
  failureCode: string;
  reason: string;
};

type ClassifyInput = {
  exitCode?: number | null;
  signal?: string | null;
  timedOut?: boolean;
  stderr?: string;
};

/**
 * Maps an instrument bridge process that ended without reporting a result
 * to an opaque failure code.
 */
export function classifyBridgeFailure(input: ClassifyInput): FailureClassification {
  const stderr = (input.stderr ?? '').toLowerCase();
  const exitCode = input.exitCode;

  if (input.timedOut === true) {
    return { failureClass: 'transient', retryRecommended: true, failureCode: 'INSTRUMENT_TIMEOUT', reason: 'job_exceeded_time_limit' };
  }
  if (stderr.includes('usb') || stderr.includes('not connected') || stderr.includes('no device')) {
    return { failureClass: 'transient', retryRecommended: true, failureCode: 'INSTRUMENT_UNREACHABLE', reason: 'instrument_connection_failed' };
  }
  if (stderr.includes('invalid') || stderr.includes('parameter') || stderr.includes('channel')) {
    return { failureClass: 'terminal', retryRecommended: false, failureCode: 'INVALID_TECHNIQUE', reason: 'invalid_technique_or_channel' };
  }
  if (input.signal || (typeof exitCode === 'number' && exitCode >= 128)) {
    return { failureClass: 'terminal', retryRecommended: false, failureCode: 'BRIDGE_KILLED', reason: 'process_signal_or_fatal' };
  }
  if (typeof exitCode === 'number' && exitCode > 0) {
    return { failureClass: 'transient', retryRecommended: true, failureCode: 'BRIDGE_FAILED', reason: 'nonzero_exit' };
  }
  return { failureClass: 'unknown', retryRecommended: false, failureCode: 'BRIDGE_NO_RESULT', reason: 'exited_without_result' };
}
