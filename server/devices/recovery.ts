/**
 * Device Error Recovery
 *
 * Classifies driver status codes and wraps device calls in a bounded retry
 * policy: a busy device is stopped and the call retried, at most
 * `retries` times. Unsupported operations are downgraded to a warning.
 */

import { Ok, Err } from '../../shared/types.js';
import { DriverStatus, type BindingResult, type DriverStatusCode } from './binding.js';
import type { DeviceError, DeviceErrorKind, DeviceResult } from './types.js';
import { createLogger } from '../logger.js';

const log = createLogger('Recovery');

const BUSY_STATUSES: ReadonlySet<number> = new Set([
  DriverStatus.BUSY,
  DriverStatus.HARDWARE_CAPTURING_CALL_STOP,
]);

const UNSUPPORTED_STATUSES: ReadonlySet<number> = new Set([
  DriverStatus.NOT_USED,
  DriverStatus.SIGGEN_WAVE_TYPE_NOT_SUPPORTED,
  DriverStatus.RESOLUTION_NOT_SUPPORTED,
  DriverStatus.NO_POD_CONNECTED,
  DriverStatus.INVALID_COUPLING,
]);

const STATUS_NAMES = new Map<number, string>(
  Object.entries(DriverStatus).map(([name, code]) => [code, name])
);

export function classifyStatus(status: DriverStatusCode): DeviceErrorKind {
  if (BUSY_STATUSES.has(status)) return 'busy';
  if (UNSUPPORTED_STATUSES.has(status)) return 'unsupported';
  return 'fatal';
}

export function statusName(status: DriverStatusCode): string {
  return STATUS_NAMES.get(status) ?? `0x${status.toString(16)}`;
}

export function deviceError(operation: string, status: DriverStatusCode): DeviceError {
  return {
    kind: classifyStatus(status),
    status,
    operation,
    message: `${operation} failed: ${statusName(status)}`,
  };
}

/** Lift a binding result into the adapter's error model. */
export function fromBinding<T>(operation: string, result: BindingResult<T>): DeviceResult<T> {
  return result.ok ? result : Err(deviceError(operation, result.error));
}

export interface RetryPolicy {
  /** Extra attempts after the first one fails busy */
  retries: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { retries: 1 };

/**
 * Run `operation`; while it fails busy and retries remain, call `stop` and
 * try again. A fatal stop failure ends the attempt with that failure.
 */
export async function withBusyRetry<T>(
  operation: () => Promise<DeviceResult<T>>,
  stop: () => Promise<DeviceResult<void>>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Promise<DeviceResult<T>> {
  let result = await operation();

  for (let attempt = 0; attempt < policy.retries; attempt++) {
    if (result.ok || result.error.kind !== 'busy') break;

    log.verbose(`${result.error.message}, stopping and retrying`);
    const stopped = await stop();
    if (!stopped.ok && stopped.error.kind === 'fatal') {
      return stopped;
    }
    result = await operation();
  }

  return result;
}

/** Treat an unsupported-on-model failure as success, with a warning. */
export function ignoreUnsupported(result: DeviceResult<void>): DeviceResult<void> {
  if (!result.ok && result.error.kind === 'unsupported') {
    log.warn(`${result.error.message} (not supported on this model, ignored)`);
    return Ok(undefined);
  }
  return result;
}
