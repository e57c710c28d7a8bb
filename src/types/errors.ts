/**
 * Global error types for the pet-care relay controller
 * Cloud collaborator failures, control failures and configuration violations
 */

/**
 * Base error for anything reported by the vendor cloud
 */
export class CloudApiError extends Error {
  /** Vendor error code when the failure came from an error payload */
  readonly code: number | null;

  constructor(message: string, code: number | null = null) {
    super(message);
    this.name = 'CloudApiError';
    this.code = code;
  }
}

/**
 * Credential or session problem (expired session, wrong password)
 */
export class AuthError extends CloudApiError {
  constructor(message: string, code: number | null = null) {
    super(message, code);
    this.name = 'AuthError';
  }
}

/**
 * Vendor outage: busy servers, non-2xx responses, unreadable bodies
 */
export class ServerError extends CloudApiError {
  constructor(message: string, code: number | null = null) {
    super(message, code);
    this.name = 'ServerError';
  }
}

/**
 * Bluetooth-layer failure reported by the vendor's own error payload
 */
export class BluetoothError extends CloudApiError {
  constructor(message: string, code: number | null = null) {
    super(message, code);
    this.name = 'BluetoothError';
  }
}

/**
 * A single cloud call exceeded its timeout
 */
export class RequestTimeoutError extends CloudApiError {
  constructor(message: string) {
    super(message);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * A settings-class frame was requested without a settings snapshot.
 * Programming-contract violation, never retried.
 */
export class MissingDeviceStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MissingDeviceStateError';
  }
}

/**
 * Bytes that do not form a valid BLE frame
 */
export class FrameDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameDecodeError';
  }
}

/**
 * Reasons a user command can be refused or fail
 */
export const CONTROL_ERROR_REASONS = {
  NO_RELAY_AVAILABLE: 'NoRelayAvailable',
  BLUETOOTH_LINK_FAILED: 'BluetoothLinkFailed',
  INVALID_COMMAND_FOR_STATE: 'InvalidCommandForState'
} as const;

export type ControlErrorReason = typeof CONTROL_ERROR_REASONS[keyof typeof CONTROL_ERROR_REASONS];

/**
 * Error surfaced to callers of sendCommand
 */
export class ControlError extends Error {
  readonly reason: ControlErrorReason;

  constructor(reason: ControlErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ControlError';
    this.reason = reason;
  }
}

/**
 * Base validation error for configuration checks
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the controller configuration fails validation
 */
export class ConfigValidationError extends ValidationError {
  /** One message per failed field, each starting with the field name */
  readonly problems: string[];

  constructor(problems: string[]) {
    super('Invalid configuration: ' + problems.join('; '));
    this.name = 'ConfigValidationError';
    this.problems = problems;
  }
}

/**
 * Check whether an error should consume one relay attempt instead of aborting the step
 * @param err - Anything thrown by a connect or poll call
 * @returns True for Bluetooth-layer failures and call timeouts
 */
export function isTransientRelayFailure(err: unknown): boolean {
  return err instanceof BluetoothError || err instanceof RequestTimeoutError;
}
