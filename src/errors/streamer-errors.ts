/**
 * Error hierarchy for the streamer control core.
 * Every failure that reaches a command caller is one of these, never a bare Error.
 */

export type TransportErrorKind = 'NETWORK' | 'FAULT' | 'MALFORMED';

/**
 * Base error class for all streamer-related errors
 */
export class StreamerError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'StreamerError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StreamerError);
    }
  }
}

/**
 * A device call failed. `kind` tells the caller whether a retry can help:
 * NETWORK may succeed later, FAULT was refused by the device, MALFORMED could not be read.
 */
export class TransportError extends StreamerError {
  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    public readonly service: string,
    public readonly action: string,
    public readonly faultCode?: string,
    public readonly originalError?: unknown
  ) {
    super(message, kind === 'FAULT' && faultCode ? faultCode : kind);
    this.name = 'TransportError';
  }

  get retryable(): boolean {
    return this.kind === 'NETWORK';
  }
}

/**
 * Timeout, refused or reset connection, non-SOAP HTTP failure
 */
export class NetworkError extends TransportError {
  constructor(service: string, action: string, message: string, cause?: unknown) {
    super(message, 'NETWORK', service, action, undefined, cause);
    this.name = 'NetworkError';
  }
}

/**
 * The device answered with a SOAP fault
 */
export class ProtocolFaultError extends TransportError {
  constructor(
    service: string,
    action: string,
    public readonly errorCode: string,
    public readonly errorDescription?: string
  ) {
    super(
      errorDescription ? `${action} failed with UPnP error ${errorCode}: ${errorDescription}` : `${action} failed with UPnP error ${errorCode}`,
      'FAULT',
      service,
      action,
      errorCode
    );
    this.name = 'ProtocolFaultError';
  }

  /**
   * UPnP error codes from the device architecture and the AVTransport /
   * RenderingControl service templates
   */
  static readonly ErrorCodes = {
    INVALID_ACTION: '401',
    INVALID_ARGS: '402',
    ACTION_FAILED: '501',
    ARGUMENT_VALUE_INVALID: '600',
    ARGUMENT_VALUE_OUT_OF_RANGE: '601',
    OPTIONAL_ACTION_NOT_IMPLEMENTED: '602',
    OUT_OF_MEMORY: '603',
    HUMAN_INTERVENTION_REQUIRED: '604',
    STRING_ARGUMENT_TOO_LONG: '605',
    ACTION_NOT_AUTHORIZED: '606',
    TRANSITION_NOT_AVAILABLE: '701',
    NO_CONTENTS: '702',
    READ_ERROR: '703',
    FORMAT_NOT_SUPPORTED: '704',
    TRANSPORT_IS_LOCKED: '705',
    SEEK_MODE_NOT_SUPPORTED: '710',
    ILLEGAL_SEEK_TARGET: '711',
    PLAY_MODE_NOT_SUPPORTED: '712',
    ILLEGAL_MIME_TYPE: '714',
    CONTENT_BUSY: '715',
    RESOURCE_NOT_FOUND: '716',
    INVALID_INSTANCE_ID: '718'
  } as const;

  isErrorCode(code: string): boolean {
    return this.errorCode === code;
  }
}

/**
 * The response (or event) could not be parsed
 */
export class MalformedResponseError extends TransportError {
  constructor(service: string, action: string, message: string, cause?: unknown) {
    super(message, 'MALFORMED', service, action, undefined, cause);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Commands against a device that lost its event subscription fail fast with this
 */
export class DeviceUnreachableError extends NetworkError {
  constructor(service: string, action: string, reason?: string) {
    super(service, action, reason ? `Device unreachable: ${reason}` : 'Device unreachable');
    this.name = 'DeviceUnreachableError';
  }
}

/**
 * A GENA SUBSCRIBE / renewal was refused or could not be completed
 */
export class SubscriptionError extends StreamerError {
  constructor(
    message: string,
    public readonly service: string,
    public readonly statusCode?: number,
    public readonly originalError?: unknown
  ) {
    super(message, statusCode === 412 ? 'SUBSCRIPTION_EXPIRED' : 'SUBSCRIPTION_FAILED');
    this.name = 'SubscriptionError';
  }
}

/**
 * The response belongs to a device generation that has since been replaced,
 * or the owner shut down before the operation ran
 */
export class CancelledError extends StreamerError {
  constructor(operation: string, cause = 'device reconfiguration') {
    super(`Abandoned after ${cause}: ${operation}`, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

/**
 * The device lacks the services needed to control playback
 */
export class IncompatibleDeviceError extends StreamerError {
  constructor(
    public readonly location: string,
    reason: string
  ) {
    super(`Incompatible device at ${location}: ${reason}`, 'INCOMPATIBLE_DEVICE');
    this.name = 'IncompatibleDeviceError';
  }
}

/**
 * The command needs an action the device did not advertise
 */
export class CapabilityError extends StreamerError {
  constructor(operation: string, reason?: string) {
    const message = reason
      ? `Operation not supported: ${operation} (${reason})`
      : `Operation not supported: ${operation}`;
    super(message, 'NOT_SUPPORTED');
    this.name = 'CapabilityError';
  }
}

export class UnknownButtonError extends StreamerError {
  constructor(public readonly buttonId: string) {
    super(`Unknown button: ${buttonId}`, 'UNKNOWN_BUTTON');
    this.name = 'UnknownButtonError';
  }
}

export class ValidationError extends StreamerError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Raised by the timeout wrapper; transport code converts it into a NetworkError
 */
export class TimeoutError extends StreamerError {
  constructor(
    operation: string,
    public readonly timeoutMs: number
  ) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

/**
 * An HTTP-level failure raised by the API router itself
 */
export class ApiError extends StreamerError {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message, 'API_ERROR');
    this.name = 'ApiError';
  }
}

export function createError(status: number, message: string): ApiError {
  return new ApiError(status, message);
}

export function isStreamerError(error: unknown): error is StreamerError {
  return error instanceof StreamerError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Get an appropriate HTTP status code for an error
 */
export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ApiError) {
    return error.status;
  }
  if (error instanceof UnknownButtonError) {
    return 404;
  }
  if (error instanceof ValidationError) {
    return 400;
  }
  if (error instanceof CapabilityError) {
    return 501;
  }
  if (error instanceof IncompatibleDeviceError) {
    return 501;
  }
  if (error instanceof CancelledError) {
    return 409;
  }
  if (error instanceof ProtocolFaultError) {
    switch (error.errorCode) {
      case ProtocolFaultError.ErrorCodes.INVALID_ARGS:
      case ProtocolFaultError.ErrorCodes.ARGUMENT_VALUE_INVALID:
      case ProtocolFaultError.ErrorCodes.ARGUMENT_VALUE_OUT_OF_RANGE:
      case ProtocolFaultError.ErrorCodes.ILLEGAL_SEEK_TARGET:
        return 400;
      case ProtocolFaultError.ErrorCodes.RESOURCE_NOT_FOUND:
        return 404;
      case ProtocolFaultError.ErrorCodes.TRANSITION_NOT_AVAILABLE:
      case ProtocolFaultError.ErrorCodes.NO_CONTENTS:
      case ProtocolFaultError.ErrorCodes.TRANSPORT_IS_LOCKED:
        return 409;
      default:
        return 502;
    }
  }
  if (error instanceof DeviceUnreachableError) {
    return 503;
  }
  if (error instanceof TransportError) {
    return error.kind === 'NETWORK' ? 504 : 502;
  }
  return 500;
}
