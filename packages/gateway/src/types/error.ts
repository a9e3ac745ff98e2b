export type ErrorKind =
  | 'UnknownModel'
  | 'InvalidTurns'
  | 'BackendError'
  | 'Timeout'
  | 'Malformed'
  | 'Cancelled'
  | 'Configuration';

export type ErrorDescriptor = {
  readonly kind: ErrorKind;
  readonly message: string;
  readonly status?: number;
};

export abstract class GatewayError extends Error {
  override name: string;
  override readonly cause?: Error;
  abstract readonly kind: ErrorKind;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }

  toDescriptor(): ErrorDescriptor {
    return { kind: this.kind, message: this.message };
  }
}

export class ConfigurationError extends GatewayError {
  override readonly kind = 'Configuration';
}

export class UnknownModelError extends GatewayError {
  override readonly kind = 'UnknownModel';
  readonly model: string;

  constructor(model: string) {
    super(`model '${model}' is not registered`);
    this.model = model;
  }
}

export class InvalidTurnsError extends GatewayError {
  override readonly kind = 'InvalidTurns';
}

export class TimeoutError extends GatewayError {
  override readonly kind = 'Timeout';
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.timeoutMs = timeoutMs;
  }
}

export class MalformedResponseError extends GatewayError {
  override readonly kind = 'Malformed';
}

export class CancelledError extends GatewayError {
  override readonly kind = 'Cancelled';
}

export class BackendError extends GatewayError {
  override readonly kind = 'BackendError';
  /** Vendor HTTP status, or null when no response was received. */
  readonly status: number | null;
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    status: number | null,
    retryAfterMs: number | null = null,
    cause?: Error,
  ) {
    super(message, cause);
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }

  override toDescriptor(): ErrorDescriptor {
    if (this.status === null) {
      return { kind: this.kind, message: this.message };
    }
    return { kind: this.kind, message: this.message, status: this.status };
  }
}

/**
 * Normalizes anything thrown at an adapter or dispatch boundary into a
 * GatewayError. Values that are not already gateway errors count as backend
 * faults without a status.
 */
export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) {
    return err;
  }
  if (err instanceof Error) {
    return new BackendError(err.message, null, null, err);
  }
  return new BackendError(String(err), null);
}

export function describeError(err: unknown): ErrorDescriptor {
  return toGatewayError(err).toDescriptor();
}

const STATUS_BY_KIND: Readonly<Record<ErrorKind, number>> = {
  UnknownModel: 404,
  InvalidTurns: 400,
  BackendError: 502,
  Malformed: 502,
  Timeout: 504,
  Cancelled: 499,
  Configuration: 500,
};

/** Transport status a serving layer would answer with for this kind. */
export function statusForError(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}
