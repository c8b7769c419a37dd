/**
 * Error taxonomy for the deploy gatekeeper.
 *
 * A deploy conflict is not an error: it is reported through
 * GatekeeperDecision.blocked. These classes cover the runs that cannot
 * produce a decision at all.
 */

export type GatekeeperErrorCode = 'REMOTE_FETCH' | 'MALFORMED_EVENT' | 'INVALID_CONFIG';

export class GatekeeperError extends Error {
  public readonly code: GatekeeperErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: GatekeeperErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'GatekeeperError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GatekeeperError);
    }
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A commit, ref or comparison could not be read from the repository host
 */
export class RemoteFetchError extends GatekeeperError {
  public readonly status?: number;

  constructor(message: string, status?: number, details?: Record<string, unknown>) {
    super(message, 'REMOTE_FETCH', { ...details, status });
    this.name = 'RemoteFetchError';
    this.status = status;
  }
}

/**
 * The event payload or runner environment lacks a field the gatekeeper needs
 */
export class MalformedEventError extends GatekeeperError {
  public readonly field: string;

  constructor(field: string, message?: string) {
    super(message ?? `Missing or invalid event field "${field}"`, 'MALFORMED_EVENT', { field });
    this.name = 'MalformedEventError';
    this.field = field;
  }
}

export class ConfigError extends GatekeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_CONFIG', details);
    this.name = 'ConfigError';
  }
}
