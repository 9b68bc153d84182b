/**
 * Whether a failed provider request may succeed if issued again
 */
export type ErrorClassification = 'transient' | 'terminal';

/**
 * Report phrase of each provider failure
 */
export type ProviderFailureReason =
  | 'request timeout'
  | 'session congestion'
  | 'session lost'
  | 'provider error'
  | 'unresolvable security'
  | 'entitlement denied'
  | 'malformed request';

/**
 * Classified failure of a single provider request
 *
 * `reason` is the short human-readable phrase that ends up in the batch report.
 */
export abstract class ProviderError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly reason: ProviderFailureReason;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get isTransient(): boolean {
    return this.classification === 'transient';
  }
}

/** Request exceeded its timeout; the provider is known to hang on broad requests */
export class RequestTimeoutError extends ProviderError {
  readonly classification = 'transient';
  readonly reason = 'request timeout';

  constructor(readonly timeoutMs: number, message = `Request timed out after ${timeoutMs}ms`) {
    super(message);
  }
}

/** Provider throttled the request (pacing violation, too many requests) */
export class SessionCongestionError extends ProviderError {
  readonly classification = 'transient';
  readonly reason = 'session congestion';
}

/** Session dropped mid-run; the next request reconnects first */
export class SessionLostError extends ProviderError {
  readonly classification = 'transient';
  readonly reason = 'session lost';
}

/** Upstream failed in a way that carries no further classification */
export class ProviderUnavailableError extends ProviderError {
  readonly classification = 'transient';
  readonly reason = 'provider error';
}

export class UnresolvableSecurityError extends ProviderError {
  readonly classification = 'terminal';
  readonly reason = 'unresolvable security';
}

export class EntitlementDeniedError extends ProviderError {
  readonly classification = 'terminal';
  readonly reason = 'entitlement denied';
}

/** Provider rejected the request itself (e.g. malformed date range) */
export class MalformedRequestError extends ProviderError {
  readonly classification = 'terminal';
  readonly reason = 'malformed request';
}

/**
 * Session could not be established. Fatal to the whole batch.
 */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}
