/**
 * Error hierarchy for the forwarder.
 *
 * Only configuration, envelope and network failures are thrown as-is by the
 * lower layers. HTTP classification is returned as a DeliveryOutcome by the
 * IngestClient; the Dispatcher turns the terminal failures that must abort a
 * record back into ThrottlingError / MaxRetriesError.
 */

export class ForwarderError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ForwarderError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, ForwarderError.prototype);
  }
}

export class ConfigError extends ForwarderError {
  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message, "Config.Invalid");
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/** Programming error: an envelope was requested without an invocation context. */
export class EnvelopeError extends ForwarderError {
  constructor(message: string) {
    super(message, "Envelope.MissingContext");
    this.name = "EnvelopeError";
    Object.setPrototypeOf(this, EnvelopeError.prototype);
  }
}

/**
 * Non-retryable failure for a payload or envelope. The affected data is
 * reported once and dropped.
 */
export class BadRequestError extends ForwarderError {
  constructor(message: string, code = "BadRequest.Generic") {
    super(message, code);
    this.name = "BadRequestError";
    Object.setPrototypeOf(this, BadRequestError.prototype);
  }
}

export class MalformedEntryError extends BadRequestError {
  constructor(message: string) {
    super(message, "BadRequest.MalformedEntry");
    this.name = "MalformedEntryError";
    Object.setPrototypeOf(this, MalformedEntryError.prototype);
  }
}

export class PayloadTooLargeError extends BadRequestError {
  public readonly size: number;
  public readonly limit: number;

  constructor(size: number, limit: number) {
    super(`Single log event payload is ${size} bytes, limit is ${limit}`, "BadRequest.PayloadTooLarge");
    this.name = "PayloadTooLargeError";
    this.size = size;
    this.limit = limit;
    Object.setPrototypeOf(this, PayloadTooLargeError.prototype);
  }
}

export class ThrottlingError extends ForwarderError {
  public readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message, "Delivery.Throttled");
    this.name = "ThrottlingError";
    this.attempts = attempts;
    Object.setPrototypeOf(this, ThrottlingError.prototype);
  }
}

export class MaxRetriesError extends ForwarderError {
  public readonly attempts: number;

  constructor(attempts: number, lastError?: string) {
    super(
      `Retry limit reached after ${attempts} attempts${lastError ? `. Last error: ${lastError}` : ""}`,
      "Delivery.MaxRetries",
    );
    this.name = "MaxRetriesError";
    this.attempts = attempts;
    Object.setPrototypeOf(this, MaxRetriesError.prototype);
  }
}

export type NetworkErrorKind = "Timeout" | "ConnectionFailed" | "DnsFailed";

/** Transport-level failure: no HTTP response was received. Always retryable. */
export class NetworkError extends ForwarderError {
  public readonly kind: NetworkErrorKind;

  constructor(message: string, kind: NetworkErrorKind, cause?: unknown) {
    super(message, `Network.${kind}`, { retryable: true, cause });
    this.name = "NetworkError";
    this.kind = kind;
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}
