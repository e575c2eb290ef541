/**
 * Errors raised before a request ever reaches the scheduler.
 */

/** Malformed duration or time of day, zero-length period, bad setting. */
export class ConfigurationError extends Error {
  public input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = "ConfigurationError";
    this.input = input;
  }
}

/** A client/daemon message that does not match the wire format. */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}
