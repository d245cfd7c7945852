/**
 * Base class for errors raised by this library. `code` lets callers branch
 * without matching on messages.
 */
export class VacbotError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = "VacbotError";
  }
}

/** Missing or invalid environment configuration. */
export class ConfigError extends VacbotError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

/**
 * Network or portal level failure while sending a command. Logical failures
 * reported by the device travel inside the response payload instead.
 */
export class TransportError extends VacbotError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error
  ) {
    super(message, "TRANSPORT_ERROR", cause);
    this.name = "TransportError";
  }
}

/** A code path that must be unreachable was reached. */
export class ContractViolationError extends VacbotError {
  constructor(message: string) {
    super(message, "CONTRACT_VIOLATION");
    this.name = "ContractViolationError";
  }
}

export class BotDisposedError extends VacbotError {
  constructor(deviceId: string) {
    super(`Bot ${deviceId} has been disposed`, "BOT_DISPOSED");
    this.name = "BotDisposedError";
  }
}
