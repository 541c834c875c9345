export type BridgeErrorCode =
  | "CONNECTION_LOST"
  | "TIMEOUT"
  | "PROTOCOL_ERROR"
  | "MALFORMED_PAYLOAD"
  | "REGISTER_MAP_INVALID"
  | "CONFIGURATION_INVALID";

export abstract class BridgeError extends Error {
  abstract readonly code: BridgeErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConnectionLostError extends BridgeError {
  readonly code = "CONNECTION_LOST";
}

export class RequestTimeoutError extends BridgeError {
  readonly code = "TIMEOUT";
}

// exceptionCode is null when the frame itself was unusable
export class ProtocolError extends BridgeError {
  readonly code = "PROTOCOL_ERROR";

  constructor(
    message: string,
    readonly exceptionCode: number | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class MalformedPayloadError extends BridgeError {
  readonly code = "MALFORMED_PAYLOAD";

  constructor(
    readonly key: string,
    readonly expectedWords: number,
    readonly receivedWords: number,
  ) {
    super(`Register ${key} expects ${expectedWords} word(s), received ${receivedWords}`);
  }
}

export class RegisterMapError extends BridgeError {
  readonly code = "REGISTER_MAP_INVALID";

  constructor(readonly issues: string[]) {
    super(`Invalid register map: ${issues.join("; ")}`);
  }
}

export class ConfigurationError extends BridgeError {
  readonly code = "CONFIGURATION_INVALID";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

/** Transport-level failures are the ones that drive reconnects and backoff. */
export function isTransportError(error: unknown): error is ConnectionLostError | RequestTimeoutError {
  return error instanceof ConnectionLostError || error instanceof RequestTimeoutError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
