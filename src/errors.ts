/**
 * Error types for the web3.storage client.
 *
 * Every failure surfaced by the client is a Web3StorageError with a stable `code`.
 */

export type Web3StorageErrorCode =
  | "E_CONFIGURATION"
  | "E_INVALID_ARGUMENT"
  | "E_PAYLOAD_TOO_LARGE"
  | "E_UPLOAD"
  | "E_NOT_FOUND"
  | "E_TRANSPORT";

export class Web3StorageError extends Error {
  readonly code: Web3StorageErrorCode;
  /** HTTP status of the response that caused the error, if any */
  readonly status?: number;

  constructor(code: Web3StorageErrorCode, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "Web3StorageError";
    this.code = code;
    this.status = options.status;
  }
}

/** Token file missing or malformed, or an unusable client option */
export class ConfigurationError extends Web3StorageError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super("E_CONFIGURATION", message, options);
    this.name = "ConfigurationError";
  }
}

export class InvalidArgumentError extends Web3StorageError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super("E_INVALID_ARGUMENT", message, options);
    this.name = "InvalidArgumentError";
  }
}

export class PayloadTooLargeError extends Web3StorageError {
  constructor(message: string, options: { status?: number } = {}) {
    super("E_PAYLOAD_TOO_LARGE", message, options);
    this.name = "PayloadTooLargeError";
  }
}

export class UploadError extends Web3StorageError {
  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super("E_UPLOAD", message, options);
    this.name = "UploadError";
  }
}

export class NotFoundError extends Web3StorageError {
  constructor(message: string, options: { status?: number } = {}) {
    super("E_NOT_FOUND", message, options);
    this.name = "NotFoundError";
  }
}

export class TransportError extends Web3StorageError {
  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super("E_TRANSPORT", message, options);
    this.name = "TransportError";
  }
}

/**
 * Strip bearer credentials from a message before it is thrown or logged.
 */
export function redactToken(message: string, token?: string): string {
  let redacted = message.replace(/\bBearer\s+[^\s]+/gi, "Bearer [REDACTED]");
  if (token) {
    redacted = redacted.split(token).join("[REDACTED]");
  }
  return redacted;
}
