/**
 * web3-storage-client
 *
 * Client library for the web3.storage HTTP API: upload files, retrieve CAR
 * payloads, read storage status and list account uploads.
 */

// Types
export type {
  ClientConfig,
  ClientOptions,
  Deal,
  ListUploadsOptions,
  Pin,
  UploadRecord,
  UploadStatus,
} from "./types";

// Client
export { Client } from "./client";

// Configuration
export {
  DEFAULT_BASE_URL,
  DEFAULT_MAX_UPLOAD_BYTES,
  DEFAULT_TOKEN_PATH,
  TOKEN_PATH_ENV,
  parseTokenFile,
  readTokenFile,
  resolveClientConfig,
} from "./config";

// Errors
export type { Web3StorageErrorCode } from "./errors";
export {
  Web3StorageError,
  ConfigurationError,
  InvalidArgumentError,
  PayloadTooLargeError,
  UploadError,
  NotFoundError,
  TransportError,
} from "./errors";

// Logging
export type { LogLevel, LogMeta, Logger, LoggerOptions } from "./logger";
export { createLogger, silentLogger } from "./logger";
