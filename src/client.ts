/**
 * web3.storage API client
 *
 * Uploads files, retrieves their CAR payloads and reads upload metadata.
 * Each call is a single authenticated request against the HTTP API; nothing is
 * retried or cached.
 */

import { readFile, stat } from "node:fs/promises";
import { basename } from "node:path";

import { expandHome, resolveClientConfig } from "./config";
import {
  InvalidArgumentError,
  NotFoundError,
  PayloadTooLargeError,
  TransportError,
  UploadError,
  redactToken,
} from "./errors";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import type { ClientConfig, ClientOptions, ListUploadsOptions, UploadRecord, UploadStatus } from "./types";

const DEFAULT_PAGE_SIZE = 25;

type Method = "GET" | "HEAD" | "POST";

interface RequestParams {
  query?: URLSearchParams;
  headers?: Record<string, string>;
  body?: FormData;
}

interface HttpFailure {
  status: number;
  detail: string;
}

function assertCid(cid: string): void {
  if (typeof cid !== "string" || cid.trim().length === 0) {
    throw new InvalidArgumentError("A CID is required");
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isUploadRecord(value: unknown): value is UploadRecord {
  return (
    isRecord(value) &&
    typeof value.cid === "string" &&
    typeof value.created === "string" &&
    typeof value.dagSize === "number"
  );
}

function isUploadStatus(value: unknown): value is UploadStatus {
  return (
    isRecord(value) &&
    typeof value.cid === "string" &&
    typeof value.created === "string" &&
    typeof value.dagSize === "number" &&
    Array.isArray(value.pins) &&
    Array.isArray(value.deals)
  );
}

async function readErrorMessage(response: Response): Promise<string> {
  const text = (await response.text().catch(() => "")).trim();
  if (!text) {
    return response.statusText || `HTTP ${response.status}`;
  }
  try {
    const body: unknown = JSON.parse(text);
    if (isRecord(body)) {
      if (typeof body.message === "string" && body.message) return body.message;
      if (typeof body.error === "string" && body.error) return body.error;
    }
  } catch {
    // Not JSON, use the raw text
  }
  return text;
}

export class Client {
  private readonly config: ClientConfig;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError when no token is given and the token file is missing or malformed
   */
  constructor(options: ClientOptions = {}) {
    this.config = resolveClientConfig(options);
    this.logger = options.logger ?? createLogger();
  }

  /** Access token this client authenticates with */
  get token(): string {
    return this.config.token;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Upload a local file
   *
   * @param filePath - Path of the file (a leading `~` is expanded)
   * @param filename - Display name for the upload; defaults to the file's base name
   * @returns CID of the stored content
   */
  async upload(filePath: string, filename?: string): Promise<string> {
    const fullPath = expandHome(filePath);
    let size: number;
    try {
      const stats = await stat(fullPath);
      if (!stats.isFile()) {
        throw new InvalidArgumentError(`${filePath} is not a file`);
      }
      size = stats.size;
    } catch (error) {
      if (error instanceof InvalidArgumentError) throw error;
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new InvalidArgumentError(`${filePath} does not exist`, { cause: error });
      }
      throw new InvalidArgumentError(`${filePath} could not be read`, { cause: error });
    }

    if (size > this.config.maxUploadBytes) {
      throw new PayloadTooLargeError(
        `${filePath} is ${size} bytes, larger than the ${this.config.maxUploadBytes} byte upload limit`,
      );
    }

    const name = filename ?? basename(fullPath);
    let data: Buffer;
    try {
      data = await readFile(fullPath);
    } catch (error) {
      throw new UploadError(`${filePath} could not be read`, { cause: error });
    }
    const form = new FormData();
    form.append("file", new Blob([data]), name);

    let response: Response;
    try {
      response = await this.request("POST", "/upload", {
        headers: { "X-Name": encodeURIComponent(name) },
        body: form,
      });
    } catch (error) {
      if (error instanceof TransportError) {
        throw new UploadError(error.message, { cause: error.cause });
      }
      throw error;
    }

    if (!response.ok) {
      const failure = await this.describeFailure(response, "POST", "/upload");
      if (failure.status === 413) {
        throw new PayloadTooLargeError(failure.detail, { status: failure.status });
      }
      throw new UploadError(failure.detail, { status: failure.status });
    }

    const result: unknown = await response.json().catch(() => undefined);
    if (!isRecord(result) || typeof result.cid !== "string" || result.cid.length === 0) {
      throw new UploadError("Upload response did not include a CID", { status: response.status });
    }
    this.logger.info(`Uploaded ${name}`, { cid: result.cid, size });
    return result.cid;
  }

  /**
   * Retrieve the CAR payload stored under a CID
   *
   * @returns The response body bytes, untouched
   */
  async retrieve(cid: string): Promise<Uint8Array> {
    assertCid(cid);
    const path = `/car/${encodeURIComponent(cid)}`;
    const response = await this.request("GET", path);
    await this.ensureOk(response, "GET", path);
    return new Uint8Array(await response.arrayBuffer());
  }

  /**
   * Get storage status for a CID: creation date, size, pins and Filecoin deals
   */
  async metadata(cid: string): Promise<UploadStatus> {
    assertCid(cid);
    const path = `/status/${encodeURIComponent(cid)}`;
    const response = await this.request("GET", path);
    await this.ensureOk(response, "GET", path);
    const body: unknown = await response.json().catch(() => undefined);
    if (!isUploadStatus(body)) {
      throw new TransportError(`GET ${path} returned an unexpected body`, { status: response.status });
    }
    return body;
  }

  /**
   * Dry run of `retrieve`: returns the response headers of HEAD /car/{cid}
   * without downloading the payload.
   *
   * @returns Header names (lower-cased) mapped to their values
   */
  async httpHeader(cid: string): Promise<Record<string, string>> {
    assertCid(cid);
    const path = `/car/${encodeURIComponent(cid)}`;
    const response = await this.request("HEAD", path);
    await this.ensureOk(response, "HEAD", path);
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });
    return headers;
  }

  /**
   * List uploads for the account (not only the token in use), newest first.
   *
   * Pass the `created` date of the oldest record as `before` to fetch the next page,
   * or use `allUserUploads` to walk every page.
   */
  async userUploads(options: ListUploadsOptions = {}): Promise<UploadRecord[]> {
    const query = new URLSearchParams();
    if (options.before !== undefined) {
      query.set("before", options.before instanceof Date ? options.before.toISOString() : options.before);
    }
    if (options.size !== undefined) {
      if (!Number.isSafeInteger(options.size) || options.size <= 0) {
        throw new InvalidArgumentError("size must be a positive integer");
      }
      query.set("size", String(options.size));
    }

    const path = "/user/uploads";
    const response = await this.request("GET", path, { query });
    await this.ensureOk(response, "GET", path);
    const body: unknown = await response.json().catch(() => undefined);
    if (!Array.isArray(body) || !body.every(isUploadRecord)) {
      throw new TransportError(`GET ${path} returned an unexpected body`, { status: response.status });
    }
    return body;
  }

  /**
   * Iterate over every upload of the account, fetching pages of `size` records.
   */
  async *allUserUploads(options: ListUploadsOptions = {}): AsyncGenerator<UploadRecord, void, undefined> {
    const size = options.size ?? DEFAULT_PAGE_SIZE;
    let before = options.before instanceof Date ? options.before.toISOString() : options.before;
    for (;;) {
      const page = await this.userUploads({ before, size });
      yield* page;
      if (page.length < size) return;
      const next = page[page.length - 1].created;
      if (next === before) return;
      before = next;
    }
  }

  private async request(method: Method, path: string, init: RequestParams = {}): Promise<Response> {
    const query = init.query?.toString();
    const url = `${this.config.baseUrl}${path}${query ? `?${query}` : ""}`;
    this.logger.debug(`${method} ${path}${query ? `?${query}` : ""}`);
    try {
      return await fetch(url, {
        method,
        headers: {
          ...init.headers,
          Authorization: `Bearer ${this.config.token}`,
        },
        body: init.body,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const message = redactToken(`${method} ${path} failed: ${reason}`, this.config.token);
      this.logger.warn(message);
      throw new TransportError(message, { cause: error });
    }
  }

  private async describeFailure(response: Response, method: Method, path: string): Promise<HttpFailure> {
    const message = redactToken(await readErrorMessage(response), this.config.token);
    const detail = `${method} ${path} failed with ${response.status}: ${message}`;
    this.logger.warn(detail);
    return { status: response.status, detail };
  }

  private async ensureOk(response: Response, method: Method, path: string): Promise<void> {
    if (response.ok) return;
    const failure = await this.describeFailure(response, method, path);
    if (failure.status === 404) {
      throw new NotFoundError(failure.detail, { status: failure.status });
    }
    throw new TransportError(failure.detail, { status: failure.status });
  }
}
