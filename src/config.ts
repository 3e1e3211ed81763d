/**
 * Token file parsing and client configuration.
 *
 * The token file holds a line of the form `ACCESS_TOKEN: <token>`:
 *
 *   echo 'ACCESS_TOKEN: put_token_here' > ~/.web3_storage_token
 */

import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { ConfigurationError } from "./errors";
import type { ClientConfig, ClientOptions } from "./types";

export const DEFAULT_BASE_URL = "https://api.web3.storage";
export const DEFAULT_TOKEN_PATH = "~/.web3_storage_token";
export const TOKEN_PATH_ENV = "ACCESS_TOKEN";
export const TOKEN_KEY = "ACCESS_TOKEN";
/** 100 MiB, the service's limit for a single upload request */
export const DEFAULT_MAX_UPLOAD_BYTES = 100 * 1024 * 1024;

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Extract the access token from token file contents.
 * Lines without a `:` and keys other than ACCESS_TOKEN are ignored.
 */
export function parseTokenFile(contents: string): string {
  let token: string | undefined;
  for (const line of contents.split(/\r?\n/)) {
    const sep = line.indexOf(":");
    if (sep === -1) continue;
    const key = line.slice(0, sep).trim();
    if (key === TOKEN_KEY) {
      token = line.slice(sep + 1).trim();
    }
  }
  if (!token) {
    throw new ConfigurationError(`Token file has no ${TOKEN_KEY} entry`);
  }
  return token;
}

export function readTokenFile(path: string): string {
  const fullPath = expandHome(path);
  let contents: string;
  try {
    contents = readFileSync(fullPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ConfigurationError(`Token file ${path} does not exist`, { cause: error });
    }
    throw new ConfigurationError(`Could not read token file ${path}`, { cause: error });
  }
  return parseTokenFile(contents);
}

function resolveToken(options: ClientOptions, env: NodeJS.ProcessEnv): string {
  if (options.token !== undefined) {
    const token = options.token.trim();
    if (!token) throw new ConfigurationError("Access token is empty");
    return token;
  }
  const envPath = env[TOKEN_PATH_ENV];
  const path = options.tokenPath ?? (envPath ? envPath : DEFAULT_TOKEN_PATH);
  return readTokenFile(path);
}

function resolveBaseUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new ConfigurationError(`Invalid base URL: ${raw}`, { cause: error });
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ConfigurationError(`Base URL must be http(s): ${raw}`);
  }
  return raw.replace(/\/+$/, "");
}

/**
 * Resolve client options into the immutable per-client config.
 *
 * Token precedence: `token`, then `tokenPath`, then the file named by $ACCESS_TOKEN,
 * then ~/.web3_storage_token.
 */
export function resolveClientConfig(options: ClientOptions = {}, env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const maxUploadBytes = options.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
  if (!Number.isSafeInteger(maxUploadBytes) || maxUploadBytes <= 0) {
    throw new ConfigurationError("maxUploadBytes must be a positive integer");
  }
  return Object.freeze({
    token: resolveToken(options, env),
    baseUrl: resolveBaseUrl(options.baseUrl ?? DEFAULT_BASE_URL),
    maxUploadBytes,
  });
}
