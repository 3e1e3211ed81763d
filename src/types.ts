/**
 * Core types for the web3.storage client.
 *
 * Response records are passed through as the service returns them; only the
 * fields the client relies on are typed.
 */

import type { Logger } from "./logger";

/** Pin of a CID on an IPFS peer */
export interface Pin {
  peerId: string;
  peerName?: string;
  region?: string;
  status: string;
  updated?: string;
}

/** Filecoin storage deal for an upload */
export interface Deal {
  dealId?: number;
  storageProvider?: string;
  status: string;
  pieceCid?: string;
  dataCid?: string;
  dataModelSelector?: string;
  activation?: string;
  created?: string;
  updated?: string;
}

/**
 * Entry of GET /user/uploads
 */
export interface UploadRecord {
  cid: string;
  name?: string;
  dagSize: number;
  created: string;
  updated?: string;
  type?: string;
  pins?: Pin[];
  deals?: Deal[];
  [key: string]: unknown;
}

/**
 * Response of GET /status/{cid}
 */
export interface UploadStatus {
  cid: string;
  dagSize: number;
  created: string;
  pins: Pin[];
  deals: Deal[];
  [key: string]: unknown;
}

export interface ClientOptions {
  /** Access token; when omitted it is read from the token file */
  token?: string;
  /** Token file path (overrides $ACCESS_TOKEN and ~/.web3_storage_token) */
  tokenPath?: string;
  /** Base URL of the web3.storage API */
  baseUrl?: string;
  /** Largest file `upload` accepts, in bytes */
  maxUploadBytes?: number;
  logger?: Logger;
}

/** Immutable configuration owned by one client instance */
export interface ClientConfig {
  readonly token: string;
  readonly baseUrl: string;
  readonly maxUploadBytes: number;
}

export interface ListUploadsOptions {
  /** Only return uploads created before this time */
  before?: string | Date;
  /** Page size */
  size?: number;
}
