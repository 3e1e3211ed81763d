/**
 * In-memory stand-in for the web3.storage HTTP API, served through msw.
 */

import { http, HttpResponse } from "msw";

import type { UploadRecord, UploadStatus } from "../types";

export const TEST_BASE_URL = "https://api.w3s.test";
export const TEST_TOKEN = "test-token";

interface StoredUpload {
  record: UploadRecord;
  bytes: ArrayBuffer;
}

export class FakeStorageService {
  readonly uploads = new Map<string, StoredUpload>();
  requestCount = 0;
  private seq = 0;

  reset(): void {
    this.uploads.clear();
    this.requestCount = 0;
    this.seq = 0;
  }

  private authorize(request: Request): Response | undefined {
    this.requestCount++;
    if (request.headers.get("authorization") !== `Bearer ${TEST_TOKEN}`) {
      return HttpResponse.json({ name: "Unauthorized", message: "Unauthorized" }, { status: 401 });
    }
    return undefined;
  }

  private notFound(cid: string): Response {
    return HttpResponse.json({ name: "HTTPError", message: `No upload for ${cid}` }, { status: 404 });
  }

  readonly handlers = [
    http.post(`${TEST_BASE_URL}/upload`, async ({ request }) => {
      const denied = this.authorize(request);
      if (denied) return denied;

      const form = await request.formData();
      const file = form.get("file");
      if (file === null || typeof file === "string") {
        return HttpResponse.json({ name: "HTTPError", message: "missing file" }, { status: 400 });
      }

      this.seq++;
      const cid = `bafytest${this.seq}`;
      const bytes = await file.arrayBuffer();
      const header = request.headers.get("x-name");
      this.uploads.set(cid, {
        bytes,
        record: {
          cid,
          name: header ? decodeURIComponent(header) : file.name,
          dagSize: bytes.byteLength,
          created: new Date(Date.UTC(2024, 0, 1) + this.seq * 1000).toISOString(),
          pins: [],
          deals: [],
        },
      });
      return HttpResponse.json({ cid });
    }),

    http.get<{ cid: string }>(`${TEST_BASE_URL}/car/:cid`, ({ request, params }) => {
      const denied = this.authorize(request);
      if (denied) return denied;
      const stored = this.uploads.get(params.cid);
      if (!stored) return this.notFound(params.cid);
      return new HttpResponse(stored.bytes, {
        headers: { "content-type": "application/vnd.ipld.car", etag: `"${params.cid}"` },
      });
    }),

    http.head<{ cid: string }>(`${TEST_BASE_URL}/car/:cid`, ({ request, params }) => {
      const denied = this.authorize(request);
      if (denied) return denied;
      if (!this.uploads.has(params.cid)) {
        return new HttpResponse(null, { status: 404 });
      }
      return new HttpResponse(null, {
        headers: { "content-type": "application/vnd.ipld.car", etag: `"${params.cid}"` },
      });
    }),

    http.get<{ cid: string }>(`${TEST_BASE_URL}/status/:cid`, ({ request, params }) => {
      const denied = this.authorize(request);
      if (denied) return denied;
      const stored = this.uploads.get(params.cid);
      if (!stored) return this.notFound(params.cid);
      const status: UploadStatus = {
        cid: stored.record.cid,
        dagSize: stored.record.dagSize,
        created: stored.record.created,
        pins: [{ peerId: "12D3KooWtest", peerName: "test-peer", region: "test", status: "Pinned" }],
        deals: [],
      };
      return HttpResponse.json(status);
    }),

    http.get(`${TEST_BASE_URL}/user/uploads`, ({ request }) => {
      const denied = this.authorize(request);
      if (denied) return denied;
      const url = new URL(request.url);
      const before = url.searchParams.get("before");
      const size = Number(url.searchParams.get("size") ?? "25");
      const records = [...this.uploads.values()]
        .map((u) => u.record)
        .filter((r) => before === null || r.created < before)
        .sort((a, b) => (a.created < b.created ? 1 : -1))
        .slice(0, size);
      return HttpResponse.json(records);
    }),
  ];
}
