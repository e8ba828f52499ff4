import { describe, it, expect, beforeEach, vi } from "vitest";
import { ApiClient } from "../src/http/api-client.js";
import {
  ConnectionLostError,
  ProtocolError,
  RequestTimeoutError,
  SessionError,
} from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { FakeApi } from "./helpers/fake-api.js";

const ACCOUNT = "WSP-AAAA-BBBB-CCCC";
const KEY = Buffer.alloc(32, 1).toString("base64");

describe("ApiClient", () => {
  let api: FakeApi;
  let token: string | null;
  let onUnauthorized: ReturnType<typeof vi.fn>;
  let client: ApiClient;

  beforeEach(() => {
    api = new FakeApi();
    token = "test-token";
    onUnauthorized = vi.fn();
    client = new ApiClient({
      baseUrl: "http://api.test",
      logger: silentLogger(),
      timeoutMs: 5000,
      getToken: () => token,
      onUnauthorized: () => onUnauthorized(),
      adapter: api.adapter,
    });
  });

  describe("key directory", () => {
    it("sends the bearer token and returns validated keys", async () => {
      api.on("GET", `/users/${ACCOUNT}/keys`, () => ({
        status: 200,
        data: { accountId: ACCOUNT, encPublicKey: KEY, signPublicKey: KEY, status: "active" },
      }));

      const keys = await client.getUserKeys(ACCOUNT);

      expect(keys).toEqual({ accountId: ACCOUNT, encPublicKey: KEY, signPublicKey: KEY, status: "active" });
      expect(api.requests[0]).toMatchObject({
        method: "GET",
        path: `/users/${ACCOUNT}/keys`,
        authorization: "Bearer test-token",
      });
    });

    it("omits the header without a session", async () => {
      token = null;
      api.on("GET", `/users/${ACCOUNT}/keys`, () => ({
        status: 200,
        data: { accountId: ACCOUNT, encPublicKey: KEY, signPublicKey: KEY, status: "active" },
      }));

      await client.getUserKeys(ACCOUNT);
      expect(api.requests[0]?.authorization).toBeNull();
    });

    it("rejects a response that does not match the schema", async () => {
      api.on("GET", `/users/${ACCOUNT}/keys`, () => ({
        status: 200,
        data: { accountId: ACCOUNT, encPublicKey: KEY, signPublicKey: KEY, status: "gone" },
      }));

      const err = await client.getUserKeys(ACCOUNT).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ProtocolError);
      expect(err).toMatchObject({ code: "INVALID_PAYLOAD" });
      expect(String(err)).toMatch(/GET \/users\/:id\/keys: status: /);
    });
  });

  describe("contacts backup", () => {
    it("treats a missing backup as null and a missing delete as false", async () => {
      await expect(client.getContactsBackup()).resolves.toBeNull();
      await expect(client.deleteContactsBackup()).resolves.toBe(false);
    });

    it("reports a successful delete", async () => {
      api.on("DELETE", "/backup/contacts", () => ({ status: 204 }));
      await expect(client.deleteContactsBackup()).resolves.toBe(true);
    });

    it("sends the sealed payload as JSON", async () => {
      api.on("PUT", "/backup/contacts", () => ({
        status: 200,
        data: { success: true, created: true, sizeBytes: 12, updatedAt: 1000 },
      }));

      const result = await client.putContactsBackup({ nonce: "bm9uY2U=", ciphertext: "Y3Q=" });

      expect(result).toEqual({ success: true, created: true, sizeBytes: 12, updatedAt: 1000 });
      expect(api.requests[0]?.body).toEqual({ nonce: "bm9uY2U=", ciphertext: "Y3Q=" });
    });
  });

  describe("errors", () => {
    it("notifies the session layer on 401", async () => {
      api.on("GET", "/backup/contacts", () => ({ status: 401 }));

      const err = await client.getContactsBackup().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(SessionError);
      expect(err).toMatchObject({ code: "AUTH_FAILED", retryable: false });
      expect(onUnauthorized).toHaveBeenCalledTimes(1);
    });

    it("surfaces the server's error body", async () => {
      api.on("POST", "/attachments/presign/upload", () => ({
        status: 429,
        data: { error: "RATE_LIMITED", message: "slow down", retryAfter: 5 },
      }));

      const err = await client
        .presignUpload({ contentType: "image/png", sizeBytes: 10 })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ProtocolError);
      expect(err).toMatchObject({ code: "RATE_LIMITED", message: "slow down", retryable: true });
    });

    it("maps bare status codes", async () => {
      api.on("POST", "/attachments/presign/upload", () => ({ status: 413 }));
      api.on("POST", "/attachments/presign/download", () => ({ status: 502 }));

      await expect(
        client.presignUpload({ contentType: "image/png", sizeBytes: 10 }),
      ).rejects.toMatchObject({
        code: "INVALID_PAYLOAD",
        message: "POST /attachments/presign/upload: HTTP 413",
      });
      await expect(client.presignDownload("obj-1")).rejects.toMatchObject({
        code: "INTERNAL_ERROR",
        message: "POST /attachments/presign/download: HTTP 502",
        retryable: true,
      });
    });

    it("turns network failures into transport errors", async () => {
      api.failNext = "network";
      await expect(client.getContactsBackup()).rejects.toBeInstanceOf(ConnectionLostError);

      api.failNext = "timeout";
      const err = await client.getContactsBackup().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(RequestTimeoutError);
      expect(err).toMatchObject({ message: "GET /backup/contacts timed out after 5000ms" });
    });
  });

  describe("blobs", () => {
    it("uploads to the presigned URL without the bearer token", async () => {
      api.on("PUT", "/upload/obj-1", () => ({ status: 200 }));

      await client.uploadBlob(
        "https://blobs.example.test/upload/obj-1?sig=abc",
        new Uint8Array([1, 2, 3]),
        { "Content-Type": "application/octet-stream" },
      );

      const request = api.requests[0];
      expect(request?.url).toBe("https://blobs.example.test/upload/obj-1?sig=abc");
      expect(request?.authorization).toBeNull();
      expect(request?.body).toEqual(Buffer.from([1, 2, 3]));
    });

    it("returns downloaded bytes", async () => {
      api.on("GET", "/download/obj-1", () => ({ status: 200, data: Buffer.from([9, 8, 7]) }));

      const bytes = await client.downloadBlob("https://blobs.example.test/download/obj-1");
      expect([...bytes]).toEqual([9, 8, 7]);
    });
  });
});
