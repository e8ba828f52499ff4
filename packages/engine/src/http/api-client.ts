/**
 * REST client for the auxiliary endpoints: key directory, contacts
 * backup and attachment presigning.
 *
 * Every authenticated request carries `Authorization: Bearer <token>`.
 * Responses are validated with zod. `{ error, message }` bodies become
 * ProtocolError; a 401 notifies the session layer so it can run a full
 * re-authentication.
 *
 * @module http/api-client
 */
import axios, { isAxiosError } from "axios";
import type { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse } from "axios";
import { z } from "zod";
import type { Logger } from "pino";
import {
  ConnectionLostError,
  ProtocolError,
  RequestTimeoutError,
  SessionError,
} from "../errors.js";
import { accountIdString, base64String } from "../protocol/schema.js";

export const userKeysSchema = z.object({
  accountId: accountIdString,
  encPublicKey: base64String.min(1),
  signPublicKey: base64String.min(1),
  status: z.enum(["active", "banned"]),
});

export const backupPutResponseSchema = z.object({
  success: z.boolean(),
  created: z.boolean(),
  sizeBytes: z.number().int().nonnegative(),
  updatedAt: z.number().int(),
});

export const backupGetResponseSchema = z.object({
  nonce: base64String.min(1),
  ciphertext: base64String.min(1),
  sizeBytes: z.number().int().nonnegative(),
  updatedAt: z.number().int(),
});

export const presignUploadResponseSchema = z.object({
  objectKey: z.string().min(1),
  uploadUrl: z.string().url(),
  expiresAtMs: z.number().int(),
  headers: z.record(z.string()),
});

export const presignDownloadResponseSchema = z.object({
  objectKey: z.string().min(1),
  downloadUrl: z.string().url(),
  expiresAtMs: z.number().int(),
  sizeBytes: z.number().int().nonnegative(),
  contentType: z.string().min(1),
});

const apiErrorSchema = z.object({
  error: z.string().min(1),
  message: z.string(),
  retryAfter: z.number().optional(),
});

export type UserKeys = z.infer<typeof userKeysSchema>;
export type BackupPutResponse = z.infer<typeof backupPutResponseSchema>;
export type StoredBackup = z.infer<typeof backupGetResponseSchema>;
export type PresignedUpload = z.infer<typeof presignUploadResponseSchema>;
export type PresignedDownload = z.infer<typeof presignDownloadResponseSchema>;

export interface ApiClientOptions {
  baseUrl: string;
  logger: Logger;
  timeoutMs: number;
  /** Current session token, or null when not authenticated. */
  getToken: () => string | null;
  /** Called on HTTP 401 before the request fails. */
  onUnauthorized?: () => void;
  /** Replaces the HTTP adapter (in-process servers in tests). */
  adapter?: AxiosAdapter;
}

const STATUS_CODES: Record<number, string> = {
  400: "INVALID_PAYLOAD",
  403: "FORBIDDEN",
  404: "NOT_FOUND",
  409: "CONFLICT",
  413: "INVALID_PAYLOAD",
  429: "RATE_LIMITED",
};

export class ApiClient {
  private readonly client: AxiosInstance;
  /** Presigned URLs carry their own authorisation: no bearer token. */
  private readonly blobClient: AxiosInstance;
  private readonly log: Logger;

  constructor(private readonly options: ApiClientOptions) {
    this.log = options.logger.child({ module: "http" });
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: { "Content-Type": "application/json" },
      validateStatus: () => true,
      adapter: options.adapter,
    });
    this.blobClient = axios.create({
      timeout: options.timeoutMs,
      validateStatus: () => true,
      adapter: options.adapter,
    });

    this.client.interceptors.request.use((config) => {
      const token = this.options.getToken();
      if (token) {
        config.headers.Authorization = `Bearer ${token}`;
      }
      return config;
    });
  }

  // ========== Key directory ==========

  async getUserKeys(accountId: string): Promise<UserKeys> {
    const what = "GET /users/:id/keys";
    const response = await this.send(
      { method: "GET", url: `/users/${encodeURIComponent(accountId)}/keys` },
      what,
    );
    if (!isSuccess(response)) this.fail(response, what);
    return parse(userKeysSchema, response.data, what);
  }

  // ========== Contacts backup ==========

  async putContactsBackup(payload: { nonce: string; ciphertext: string }): Promise<BackupPutResponse> {
    const what = "PUT /backup/contacts";
    const response = await this.send(
      { method: "PUT", url: "/backup/contacts", data: payload },
      what,
    );
    if (!isSuccess(response)) this.fail(response, what);
    return parse(backupPutResponseSchema, response.data, what);
  }

  /** The stored backup, or null when none exists. */
  async getContactsBackup(): Promise<StoredBackup | null> {
    const what = "GET /backup/contacts";
    const response = await this.send({ method: "GET", url: "/backup/contacts" }, what);
    if (response.status === 404) return null;
    if (!isSuccess(response)) this.fail(response, what);
    return parse(backupGetResponseSchema, response.data, what);
  }

  /** Returns false when there was nothing to delete. */
  async deleteContactsBackup(): Promise<boolean> {
    const what = "DELETE /backup/contacts";
    const response = await this.send({ method: "DELETE", url: "/backup/contacts" }, what);
    if (response.status === 404) return false;
    if (!isSuccess(response)) this.fail(response, what);
    return true;
  }

  // ========== Attachments ==========

  async presignUpload(request: { contentType: string; sizeBytes: number }): Promise<PresignedUpload> {
    const what = "POST /attachments/presign/upload";
    const response = await this.send(
      { method: "POST", url: "/attachments/presign/upload", data: request },
      what,
    );
    if (!isSuccess(response)) this.fail(response, what);
    return parse(presignUploadResponseSchema, response.data, what);
  }

  async presignDownload(objectKey: string): Promise<PresignedDownload> {
    const what = "POST /attachments/presign/download";
    const response = await this.send(
      { method: "POST", url: "/attachments/presign/download", data: { objectKey } },
      what,
    );
    if (!isSuccess(response)) this.fail(response, what);
    return parse(presignDownloadResponseSchema, response.data, what);
  }

  /** PUT raw bytes to a presigned URL with the headers the server required. */
  async uploadBlob(url: string, data: Uint8Array, headers: Record<string, string>): Promise<void> {
    const what = "PUT attachment";
    const response = await this.send(
      {
        method: "PUT",
        url,
        data: Buffer.from(data.buffer, data.byteOffset, data.byteLength),
        headers,
      },
      what,
      this.blobClient,
    );
    if (!isSuccess(response)) this.fail(response, what);
  }

  async downloadBlob(url: string): Promise<Uint8Array> {
    const what = "GET attachment";
    const response = await this.send(
      { method: "GET", url, responseType: "arraybuffer" },
      what,
      this.blobClient,
    );
    if (!isSuccess(response)) this.fail(response, what);
    const body: unknown = response.data;
    if (body instanceof ArrayBuffer) return new Uint8Array(body);
    if (ArrayBuffer.isView(body)) {
      return new Uint8Array(body.buffer, body.byteOffset, body.byteLength);
    }
    throw new ProtocolError("INVALID_PAYLOAD", `${what}: expected binary body`);
  }

  // ========== Internals ==========

  private async send(
    config: AxiosRequestConfig,
    what: string,
    client: AxiosInstance = this.client,
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await client.request<unknown>(config);
    } catch (err) {
      if (isAxiosError(err)) {
        this.log.warn({ what, code: err.code }, "HTTP request failed");
        if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
          throw new RequestTimeoutError(what, this.options.timeoutMs);
        }
        throw new ConnectionLostError(`${what}: ${err.message}`);
      }
      throw err;
    }
  }

  private fail(response: AxiosResponse<unknown>, what: string): never {
    if (response.status === 401) {
      this.log.warn({ what }, "HTTP 401, session rejected");
      this.options.onUnauthorized?.();
      throw new SessionError("AUTH_FAILED", `${what}: unauthorized`);
    }
    const body = apiErrorSchema.safeParse(response.data);
    if (body.success) {
      throw new ProtocolError(body.data.error, body.data.message);
    }
    const code = STATUS_CODES[response.status] ?? "INTERNAL_ERROR";
    throw new ProtocolError(code, `${what}: HTTP ${response.status}`);
  }
}

function isSuccess(response: AxiosResponse<unknown>): boolean {
  return response.status >= 200 && response.status < 300;
}

function parse<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new ProtocolError(
      "INVALID_PAYLOAD",
      `${what}: ${first ? `${first.path.join(".")}: ${first.message}` : "invalid response"}`,
    );
  }
  return result.data;
}
