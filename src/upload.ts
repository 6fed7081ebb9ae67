// ── Google Drive upload ──────────────────────────────────────────────────────
//
// Uploads the finished overlay to Google Drive, where Google My Maps and
// Google Earth can import it. Authentication uses a stored "authorized_user"
// credential (client id, client secret and refresh token), the same JSON that
// Google's own client libraries write:
//
//   {"type":"authorized_user","client_id":"…","client_secret":"…","refresh_token":"…"}
//
// Each upload exchanges the refresh token for a short-lived access token and
// sends one multipart request. No retries.

import * as fs from "node:fs";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { UploadError, describeError } from "./errors.js";
import { KML_MIME_TYPE } from "./kml-writer.js";

// ── Types ────────────────────────────────────────────────────────────────────

/** Identifier the remote storage assigned to the uploaded file. */
export type RemoteId = string;

export interface Uploader {
  /** @throws {UploadError} */
  upload(filePath: string, name: string): Promise<RemoteId>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface DriveUploaderOptions {
  /** Path of the authorized_user credential file. */
  credentialsPath: string;
  /** Defaults to the global fetch. */
  fetch?: FetchLike;
  /** Per-request timeout. */
  timeoutMs?: number;
}

// ── Constants ────────────────────────────────────────────────────────────────

const TOKEN_URL = "https://oauth2.googleapis.com/token";
const UPLOAD_URL = "https://www.googleapis.com/upload/drive/v3/files?uploadType=multipart&fields=id";
const REQUEST_TIMEOUT_MS = 30_000;

const credentialsSchema = z.object({
  type: z.literal("authorized_user").optional(),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
});

export type DriveCredentials = z.infer<typeof credentialsSchema>;

const tokenResponseSchema = z.object({ access_token: z.string().min(1) });
const fileResponseSchema = z.object({ id: z.string().min(1) });

// ── Helpers ──────────────────────────────────────────────────────────────────

/**
 * Read and validate the stored credential.
 *
 * @throws {UploadError} when the file is missing or not an authorized_user credential
 */
export function loadCredentials(credentialsPath: string): DriveCredentials {
  let raw: string;
  try {
    raw = fs.readFileSync(credentialsPath, "utf8");
  } catch (err) {
    throw new UploadError(
      `Cannot read upload credentials at ${credentialsPath}: ${describeError(err)}. ` +
        "Save an authorized_user JSON (client_id, client_secret, refresh_token) there, or pass --credentials.",
      credentialsPath,
      { cause: err },
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new UploadError(`Upload credentials at ${credentialsPath} are not valid JSON`, credentialsPath, {
      cause: err,
    });
  }

  const parsed = credentialsSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new UploadError(`Upload credentials at ${credentialsPath} are incomplete (${fields})`, credentialsPath, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Build a multipart/related body: JSON metadata part, then the file part. */
export function buildMultipartBody(
  boundary: string,
  metadata: Record<string, string>,
  content: string,
  contentType: string,
): string {
  return (
    `--${boundary}\r\n` +
    "Content-Type: application/json; charset=UTF-8\r\n\r\n" +
    `${JSON.stringify(metadata)}\r\n` +
    `--${boundary}\r\n` +
    `Content-Type: ${contentType}\r\n\r\n` +
    `${content}\r\n` +
    `--${boundary}--\r\n`
  );
}

// ── Drive uploader ───────────────────────────────────────────────────────────

export class DriveUploader implements Uploader {
  private readonly credentialsPath: string;
  private readonly fetch: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: DriveUploaderOptions) {
    this.credentialsPath = options.credentialsPath;
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async upload(filePath: string, name: string): Promise<RemoteId> {
    let content: string;
    try {
      content = fs.readFileSync(filePath, "utf8");
    } catch (err) {
      throw new UploadError(`Cannot read ${filePath} for upload: ${describeError(err)}`, filePath, { cause: err });
    }

    const credentials = loadCredentials(this.credentialsPath);
    const accessToken = await this.refreshAccessToken(credentials);

    const boundary = `route-highlighter-${randomUUID()}`;
    const body = buildMultipartBody(boundary, { name, mimeType: KML_MIME_TYPE }, content, KML_MIME_TYPE);
    const json = await this.requestJson(
      UPLOAD_URL,
      {
        method: "POST",
        headers: {
          Authorization: `Bearer ${accessToken}`,
          "Content-Type": `multipart/related; boundary=${boundary}`,
        },
        body,
      },
      filePath,
      "Drive upload",
    );

    const parsed = fileResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new UploadError(`Drive upload of ${filePath} returned no file id`, filePath, { cause: parsed.error });
    }
    return parsed.data.id;
  }

  private async refreshAccessToken(credentials: DriveCredentials): Promise<string> {
    const json = await this.requestJson(
      TOKEN_URL,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          grant_type: "refresh_token",
          client_id: credentials.client_id,
          client_secret: credentials.client_secret,
          refresh_token: credentials.refresh_token,
        }).toString(),
      },
      this.credentialsPath,
      "Token refresh",
    );

    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new UploadError("Token refresh returned no access token", this.credentialsPath, { cause: parsed.error });
    }
    return parsed.data.access_token;
  }

  /** Send a request with a timeout and decode a JSON response; every failure is an UploadError about `subject`. */
  private async requestJson(url: string, init: RequestInit, subject: string, what: string): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    let res: Response;
    try {
      res = await this.fetch(url, { ...init, signal: controller.signal });
    } catch (err) {
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs} ms` : describeError(err);
      throw new UploadError(`${what} failed: ${reason}`, subject, { cause: err });
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      const detail = (await res.text().catch(() => "")).trim().slice(0, 200);
      throw new UploadError(`${what} failed with HTTP ${res.status}${detail ? `: ${detail}` : ""}`, subject, {
        status: res.status,
      });
    }

    try {
      return await res.json();
    } catch (err) {
      throw new UploadError(`${what} returned a response that is not JSON`, subject, { cause: err });
    }
  }
}
