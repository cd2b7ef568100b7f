import { createWriteStream } from "node:fs";
import { basename, join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import { Value } from "@sinclair/typebox/value";

import { CzdsApiError } from "../errors.js";
import { czdsLogger } from "../logger.js";
import { AuthResponseSchema, DownloadLinksSchema } from "./types.js";

import type { ZoneFileSource } from "./types.js";
import type { CzdsConfig } from "../config.js";

async function timedFetch(url: string, init?: RequestInit): Promise<Response> {
  const method = init?.method ?? "GET";
  czdsLogger.debug({ method, url }, "Sending request to CZDS");

  const startTime = performance.now();
  const response = await fetch(url, init);
  const duration = Math.round(performance.now() - startTime);

  czdsLogger.debug(
    {
      method,
      url,
      status: response.status,
      statusText: response.statusText,
      duration: `${String(duration)}ms`,
    },
    "Received response from CZDS"
  );

  return response;
}

function decodePercent(text: string): string {
  try {
    return decodeURIComponent(text);
  } catch {
    // Not percent-encoded after all
    return text;
  }
}

/**
 * File name from a Content-Disposition header, reduced to its base name.
 * Returns null when the header carries none.
 */
export function fileNameFromDisposition(header: string | null): string | null {
  if (header === null) {
    return null;
  }
  const match = /filename\*?=(?:UTF-8'')?"?([^";]+)"?/i.exec(header);
  const raw = match?.[1]?.trim();
  if (raw === undefined || raw === "") {
    return null;
  }
  const name = basename(decodePercent(raw));
  return name === "" || name === "." || name === ".." ? null : name;
}

function fileNameFromUrl(url: string): string {
  const segment = new URL(url).pathname.replace(/\/+$/, "").split("/").pop();
  return segment !== undefined && segment !== "" ? segment : "zone";
}

// ============================================================================
// CZDS Client
// ============================================================================

/**
 * Client for ICANN's Centralized Zone Data Service: one account token,
 * refreshed once when a request comes back 401.
 */
export class CzdsClient implements ZoneFileSource {
  private accessToken: string | null = null;

  constructor(private config: CzdsConfig) {}

  /**
   * Exchange the account credentials for an access token
   */
  async authenticate(): Promise<string> {
    const url = `${this.config.authUrl}/api/authenticate`;
    czdsLogger.info(
      { url, username: this.config.credentials.username },
      "Authenticating with CZDS"
    );

    const response = await timedFetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: JSON.stringify({
        username: this.config.credentials.username,
        password: this.config.credentials.password,
      }),
    });

    if (!response.ok) {
      czdsLogger.error(
        { status: response.status, statusText: response.statusText },
        "CZDS authentication failed"
      );
      throw new CzdsApiError(
        `Authentication failed: ${String(response.status)} ${response.statusText}`,
        url,
        response.status
      );
    }

    const body: unknown = await response.json();
    if (!Value.Check(AuthResponseSchema, body)) {
      throw new CzdsApiError(
        "Authentication response has no access token",
        url,
        response.status
      );
    }

    this.accessToken = body.accessToken;
    return body.accessToken;
  }

  private async authorizedFetch(url: string): Promise<Response> {
    const token = this.accessToken ?? (await this.authenticate());
    const response = await timedFetch(url, {
      headers: { Authorization: `Bearer ${token}` },
    });

    if (response.status !== 401) {
      return response;
    }

    czdsLogger.warn({ url }, "Access token rejected, re-authenticating");
    await response.body?.cancel();
    const freshToken = await this.authenticate();
    return timedFetch(url, {
      headers: { Authorization: `Bearer ${freshToken}` },
    });
  }

  /**
   * Fetch the URLs of all zone files approved for this account
   */
  async listApproved(): Promise<string[]> {
    const url = `${this.config.apiUrl}/czds/downloads/links`;
    czdsLogger.info({ url }, "Fetching approved zone file links");

    const response = await this.authorizedFetch(url);
    if (!response.ok) {
      czdsLogger.error(
        { status: response.status, statusText: response.statusText },
        "Failed to fetch zone file links"
      );
      throw new CzdsApiError(
        `Failed to list zone files: ${String(response.status)} ${response.statusText}`,
        url,
        response.status
      );
    }

    const body: unknown = await response.json();
    if (!Value.Check(DownloadLinksSchema, body)) {
      throw new CzdsApiError(
        "Zone file links response is not a list of URLs",
        url,
        response.status
      );
    }

    czdsLogger.debug({ count: body.length }, "Fetched zone file links");
    return body;
  }

  /**
   * Stream one zone file to disk
   */
  async download(url: string, destDir: string): Promise<string> {
    czdsLogger.info({ url }, "Downloading zone file");

    const response = await this.authorizedFetch(url);
    if (!response.ok) {
      czdsLogger.error(
        { url, status: response.status, statusText: response.statusText },
        "Failed to download zone file"
      );
      throw new CzdsApiError(
        `Failed to download ${url}: ${String(response.status)} ${response.statusText}`,
        url,
        response.status
      );
    }
    if (response.body === null) {
      throw new CzdsApiError(
        `Empty response body for ${url}`,
        url,
        response.status
      );
    }

    const fileName =
      fileNameFromDisposition(response.headers.get("content-disposition")) ??
      fileNameFromUrl(url);
    const path = join(destDir, fileName);

    await pipeline(Readable.fromWeb(response.body), createWriteStream(path));

    czdsLogger.debug({ url, path }, "Zone file written");
    return path;
  }
}
