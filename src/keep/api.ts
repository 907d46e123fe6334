/**
 * HTTP adapter for the Keep `changes` endpoint.
 *
 *   POST https://www.googleapis.com/notes/v1/changes
 *   Authorization: OAuth <access token>
 *
 * One call per sync page. A 401 means the short-lived access token expired:
 * when a refresher is configured the token is renewed and the call is sent
 * once more. Anything else propagates as KeepAuthError (401) or KeepApiError.
 */

import axios from "axios";
import { KeepApiError, KeepAuthError } from "../errors.js";
import type { ChangesApi } from "./client.js";
import { changesResponseSchema, type ChangesRequest, type ChangesResponse } from "./wire.js";

export const KEEP_API_URL = "https://www.googleapis.com/notes/v1/";

export interface KeepApiOptions {
  baseUrl?: string;
  /** Obtains a fresh access token after the current one is rejected. */
  refreshToken?: () => Promise<string>;
}

interface RawResponse {
  status: number;
  data: unknown;
}

export class KeepApi implements ChangesApi {
  private readonly baseUrl: string;
  private readonly refreshToken: (() => Promise<string>) | undefined;

  constructor(
    private accessToken: string,
    options: KeepApiOptions = {},
  ) {
    const baseUrl = options.baseUrl ?? KEEP_API_URL;
    this.baseUrl = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
    this.refreshToken = options.refreshToken;
  }

  async changes(request: ChangesRequest): Promise<ChangesResponse> {
    let { status, data } = await this.post(request);
    if (status === 401 && this.refreshToken) {
      this.accessToken = await this.refreshToken();
      ({ status, data } = await this.post(request));
    }

    if (status === 401) {
      throw new KeepAuthError("Keep rejected the access token (HTTP 401)");
    }
    if (status < 200 || status >= 300) {
      throw new KeepApiError(`Keep changes request returned HTTP ${status}`, status);
    }

    const parsed = changesResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new KeepApiError(`Keep returned an unexpected changes payload: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  private async post(request: ChangesRequest): Promise<RawResponse> {
    try {
      const response = await axios.post<unknown>(`${this.baseUrl}changes`, request, {
        headers: {
          Authorization: `OAuth ${this.accessToken}`,
          "Content-Type": "application/json",
        },
        validateStatus: () => true,
      });
      return { status: response.status, data: response.data };
    } catch (error) {
      throw new KeepApiError(
        `Keep changes request failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error },
      );
    }
  }
}
