/**
 * Master-token exchange against Google's Android auth endpoint.
 *
 *   POST https://android.clients.google.com/auth  (form encoded)
 *
 * The response body is `Key=Value` lines; `Auth` carries the OAuth access
 * token for the Keep scopes, `Error` the reason a token was refused.
 */

import axios from "axios";
import { KeepAuthError } from "../errors.js";

export const AUTH_URL = "https://android.clients.google.com/auth";

const KEEP_SERVICE = "oauth2:https://www.googleapis.com/auth/memento https://www.googleapis.com/auth/reminders";
const KEEP_APP = "com.google.android.keep";
const KEEP_CLIENT_SIG = "38918a453d07199354f8b19af05ec6562ced5788";

export interface MasterTokenCredentials {
  email: string;
  masterToken: string;
  deviceId: string;
}

export function parseAuthResponse(body: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of body.split("\n")) {
    const separator = line.indexOf("=");
    if (separator <= 0) continue;
    fields[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
  }
  return fields;
}

export async function exchangeMasterToken(credentials: MasterTokenCredentials): Promise<string> {
  const form = new URLSearchParams({
    accountType: "HOSTED_OR_GOOGLE",
    Email: credentials.email,
    has_permission: "1",
    Token: credentials.masterToken,
    service: KEEP_SERVICE,
    source: "android",
    androidId: credentials.deviceId,
    app: KEEP_APP,
    client_sig: KEEP_CLIENT_SIG,
    device_country: "us",
    operatorCountry: "us",
    lang: "en",
    sdk_version: "17",
    google_play_services_version: "240913000",
  });

  let body: string;
  try {
    const response = await axios.post(AUTH_URL, form.toString(), {
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        "User-Agent": "GoogleAuth/1.4",
      },
      responseType: "text",
      // Refusals arrive as 403 with an Error= line; read them instead of throwing.
      validateStatus: () => true,
    });
    body = typeof response.data === "string" ? response.data : String(response.data);
  } catch (error) {
    throw new KeepAuthError(
      `Could not reach the Google auth endpoint: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const fields = parseAuthResponse(body);
  if (!fields.Auth) {
    throw new KeepAuthError(`Google rejected the master token: ${fields.Error ?? "no Auth token returned"}`);
  }
  return fields.Auth;
}
