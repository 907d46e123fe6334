/**
 * Session provider: hands out the one authenticated KeepSession of the process.
 *
 * The first call logs in; concurrent callers wait on the same login. A failed
 * login is passed to every waiting caller and forgotten, so the next request
 * starts a new attempt instead of replaying the old failure. The same happens
 * when a sync of an established session fails with KeepAuthError: the session
 * is dropped and the next caller (including a health check) logs in again.
 */

import type { KeepCredentials } from "../config.js";
import { KeepAuthError } from "../errors.js";
import type { Logger } from "../logger.js";
import { KeepApi } from "./api.js";
import { exchangeMasterToken } from "./auth.js";
import { KeepClient, type KeepSession } from "./client.js";

export type SessionProvider = () => Promise<KeepSession>;

function forgetOnAuthFailure(session: KeepSession, forget: () => void): KeepSession {
  return {
    find: (query, options) => session.find(query, options),
    get: (noteId) => session.get(noteId),
    createNote: (title, text) => session.createNote(title, text),
    findLabel: (name) => session.findLabel(name),
    createLabel: (name) => session.createLabel(name),
    async sync() {
      try {
        await session.sync();
      } catch (error) {
        if (error instanceof KeepAuthError) forget();
        throw error;
      }
    },
  };
}

export function createSessionProvider(login: () => Promise<KeepSession>, logger: Logger): SessionProvider {
  let session: Promise<KeepSession> | undefined;

  return () => {
    if (!session) {
      const pending: Promise<KeepSession> = login().then(
        (established) =>
          forgetOnAuthFailure(established, () => {
            if (session !== pending) return;
            session = undefined;
            logger.warn("Keep rejected the session; logging in again on next use");
          }),
        (error: unknown) => {
          session = undefined;
          logger.error({ err: error }, "Keep login failed");
          throw error;
        },
      );
      session = pending;
    }
    return session;
  };
}

/** Exchanges the master token, then pulls the whole account into memory. */
export async function loginWithMasterToken(credentials: KeepCredentials, logger: Logger): Promise<KeepClient> {
  const { email, masterToken, deviceId } = credentials;
  if (!email || !masterToken) {
    throw new KeepAuthError("GOOGLE_EMAIL and GOOGLE_MASTER_TOKEN must be set");
  }

  logger.info({ email }, "Logging in to Google Keep");
  const exchange = () => exchangeMasterToken({ email, masterToken, deviceId });
  const accessToken = await exchange();
  const api = new KeepApi(accessToken, {
    refreshToken: () => {
      logger.info("Refreshing Keep access token");
      return exchange();
    },
  });
  const client = new KeepClient(api, logger);
  await client.sync();
  logger.info({ notes: client.all().length, labels: client.getLabels().length }, "Keep session ready");
  return client;
}
