import { describe, it, expect, vi } from "vitest";
import { KeepApiError, KeepAuthError } from "../errors.js";
import { checkHealth } from "../health.js";
import { FakeKeepApi, connectedClient, silentLogger } from "../testing/fake-keep.js";
import type { KeepSession } from "./client.js";
import { createSessionProvider, loginWithMasterToken } from "./session.js";

describe("createSessionProvider", () => {
  it("logs in once and reuses the session", async () => {
    const client = await connectedClient(new FakeKeepApi());
    const login = vi.fn<() => Promise<KeepSession>>().mockResolvedValue(client);
    const getClient = createSessionProvider(login, silentLogger);

    const [first, second] = await Promise.all([getClient(), getClient()]);
    const third = await getClient();

    expect(login).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(third).toBe(first);
    expect(first.find("").length).toBe(client.find("").length);
  });

  it("propagates a failed login and tries again on the next call", async () => {
    const client = await connectedClient(new FakeKeepApi());
    const login = vi
      .fn<() => Promise<KeepSession>>()
      .mockRejectedValueOnce(new KeepAuthError("bad token"))
      .mockResolvedValueOnce(client);
    const getClient = createSessionProvider(login, silentLogger);

    await expect(getClient()).rejects.toThrow("bad token");
    await expect(getClient()).resolves.toBeDefined();
    expect(login).toHaveBeenCalledTimes(2);
  });

  it("drops the session when a sync is rejected as unauthorized", async () => {
    const api = new FakeKeepApi();
    const client = await connectedClient(api);
    const login = vi
      .fn<() => Promise<KeepSession>>()
      .mockResolvedValueOnce(client)
      .mockRejectedValue(new KeepAuthError("Google rejected the master token: BadAuthentication"));
    const getClient = createSessionProvider(login, silentLogger);

    const session = await getClient();
    api.failNext(new KeepAuthError("Keep rejected the access token (HTTP 401)"));
    await expect(session.sync()).rejects.toBeInstanceOf(KeepAuthError);

    const health = await checkHealth(getClient, "google-keep-mcp");
    expect(login).toHaveBeenCalledTimes(2);
    expect(health).toMatchObject({
      status: "unhealthy",
      google_keep_connected: false,
      error: "Google rejected the master token: BadAuthentication",
    });
  });

  it("logs in again after an unauthorized sync", async () => {
    const api = new FakeKeepApi();
    const stale = await connectedClient(api);
    const fresh = await connectedClient(api);
    const login = vi.fn<() => Promise<KeepSession>>().mockResolvedValueOnce(stale).mockResolvedValueOnce(fresh);
    const getClient = createSessionProvider(login, silentLogger);

    const first = await getClient();
    api.failNext(new KeepAuthError("Keep rejected the access token (HTTP 401)"));
    await expect(first.sync()).rejects.toBeInstanceOf(KeepAuthError);

    const second = await getClient();
    expect(second).not.toBe(first);
    await expect(second.sync()).resolves.toBeUndefined();
    expect(login).toHaveBeenCalledTimes(2);
  });

  it("keeps the session after other sync failures", async () => {
    const api = new FakeKeepApi();
    const client = await connectedClient(api);
    const login = vi.fn<() => Promise<KeepSession>>().mockResolvedValue(client);
    const getClient = createSessionProvider(login, silentLogger);

    const session = await getClient();
    api.failNext(new KeepApiError("Keep changes request returned HTTP 503", 503));
    await expect(session.sync()).rejects.toBeInstanceOf(KeepApiError);

    expect(await getClient()).toBe(session);
    expect(login).toHaveBeenCalledTimes(1);
  });
});

describe("loginWithMasterToken", () => {
  it("fails without credentials before any network call", async () => {
    await expect(
      loginWithMasterToken({ email: "someone@example.com", deviceId: "0123456789abcdef" }, silentLogger),
    ).rejects.toThrow("GOOGLE_EMAIL and GOOGLE_MASTER_TOKEN must be set");
  });
});
