import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.keep.email).toBeUndefined();
    expect(config.keep.masterToken).toBeUndefined();
    expect(config.keep.deviceId).toMatch(/^[0-9a-f]{16}$/);
    expect(config.unsafeMode).toBe(false);
    expect(config.mcp).toEqual({ transport: "http", host: "0.0.0.0", port: 8000, path: "/mcp" });
    expect(config.rest).toEqual({ host: "0.0.0.0", port: 8001 });
    expect(config.logLevel).toBe("info");
  });

  it("reads credentials and trims blank values away", () => {
    const config = loadConfig({
      GOOGLE_EMAIL: " someone@example.com ",
      GOOGLE_MASTER_TOKEN: "   ",
      GOOGLE_DEVICE_ID: "ABCDEF0123",
    });

    expect(config.keep.email).toBe("someone@example.com");
    expect(config.keep.masterToken).toBeUndefined();
    expect(config.keep.deviceId).toBe("abcdef0123");
  });

  it.each([
    ["true", true],
    ["TRUE", true],
    ["1", false],
    ["false", false],
    ["yes", false],
    ["", false],
  ])("treats UNSAFE_MODE=%j as %s", (value, expected) => {
    expect(loadConfig({ UNSAFE_MODE: value }).unsafeMode).toBe(expected);
  });

  it("coerces ports and normalizes the MCP path", () => {
    const config = loadConfig({
      MCP_PORT: "9000",
      REST_API_PORT: "9001",
      MCP_PATH: "api/mcp/",
      MCP_TRANSPORT: "stdio",
    });

    expect(config.mcp.port).toBe(9000);
    expect(config.rest.port).toBe(9001);
    expect(config.mcp.path).toBe("/api/mcp");
    expect(config.mcp.transport).toBe("stdio");
  });

  it("rejects an invalid port with the variable name in the message", () => {
    expect(() => loadConfig({ MCP_PORT: "abc" })).toThrow(ConfigError);
    expect(() => loadConfig({ MCP_PORT: "abc" })).toThrow(/MCP_PORT/);
  });

  it("rejects an unknown transport", () => {
    expect(() => loadConfig({ MCP_TRANSPORT: "sse" })).toThrow(/MCP_TRANSPORT/);
  });
});
