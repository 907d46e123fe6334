/**
 * Environment configuration.
 *
 * Entry points call dotenv first; loadConfig itself only reads the env object
 * it is given, so tests can pass their own.
 *
 * Recognized variables:
 *   GOOGLE_EMAIL, GOOGLE_MASTER_TOKEN - Keep account credentials
 *   GOOGLE_DEVICE_ID                  - Android id sent during token exchange
 *   UNSAFE_MODE                       - "true" lets tools edit notes they do not own
 *   MCP_TRANSPORT, MCP_HOST, MCP_PORT, MCP_PATH
 *   REST_API_HOST, REST_API_PORT
 *   LOG_LEVEL
 */

import { randomBytes } from "node:crypto";
import { z } from "zod";

const flag = z
  .string()
  .optional()
  .transform((value) => (value ?? "").trim().toLowerCase() === "true");

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const port = (fallback: number) => z.coerce.number().int().min(1).max(65535).default(fallback);

const envSchema = z.object({
  GOOGLE_EMAIL: optionalText,
  GOOGLE_MASTER_TOKEN: optionalText,
  GOOGLE_DEVICE_ID: z
    .string()
    .regex(/^[0-9a-fA-F]{1,16}$/, "GOOGLE_DEVICE_ID must be up to 16 hex characters")
    .optional(),
  UNSAFE_MODE: flag,
  MCP_TRANSPORT: z.enum(["http", "stdio"]).default("http"),
  MCP_HOST: z.string().min(1).default("0.0.0.0"),
  MCP_PORT: port(8000),
  MCP_PATH: z
    .string()
    .default("/mcp")
    .transform((value) => {
      const trimmed = value.trim().replace(/\/+$/, "");
      if (!trimmed) return "/mcp";
      return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
    }),
  REST_API_HOST: z.string().min(1).default("0.0.0.0"),
  REST_API_PORT: port(8001),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export interface KeepCredentials {
  email?: string;
  masterToken?: string;
  deviceId: string;
}

export interface AppConfig {
  keep: KeepCredentials;
  /** Disables the ownership-label check on update and delete. */
  unsafeMode: boolean;
  mcp: {
    transport: "http" | "stdio";
    host: string;
    port: number;
    path: string;
  };
  rest: {
    host: string;
    port: number;
  };
  logLevel: string;
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    keep: {
      email: vars.GOOGLE_EMAIL,
      masterToken: vars.GOOGLE_MASTER_TOKEN,
      deviceId: (vars.GOOGLE_DEVICE_ID ?? randomBytes(8).toString("hex")).toLowerCase(),
    },
    unsafeMode: vars.UNSAFE_MODE,
    mcp: {
      transport: vars.MCP_TRANSPORT,
      host: vars.MCP_HOST,
      port: vars.MCP_PORT,
      path: vars.MCP_PATH,
    },
    rest: {
      host: vars.REST_API_HOST,
      port: vars.REST_API_PORT,
    },
    logLevel: vars.LOG_LEVEL,
  };
}
