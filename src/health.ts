import type { SessionProvider } from "./keep/session.js";

export const SERVICE_VERSION = "1.0.0";

export interface HealthReport {
  status: "healthy" | "unhealthy";
  timestamp: string;
  service: string;
  google_keep_connected: boolean;
  version: string;
  error?: string;
}

/** Healthy when a Keep session can be obtained (logging in if needed). */
export async function checkHealth(getClient: SessionProvider, service: string): Promise<HealthReport> {
  const base = {
    timestamp: new Date().toISOString(),
    service,
    version: SERVICE_VERSION,
  };

  try {
    await getClient();
    return { ...base, status: "healthy", google_keep_connected: true };
  } catch (error) {
    return {
      ...base,
      status: "unhealthy",
      google_keep_connected: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
