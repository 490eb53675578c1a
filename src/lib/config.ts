// src/lib/config.ts
import { z } from "zod";

export { TOTAL_SUPPLY } from "./scenario";

export const DEFAULT_REVEAL_DURATION_S = 6;
export const DEFAULT_SHARE_OPTIONS = [20, 30, 40];
export const SHARE_CHOICES = [10, 15, 20, 25, 30, 35, 40, 45, 50];
export const DEFAULT_FDV_SENSITIVITY = [3.0, 4.0, 5.0];
export const FDV_SENSITIVITY_CHOICES = [3.0, 3.5, 4.0, 4.5, 5.0, 5.5, 6.0];
export const FDV_CHOICES = [2, 3, 4, 5, 6, 7];
export const OG_POOL_RANGE = { min: 10, max: 25, step: 1 } as const;

const optionalString = z
  .string()
  .optional()
  .transform((s) => (s && s.trim() ? s.trim() : undefined));

const ServerEnvSchema = z.object({
  DUNE_API_KEY: optionalString,
  DUNE_QUERY_WALLET_STATS_ID: z.coerce.number().int().positive().default(5850749),
  SHARE_SERVICE_URL: z.string().default("http://127.0.0.1:4076"),
  SHARE_PUBLIC_BASE: optionalString,
  BASE_URL: optionalString,
  DATA_DIR: optionalString,
  ALLOWED_ORIGINS: optionalString,
  DEMO_WALLET: z.string().default(""),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export type ServerConfig = {
  duneApiKey?: string;
  duneQueryId: number;
  shareServiceUrl: string;
  sharePublicBase?: string;
  dataDir?: string;
  allowedOrigins?: string;
  demoWallet: string;
  logLevel: ServerEnv["LOG_LEVEL"];
};

/**
 * Parse server-side settings from an env record (normally `process.env`).
 * `SHARE_PUBLIC_BASE` falls back to `BASE_URL`.
 */
export function parseServerConfig(env: Record<string, string | undefined>): ServerConfig {
  const parsed = ServerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid server configuration: ${detail}`);
  }
  const e = parsed.data;
  return {
    duneApiKey: e.DUNE_API_KEY,
    duneQueryId: e.DUNE_QUERY_WALLET_STATS_ID,
    shareServiceUrl: e.SHARE_SERVICE_URL,
    sharePublicBase: e.SHARE_PUBLIC_BASE ?? e.BASE_URL,
    dataDir: e.DATA_DIR,
    allowedOrigins: e.ALLOWED_ORIGINS,
    demoWallet: e.DEMO_WALLET,
    logLevel: e.LOG_LEVEL,
  };
}

const ClientEnvSchema = z.object({
  VITE_API_ORIGIN: optionalString,
  VITE_DEMO_WALLET: optionalString,
});

export type ClientConfig = { apiOrigin: string; demoWallet: string };

/** Browser settings from `import.meta.env`; unknown or malformed values fall back to same-origin. */
export function parseClientConfig(env: Record<string, unknown> | undefined): ClientConfig {
  const parsed = ClientEnvSchema.safeParse(env ?? {});
  if (!parsed.success) return { apiOrigin: "", demoWallet: "" };
  return { apiOrigin: parsed.data.VITE_API_ORIGIN ?? "", demoWallet: parsed.data.VITE_DEMO_WALLET ?? "" };
}
