// src/lib/dune.ts
// Wallet history via the Dune API: start a query execution, then poll for its rows.
import { z } from "zod";
import { fetchWithRetry, readJson, type RetryConfig } from "./net";
import { createLogger } from "./logger";
import { WalletReportSchema, type WalletReport } from "./wallet";

export const DUNE_API_BASE = "https://api.dune.com/api/v1";

export class WalletLookupError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "WalletLookupError";
  }
}

export type DuneClientConfig = {
  apiKey?: string;
  queryId: number;
  baseUrl?: string;
  pollAttempts?: number;   // default 15
  pollIntervalMs?: number; // default 1000
  retry?: RetryConfig;
  sleep?: (ms: number) => Promise<void>;
};

const ExecuteResponse = z.object({ execution_id: z.string().optional() }).passthrough();

const ResultsResponse = z
  .object({
    state: z.string().optional(),
    message: z.string().optional(),
    error: z.string().optional(),
    result: z.object({ rows: z.array(z.record(z.unknown())).optional() }).passthrough().optional(),
  })
  .passthrough();

const TERMINAL_FAILURES = new Set(["QUERY_STATE_FAILED", "QUERY_STATE_CANCELLED"]);

const log = createLogger("dune");

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/** Split section-tagged rows into the report shape the dashboard reads. */
export function reportFromRows(rows: ReadonlyArray<Record<string, unknown>>): WalletReport {
  if (!rows.length) return {};
  const candidate = {
    summary: rows.find((r) => r.section === "summary") ?? null,
    buyer_seller: rows.filter((r) => r.section === "buyer_seller"),
    collections: rows.filter((r) => r.section === "collection"),
  };
  const parsed = WalletReportSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new WalletLookupError("Wallet stats query returned rows in an unexpected shape");
  }
  return parsed.data;
}

export async function fetchWalletReport(address: string, cfg: DuneClientConfig): Promise<WalletReport> {
  if (!cfg.apiKey) throw new WalletLookupError("DUNE_API_KEY not configured");

  const base = (cfg.baseUrl ?? DUNE_API_BASE).replace(/\/+$/, "");
  const retry: RetryConfig = { timeoutMs: 30_000, ...cfg.retry };
  const sleep = cfg.sleep ?? defaultSleep;
  const pollAttempts = cfg.pollAttempts ?? 15;
  const pollIntervalMs = cfg.pollIntervalMs ?? 1000;

  const execRes = await fetchWithRetry(
    `${base}/query/${cfg.queryId}/execute`,
    {
      method: "POST",
      headers: { "X-Dune-API-Key": cfg.apiKey, "Content-Type": "application/json" },
      body: JSON.stringify({ query_parameters: { wallet: address } }),
    },
    // each POST starts a new execution
    { ...retry, attempts: 1 }
  );
  if (!execRes.ok) {
    throw new WalletLookupError(`Dune execute failed (HTTP ${execRes.status})`, execRes.status);
  }
  const exec = ExecuteResponse.safeParse(await readJson(execRes));
  const executionId = exec.success ? exec.data.execution_id : undefined;
  if (!executionId) throw new WalletLookupError("Failed to start Dune execution");
  log.debug(`execution ${executionId} started for ${address}`);

  const resultUrl = `${base}/execution/${executionId}/results`;
  for (let i = 0; i < pollAttempts; i++) {
    const res = await fetchWithRetry(resultUrl, { headers: { "X-Dune-API-Key": cfg.apiKey } }, retry);
    if (!res.ok) {
      throw new WalletLookupError(`Dune results failed (HTTP ${res.status})`, res.status);
    }
    const parsed = ResultsResponse.safeParse(await readJson(res));
    if (!parsed.success) throw new WalletLookupError("Dune returned an unreadable results payload");
    const { state, message, error, result } = parsed.data;

    if (state === "QUERY_STATE_COMPLETED") {
      return reportFromRows(result?.rows ?? []);
    }
    if (state && TERMINAL_FAILURES.has(state)) {
      throw new WalletLookupError(message || error || "Execution failed");
    }
    if (i < pollAttempts - 1) await sleep(pollIntervalMs);
  }

  throw new WalletLookupError("Timed out waiting for Dune execution");
}
