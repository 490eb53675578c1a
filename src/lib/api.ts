// src/lib/api.ts
// Browser calls into our own /api handlers.
import { z } from "zod";
import { cohortsFromPayload, type LoadedCohort } from "./cohorts";
import { apiUrl, fetchWithRetry, readJson } from "./net";
import { parseWalletReport, type WalletReport } from "./wallet";

const DistributionsResponse = z.object({
  demoWallet: z.string().optional(),
  cohorts: z.array(z.object({ name: z.string(), rows: z.unknown() })),
});

const ErrorBody = z.object({ error: z.string() });

export class ApiError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = "ApiError";
  }
}

async function failure(res: Response): Promise<ApiError> {
  const body = ErrorBody.safeParse(await readJson(res));
  return new ApiError(body.success ? body.data.error : `HTTP ${res.status}`, res.status);
}

export async function fetchDistributions(): Promise<{ cohorts: LoadedCohort[]; demoWallet: string }> {
  const res = await fetchWithRetry(apiUrl("/api/distributions"));
  if (!res.ok) throw await failure(res);
  const parsed = DistributionsResponse.safeParse(await readJson(res));
  if (!parsed.success) throw new ApiError("Distributions endpoint returned an unexpected payload", res.status);
  return { cohorts: cohortsFromPayload(parsed.data.cohorts), demoWallet: parsed.data.demoWallet ?? "" };
}

/** Wallet report, or null when the wallet has no trades. */
export async function fetchWallet(address: string): Promise<WalletReport | null> {
  const res = await fetchWithRetry(
    apiUrl(`/api/wallet?address=${encodeURIComponent(address.trim())}`),
    {},
    // the handler polls the query service itself
    { attempts: 1, timeoutMs: 60_000 }
  );
  if (res.status === 404) return null;
  if (!res.ok) throw await failure(res);
  const report = parseWalletReport(await readJson(res));
  if (!report) throw new ApiError("Wallet endpoint returned an unexpected payload", res.status);
  return report;
}
