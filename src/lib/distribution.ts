// src/lib/distribution.ts
// Percentile distribution snapshots: one row per NTILE bucket of wallet USD volume.
import { z } from "zod";
import { maybeFloat, safeFloat, safeInt } from "./safeNumber";

export type DistributionBucket = {
  wallet_count: number;
  min_total_usd: number;
  max_total_usd: number;
  usd_percentile_rank: number;
  min_total_eth?: number;
  max_total_eth?: number;
  sum_total_usd?: number;
  sum_total_eth?: number;
};

export type Distribution = ReadonlyArray<DistributionBucket>;

/** Loosely-typed source row, as found in a snapshot file before normalization. */
export type RawDistributionRow = Partial<Record<keyof DistributionBucket, unknown>>;

export type CurvePoint = {
  scenario: string;
  percentile: number;
  usd: number;
  minUsd: number;
  maxUsd: number;
};

const Envelope = z.union([
  z.array(z.unknown()),
  z.object({ result: z.object({ rows: z.array(z.unknown()).optional() }).passthrough() }).passthrough(),
]);

const OPTIONAL_COLUMNS = ["min_total_eth", "max_total_eth", "sum_total_usd", "sum_total_eth"] as const;

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

export function normalizeBucket(row: Record<string, unknown>): DistributionBucket {
  const minUsd = safeFloat(row.min_total_usd);
  const bucket: DistributionBucket = {
    wallet_count: safeInt(row.wallet_count),
    min_total_usd: minUsd,
    // a missing (or zero) ceiling collapses the bucket onto its floor
    max_total_usd: safeFloat(row.max_total_usd) || minUsd,
    usd_percentile_rank: safeFloat(row.usd_percentile_rank),
  };
  for (const key of OPTIONAL_COLUMNS) {
    const v = maybeFloat(row[key]);
    if (v !== null) bucket[key] = v;
  }
  return bucket;
}

/**
 * Accepts either a bare array of rows or a `{ result: { rows } }` query export.
 * Returns buckets sorted ascending by `usd_percentile_rank`; unknown shapes yield [].
 */
export function normalizeDistribution(payload: unknown): DistributionBucket[] {
  const parsed = Envelope.safeParse(payload);
  if (!parsed.success) return [];
  const rows = Array.isArray(parsed.data) ? parsed.data : parsed.data.result.rows ?? [];
  return rows
    .filter(isRecord)
    .map(normalizeBucket)
    .sort((a, b) => a.usd_percentile_rank - b.usd_percentile_rank);
}

/** Total wallets represented by a distribution. */
export function estimateCohortSize(rows: ReadonlyArray<RawDistributionRow>): number {
  if (!rows.length) return 0;
  return rows.reduce((sum, row) => sum + safeInt(row.wallet_count), 0);
}

/**
 * Percentile/USD points for charting. Rows without a usable percentile, or whose
 * percentile or USD ceiling is not positive, are skipped.
 */
export function extractCurvePoints(rows: ReadonlyArray<RawDistributionRow>, scenario: string): CurvePoint[] {
  const out: CurvePoint[] = [];
  for (const row of rows) {
    const percentile = maybeFloat(row.usd_percentile_rank);
    if (percentile === null) continue;
    const minUsd = safeFloat(row.min_total_usd);
    const maxUsd = safeFloat(row.max_total_usd, minUsd);
    const usd = Math.max(minUsd, maxUsd);
    if (usd <= 0 || percentile <= 0) continue;
    out.push({ scenario, percentile, usd, minUsd, maxUsd });
  }
  return out;
}
