// src/lib/scenario.ts
// Payout math for a single (share, FDV) combination plus the comparison grids built from it.
import { csvFromRows } from "./download";
import { roundHalfEven } from "./sliders";

/** Default token supply; every payout is derived from it. */
export const TOTAL_SUPPLY = 1_000_000_000;

export type ScenarioParams = {
  totalSupply: number;
  ogPoolPct: number;    // 0..100
  fdvBillion: number;
  cohortSize: number;   // wallets
  tierPct: number;      // 0..100
  sharePct: number;     // 0..100, slice of the OG pool going to the tier
};

export type ScenarioResult = {
  sharePct: number;
  fdvBillion: number;
  tokensPerWallet: number;
  usdValue: number;
};

export type FixedParams = Omit<ScenarioParams, "sharePct">;

export type ShareTableRow = {
  sharePct: number;
  tokensPerWallet: number;
  usdValue: number;
};

export type HeatmapCell = ScenarioResult;

/** Raised for configuration mistakes the calculator cannot paper over. */
export class ScenarioConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScenarioConfigError";
  }
}

const round2 = (x: number) => Math.round(x * 100) / 100;

function assertSupply(totalSupply: number) {
  if (!Number.isFinite(totalSupply) || totalSupply <= 0) {
    throw new ScenarioConfigError(`totalSupply must be positive (got ${totalSupply})`);
  }
}

export function computeTokenPrice(fdvBillion: number, totalSupply: number = TOTAL_SUPPLY): number {
  assertSupply(totalSupply);
  return (fdvBillion * 1_000_000_000) / totalSupply;
}

export function ogPoolTokens(totalSupply: number, ogPoolPct: number): number {
  return totalSupply * (ogPoolPct / 100);
}

/** Wallets competing inside the tier; fractional, floored at 1 so it can divide. */
export function walletsInTier(cohortSize: number, tierPct: number): number {
  return Math.max(1, cohortSize * (tierPct / 100));
}

/** Whole-wallet count for display copy. */
export function walletsInTierCount(cohortSize: number, tierPct: number): number {
  return Math.max(1, roundHalfEven(cohortSize * (tierPct / 100)));
}

export function computeScenario(p: ScenarioParams): ScenarioResult {
  const tokenPrice = computeTokenPrice(p.fdvBillion, p.totalSupply);
  const pool = ogPoolTokens(p.totalSupply, p.ogPoolPct);
  const tokensPerWallet = (pool * (p.sharePct / 100)) / walletsInTier(p.cohortSize, p.tierPct);
  return {
    sharePct: p.sharePct,
    fdvBillion: p.fdvBillion,
    tokensPerWallet,
    usdValue: tokensPerWallet * tokenPrice,
  };
}

/** One row per share, in input order; values rounded to cents for display. */
export function buildShareTable(sharePcts: Iterable<number>, fixed: FixedParams): ShareTableRow[] {
  const rows: ShareTableRow[] = [];
  for (const sharePct of sharePcts) {
    const r = computeScenario({ ...fixed, sharePct });
    rows.push({
      sharePct: r.sharePct,
      tokensPerWallet: round2(r.tokensPerWallet),
      usdValue: round2(r.usdValue),
    });
  }
  return rows;
}

/**
 * Full shares × FDV cross product, share-major. Values stay unrounded; the heatmap
 * scales its colors from them.
 */
export function buildHeatmapData(
  shareOptions: Iterable<number>,
  fdvOptions: Iterable<number>,
  fixed: Omit<FixedParams, "fdvBillion">
): HeatmapCell[] {
  const fdvs = Array.from(fdvOptions);
  const cells: HeatmapCell[] = [];
  for (const sharePct of shareOptions) {
    for (const fdvBillion of fdvs) {
      cells.push(computeScenario({ ...fixed, fdvBillion, sharePct }));
    }
  }
  return cells;
}

export function shareTableCsv(rows: ReadonlyArray<ShareTableRow>): string {
  return csvFromRows([
    ["tier_share_pct", "tokens_per_wallet", "usd"],
    ...rows.map((r) => [r.sharePct, r.tokensPerWallet, r.usdValue]),
  ]);
}
