import { describe, expect, it } from "vitest";
import {
  ScenarioConfigError,
  TOTAL_SUPPLY,
  buildHeatmapData,
  buildShareTable,
  computeScenario,
  computeTokenPrice,
  ogPoolTokens,
  shareTableCsv,
  walletsInTier,
  walletsInTierCount,
  type ScenarioParams,
} from "./scenario";

const base: ScenarioParams = {
  totalSupply: TOTAL_SUPPLY,
  ogPoolPct: 15,
  fdvBillion: 4,
  cohortSize: 100_000,
  tierPct: 10,
  sharePct: 20,
};

describe("computeScenario", () => {
  it("prices the default assumptions", () => {
    expect(computeTokenPrice(4, TOTAL_SUPPLY)).toBe(4);
    expect(ogPoolTokens(TOTAL_SUPPLY, 15)).toBeCloseTo(150_000_000, 6);
    expect(walletsInTier(100_000, 10)).toBeCloseTo(10_000, 9);

    const r = computeScenario(base);
    expect(r.sharePct).toBe(20);
    expect(r.fdvBillion).toBe(4);
    expect(r.tokensPerWallet).toBeCloseTo(3000, 9);
    expect(r.usdValue).toBeCloseTo(12_000, 9);
  });

  it("derives token price from FDV and supply alone", () => {
    for (const [fdv, supply] of [
      [2, 1e9],
      [3.5, 5e8],
      [7, 2_000_000_000],
    ]) {
      expect(computeTokenPrice(fdv, supply)).toBe((fdv * 1e9) / supply);
    }
  });

  it("moves payout in the expected direction for each input", () => {
    const usd = (patch: Partial<ScenarioParams>) => computeScenario({ ...base, ...patch }).usdValue;

    const fdvs = [2, 3, 4, 5, 6].map((fdvBillion) => usd({ fdvBillion }));
    const shares = [10, 20, 30, 40].map((sharePct) => usd({ sharePct }));
    const cohorts = [50_000, 100_000, 200_000].map((cohortSize) => usd({ cohortSize }));
    const tiers = [1, 5, 10, 50].map((tierPct) => usd({ tierPct }));

    const nonDecreasing = (xs: number[]) => xs.every((x, i) => i === 0 || x >= xs[i - 1]);
    const nonIncreasing = (xs: number[]) => xs.every((x, i) => i === 0 || x <= xs[i - 1]);

    expect(nonDecreasing(fdvs)).toBe(true);
    expect(nonDecreasing(shares)).toBe(true);
    expect(nonIncreasing(cohorts)).toBe(true);
    expect(nonIncreasing(tiers)).toBe(true);
  });

  it("floors the tier at one wallet", () => {
    expect(walletsInTier(10, 1)).toBe(1);
    expect(walletsInTierCount(10, 1)).toBe(1);
    const r = computeScenario({ ...base, cohortSize: 10, tierPct: 1 });
    expect(r.tokensPerWallet).toBeCloseTo(30_000_000, 3);
  });

  it("keeps fractional tier sizes in the divisor", () => {
    // 123 wallets * 10% = 12.3 competing wallets
    const r = computeScenario({ ...base, cohortSize: 123 });
    expect(r.tokensPerWallet).toBeCloseTo(30_000_000 / 12.3, 3);
    expect(walletsInTierCount(123, 10)).toBe(12);
  });

  it("rejects a non-positive supply", () => {
    expect(() => computeTokenPrice(4, 0)).toThrow(ScenarioConfigError);
    expect(() => computeScenario({ ...base, totalSupply: -1 })).toThrow("totalSupply must be positive");
  });
});

describe("comparison grids", () => {
  const fixed = { totalSupply: TOTAL_SUPPLY, ogPoolPct: 15, fdvBillion: 4, cohortSize: 100_000, tierPct: 10 };

  it("builds one share-table row per share in input order", () => {
    expect(buildShareTable([30, 20], fixed)).toEqual([
      { sharePct: 30, tokensPerWallet: 4500, usdValue: 18_000 },
      { sharePct: 20, tokensPerWallet: 3000, usdValue: 12_000 },
    ]);
  });

  it("rounds share-table values to cents", () => {
    // 30,000,000 tokens over 9,000 wallets
    const [row] = buildShareTable([20], { ...fixed, cohortSize: 90_000 });
    expect(row).toEqual({ sharePct: 20, tokensPerWallet: 3333.33, usdValue: 13_333.33 });
  });

  it("lays the heatmap out share-major across FDV points", () => {
    const cells = buildHeatmapData([20, 40], [3, 5], {
      totalSupply: TOTAL_SUPPLY,
      ogPoolPct: 15,
      cohortSize: 100_000,
      tierPct: 10,
    });
    expect(cells.map((c) => [c.sharePct, c.fdvBillion])).toEqual([
      [20, 3],
      [20, 5],
      [40, 3],
      [40, 5],
    ]);
    expect(cells[0].usdValue).toBeCloseTo(9000, 6);
    expect(cells[3].usdValue).toBeCloseTo(30_000, 6);
  });

  it("exports the share table as CSV", () => {
    const csv = shareTableCsv([
      { sharePct: 20, tokensPerWallet: 3000, usdValue: 12_000 },
      { sharePct: 30, tokensPerWallet: 4500.5, usdValue: 18_002 },
    ]);
    expect(csv).toBe("tier_share_pct,tokens_per_wallet,usd\n20,3000,12000\n30,4500.5,18002");
  });
});
