import { describe, expect, it } from "vitest";
import type { DistributionBucket } from "./distribution";
import { bandMidpoint, determinePercentileBand, formatBand, tierFromBand } from "./percentile";

const bucket = (wallet_count: number, min_total_usd: number, max_total_usd: number, rank = 1): DistributionBucket => ({
  wallet_count,
  min_total_usd,
  max_total_usd,
  usd_percentile_rank: rank,
});

describe("determinePercentileBand", () => {
  it("returns null for an empty distribution", () => {
    expect(determinePercentileBand(50, [], 1000)).toBeNull();
    expect(determinePercentileBand(0, [], 0)).toBeNull();
  });

  it("returns null for an empty cohort", () => {
    expect(determinePercentileBand(50, [bucket(10, 0, 100)], 0)).toBeNull();
  });

  it("places a value inside a single covering bucket", () => {
    const band = determinePercentileBand(50, [bucket(1000, 0, 100)], 1000);
    expect(band).not.toBeNull();
    expect(band?.startPercentile).toBe(0);
    expect(band?.endPercentile).toBe(100);
    expect(band?.bucketIndex).toBe(0);
    expect(band?.bandWallets).toBe(1000);
  });

  it("walks richest-first buckets and reports the rank interval", () => {
    const rows = [bucket(10_000, 50_000, 1_000_000, 1), bucket(40_000, 1000, 50_000, 2), bucket(50_000, 0, 1000, 3)];
    const band = determinePercentileBand(2000, rows, 100_000);
    expect(band).toMatchObject({
      startPercentile: 10,
      endPercentile: 50,
      bandWallets: 40_000,
      bandWalletsFull: 40_000,
      walletsBefore: 10_000,
      bucketIndex: 1,
    });
    expect(band?.bucketData).toBe(rows[1]);
  });

  it("truncates the last reachable bucket to the cohort size", () => {
    const rows = [bucket(600, 100, 200), bucket(600, 0, 100)];
    const band = determinePercentileBand(50, rows, 1000);
    expect(band).toMatchObject({ startPercentile: 60, endPercentile: 100, bandWallets: 400, bandWalletsFull: 600 });
  });

  it("lands values below the last reachable floor in that bucket's tail", () => {
    const rows = [bucket(500, 100, 200), bucket(500, 50, 100), bucket(500, 0, 50)];
    // cohort of 1000 only reaches the second bucket
    const band = determinePercentileBand(10, rows, 1000);
    expect(band?.bucketIndex).toBe(1);
    expect(band?.startPercentile).toBe(50);
    expect(band?.endPercentile).toBe(100);
  });

  it("fits a cohort smaller than the first bucket inside that bucket", () => {
    const rows = [bucket(5000, 100, 1000, 1), bucket(5000, 0, 100, 2)];
    const inside = determinePercentileBand(500, rows, 2000);
    expect(inside).toMatchObject({
      startPercentile: 0,
      endPercentile: 100,
      bandWallets: 2000,
      bandWalletsFull: 5000,
      walletsBefore: 0,
      bucketIndex: 0,
    });
    // the second bucket is never reached, so lower values fall into the first bucket's tail
    expect(determinePercentileBand(10, rows, 2000)).toMatchObject({ bucketIndex: 0, bandWallets: 2000, endPercentile: 100 });
    expect(determinePercentileBand(5000, rows, 2000)).toBeNull();
  });

  it("gives a shared boundary to the lower-index bucket", () => {
    const richestFirst = [bucket(100, 50, 100, 1), bucket(100, 0, 50, 2)];
    expect(determinePercentileBand(50, richestFirst, 200)).toMatchObject({
      bucketIndex: 0,
      startPercentile: 0,
      endPercentile: 50,
    });

    const ascending = Array.from({ length: 10 }, (_, i) => bucket(100, i * 10, (i + 1) * 10, i + 1));
    expect(determinePercentileBand(10, ascending, 1000)?.bucketIndex).toBe(0);
    expect(determinePercentileBand(20, ascending, 1000)?.bucketIndex).toBe(1);
    expect(determinePercentileBand(20.01, ascending, 1000)?.bucketIndex).toBe(2);
  });

  it("returns null above every reachable ceiling", () => {
    const rows = [bucket(500, 0, 50), bucket(500, 50, 100)];
    expect(determinePercentileBand(250, rows, 1000)).toBeNull();
  });

  it("skips empty buckets", () => {
    const rows = [bucket(0, 0, 1_000_000), bucket(100, 0, 100)];
    expect(determinePercentileBand(5, rows, 100)?.bucketIndex).toBe(1);
  });

  it("covers a contiguous distribution with non-decreasing bands", () => {
    // ten buckets of 100 wallets each covering [0, 100] USD
    const rows = Array.from({ length: 10 }, (_, i) => bucket(100, i * 10, (i + 1) * 10, i + 1));
    let prevStart = -1;
    let prevEnd = -1;
    for (let usd = 0; usd <= 100; usd += 2.5) {
      const band = determinePercentileBand(usd, rows, 1000);
      expect(band).not.toBeNull();
      if (!band) continue;
      expect(band.startPercentile).toBeGreaterThanOrEqual(0);
      expect(band.endPercentile).toBeLessThanOrEqual(100);
      expect(band.startPercentile).toBeLessThan(band.endPercentile);
      expect(band.startPercentile).toBeGreaterThanOrEqual(prevStart);
      expect(band.endPercentile).toBeGreaterThanOrEqual(prevEnd);
      prevStart = band.startPercentile;
      prevEnd = band.endPercentile;
    }
  });
});

describe("band helpers", () => {
  it("computes midpoint and tier suggestion", () => {
    expect(bandMidpoint({ startPercentile: 10, endPercentile: 50 })).toBe(30);
    expect(tierFromBand({ startPercentile: 10, endPercentile: 50 })).toBe(30);
    expect(tierFromBand({ startPercentile: 0, endPercentile: 0.1 })).toBe(0.1);
  });

  it("formats a band label", () => {
    expect(formatBand({ startPercentile: 10, endPercentile: 50 })).toBe("Wallet percentile: 10.0% – 50.0%");
    expect(formatBand({ startPercentile: 0, endPercentile: 12.25 })).toBe("Wallet percentile: 0.0% – 12.3%");
  });
});
