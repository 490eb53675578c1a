// src/lib/percentile.ts
import type { Distribution, DistributionBucket } from "./distribution";

/**
 * Rank interval `[startPercentile, endPercentile)` a USD value occupies inside a cohort,
 * as a percentage of the assumed cohort size. Ranks are counted from index 0 of the
 * distribution; the shipped snapshots put the highest-volume bucket first, so these read
 * as "Top X%".
 */
export type PercentileBand = {
  startPercentile: number;
  endPercentile: number;
  bandWallets: number;
  bandWalletsFull: number;
  walletsBefore: number;
  bucketIndex: number;
  bucketData: DistributionBucket;
};

/**
 * Walk buckets in order, consuming up to `cohortSize` wallets. The first bucket whose USD
 * range contains `totalUsd` wins; a value below the floor of the last reachable bucket lands
 * in that bucket's tail. Returns null when the distribution is empty, the cohort is empty, or
 * the value is never matched (e.g. above every reachable ceiling).
 */
export function determinePercentileBand(
  totalUsd: number,
  distribution: Distribution,
  cohortSize: number
): PercentileBand | null {
  if (!distribution.length || cohortSize <= 0) return null;

  let remaining = cohortSize;
  let cumulativeBefore = 0;

  for (let idx = 0; idx < distribution.length; idx++) {
    const entry = distribution[idx];
    const bucketCount = entry.wallet_count;
    if (bucketCount <= 0) continue;

    const take = Math.min(bucketCount, remaining);
    if (take <= 0) break;

    const bandStartRank = cumulativeBefore;
    const bandEndRank = cumulativeBefore + take;

    const minUsd = entry.min_total_usd;
    const maxUsd = entry.max_total_usd;

    const inBucket = minUsd <= totalUsd && totalUsd <= maxUsd;
    const isLastBucket = remaining <= take;

    if (inBucket || (isLastBucket && totalUsd < minUsd)) {
      return {
        startPercentile: (bandStartRank / cohortSize) * 100,
        endPercentile: Math.min(100, (bandEndRank / cohortSize) * 100),
        bandWallets: take,
        bandWalletsFull: bucketCount,
        walletsBefore: bandStartRank,
        bucketIndex: idx,
        bucketData: entry,
      };
    }

    cumulativeBefore = bandEndRank;
    remaining -= take;
    if (remaining <= 0) break;
  }

  return null;
}

export function bandMidpoint(band: Pick<PercentileBand, "startPercentile" | "endPercentile">): number {
  return (band.startPercentile + band.endPercentile) / 2;
}

/** Tier percentile suggested by a located band, clamped to the tier slider's range. */
export function tierFromBand(band: Pick<PercentileBand, "startPercentile" | "endPercentile">): number {
  return Math.max(0.1, Math.min(100, bandMidpoint(band)));
}

export function formatBand(band: Pick<PercentileBand, "startPercentile" | "endPercentile">): string {
  return `Wallet percentile: ${band.startPercentile.toFixed(1)}% – ${band.endPercentile.toFixed(1)}%`;
}
