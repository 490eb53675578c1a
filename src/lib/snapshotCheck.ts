// src/lib/snapshotCheck.ts
import type { Distribution } from "./distribution";

/**
 * Structural problems in a snapshot: negative counts, inverted ranges, duplicate ranks, and
 * neighbouring buckets whose USD ranges run the wrong way for the rank order.
 */
export function findSnapshotIssues(rows: Distribution): string[] {
  const issues: string[] = [];
  const ranks = new Set<number>();

  rows.forEach((row, i) => {
    const rank = row.usd_percentile_rank;
    if (ranks.has(rank)) issues.push(`duplicate rank ${rank}`);
    ranks.add(rank);
    if (row.wallet_count < 0) issues.push(`rank ${rank}: negative wallet_count`);
    if (row.max_total_usd < row.min_total_usd) issues.push(`rank ${rank}: max_total_usd below min_total_usd`);

    const prev = rows[i - 1];
    // ranks count down from the richest bucket
    if (prev && row.max_total_usd > prev.min_total_usd + 0.01) {
      issues.push(`rank ${rank}: range overlaps rank ${prev.usd_percentile_rank}`);
    }
  });

  return issues;
}
