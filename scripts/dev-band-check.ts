// scripts/dev-band-check.ts
/**
 * Dev-only sanity check for the bundled percentile snapshots.
 *
 * Run:
 *   npx tsx scripts/dev-band-check.ts
 *   npx tsx scripts/dev-band-check.ts --usd 25000 --cohort 150000
 */
import path from "node:path";
import { fileURLToPath } from "node:url";
import { cohortMap, loadCohorts } from "../src/lib/cohorts";
import { buildScenarioContext } from "../src/lib/context";
import { DistributionCache } from "../src/lib/distributionCache";
import { fsDistributionSource } from "../src/lib/distributionFs";
import { formatInt, formatUsd } from "../src/lib/format";
import { createLogger } from "../src/lib/logger";
import { findSnapshotIssues } from "../src/lib/snapshotCheck";

const log = createLogger("band-check");

function argNumber(flag: string, fallback: number): number {
  const idx = process.argv.indexOf(flag);
  if (idx < 0) return fallback;
  const n = Number(process.argv[idx + 1]);
  return Number.isFinite(n) ? n : fallback;
}

const dataDir = process.env.DATA_DIR ?? fileURLToPath(new URL("../data/", import.meta.url));
const usd = argNumber("--usd", 25_000);
const cohortSize = argNumber("--cohort", 100_000);

const cache = new DistributionCache(fsDistributionSource, log);
const cohorts = await loadCohorts((file) => cache.load(path.join(dataDir, file)));

let problems = 0;
for (const cohort of cohorts) {
  const issues = findSnapshotIssues(cohort.rows);
  problems += issues.length;
  for (const issue of issues) log.warn(`${cohort.name}: ${issue}`);
  console.log(`${cohort.name}: ${cohort.rows.length} buckets, est. ${formatInt(cohort.estimate)} wallets`);
}

const primary = cohorts[cohorts.length - 1];
const ctx = buildScenarioContext({
  cohorts: cohortMap(cohorts),
  primaryName: primary.name,
  cohortSize,
  tierPct: 10,
  ogPoolPct: 15,
  fdvBillion: 4,
  shareOptions: [20, 30, 40],
  fdvSensitivity: [3, 4, 5],
  walletReport: { summary: { total_usd: usd } },
});

console.log(`\nWallet volume ${formatUsd(usd)}, slider at ${formatInt(cohortSize)} wallets:`);
for (const card of ctx.cards) {
  console.log(`  ${card.fullLabel.padEnd(20)} ${card.bandText || "not placed"} | ${card.payoutText}`);
}

if (problems) {
  console.error(`\n${problems} snapshot issue(s) found.`);
  process.exit(1);
}
console.log("\nSnapshots look consistent.");
