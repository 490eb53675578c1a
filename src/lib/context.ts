// src/lib/context.ts
// Everything the results section renders, assembled across all cohorts in one pass.
import { extractCurvePoints, type CurvePoint } from "./distribution";
import type { CohortMap } from "./cohorts";
import { DEFAULT_SHARE_OPTIONS } from "./config";
import { formatBillions, formatInt, formatUsd, formatUsdCents } from "./format";
import { bandMidpoint, determinePercentileBand, formatBand, type PercentileBand } from "./percentile";
import {
  TOTAL_SUPPLY,
  buildHeatmapData,
  buildShareTable,
  computeScenario,
  computeTokenPrice,
  ogPoolTokens,
  walletsInTierCount,
  type HeatmapCell,
  type ScenarioResult,
  type ShareTableRow,
} from "./scenario";
import { formatPercentileOption, roundHalfEven } from "./sliders";
import { walletTotalUsd, type WalletReport } from "./wallet";

export type RevealStep = { title: string; detail: string };

export type ScenarioCard = {
  name: string;
  title: string;
  subtitle: string;
  payoutText: string;
  tokensText: string;
  walletsText: string;
  bandText: string;
  isPrimary: boolean;
  cohortSize: number;
  usdValue: number;
  tokensValue: number;
  fullLabel: string;
  curvePoints: CurvePoint[];
  highlightMid: number | null;
  highlightUsd: number | null;
};

export type CohortBandSummary = {
  label: string;
  start: number | null;
  end: number | null;
  mid: number | null;
  cohortSize: number;
};

export type ScenarioSnapshot = {
  tokenPrice: number;
  walletsInTier: number;
  ogPoolTokens: number;
  featuredShare: number;
  tierPct: number;
  shareTable: ShareTableRow[];
  heatmap: HeatmapCell[];
  steps: RevealStep[];
};

export type ScenarioContextArgs = {
  cohorts: CohortMap;
  primaryName: string;
  cohortSize: number;
  tierPct: number;
  ogPoolPct: number;
  fdvBillion: number;
  shareOptions: ReadonlyArray<number>;
  fdvSensitivity: ReadonlyArray<number>;
  walletReport?: WalletReport | null;
  totalSupply?: number;
};

export type ScenarioContext = {
  cards: ScenarioCard[];
  snapshot: ScenarioSnapshot;
  bands: Record<string, CohortBandSummary>;
  curveRows: CurvePoint[];
  primaryResult: ScenarioResult;
  primaryLabel: string;
  primaryCohortWallets: number;
  primaryBand: PercentileBand | null;
  steps: RevealStep[];
  signature: string;
  featuredShare: number;
  tokenPrice: number;
  totalUsdSnapshot: number;
};

/** Identity of a set of assumptions; reveals and share cards are keyed on it. */
export function scenarioSignature(args: {
  ogPoolPct: number;
  fdvBillion: number;
  cohortSize: number;
  tierPct: number;
  shareOptions: ReadonlyArray<number>;
  fdvSensitivity: ReadonlyArray<number>;
}): string {
  return JSON.stringify([
    args.ogPoolPct,
    args.fdvBillion,
    args.cohortSize,
    args.tierPct,
    [...args.shareOptions],
    [...args.fdvSensitivity],
  ]);
}

/**
 * Wallets modelled for a cohort when the shared slider is set to `cohortSize`:
 * proportional to the cohort's estimate relative to the primary cohort's.
 */
export function scaleCohortSize(cohortSize: number, estimate: number, baseEstimate: number): number {
  const factor = baseEstimate ? estimate / baseEstimate : 1;
  return Math.max(1, roundHalfEven(cohortSize * factor));
}

function revealSteps(args: {
  fdvBillion: number;
  totalSupply: number;
  tokenPrice: number;
  ogPoolPct: number;
  tierPct: number;
  walletsInTier: number;
  featuredShare: number;
  result: ScenarioResult;
}): RevealStep[] {
  const price = formatUsdCents(args.tokenPrice);
  return [
    {
      title: "Token price",
      detail: `FDV ${formatBillions(args.fdvBillion)} / ${formatInt(args.totalSupply)} tokens = ${price} per token`,
    },
    {
      title: "OG pool allocation",
      detail: `${args.ogPoolPct}% of supply reserved for OGs → ${formatInt(ogPoolTokens(args.totalSupply, args.ogPoolPct))} tokens available to distribute`,
    },
    {
      title: "Tier sizing",
      detail: `${formatPercentileOption(args.tierPct)} equates to roughly ${formatInt(args.walletsInTier)} wallets competing`,
    },
    {
      title: "Tier share assumption",
      detail: `Using a ${args.featuredShare}% slice of the OG pool for your tier gives ${formatInt(args.result.tokensPerWallet)} tokens each`,
    },
    {
      title: "Estimated payout",
      detail: `At ${price}/token that works out to ≈ ${formatUsd(args.result.usdValue)}`,
    },
  ];
}

export function buildScenarioContext(args: ScenarioContextArgs): ScenarioContext {
  const { cohorts, primaryName, cohortSize, tierPct, ogPoolPct, fdvBillion, fdvSensitivity } = args;
  const totalSupply = args.totalSupply ?? TOTAL_SUPPLY;
  const report = args.walletReport ?? null;
  const primary = cohorts.get(primaryName);

  const totalUsdSnapshot = report && primary?.rows.length ? walletTotalUsd(report) : 0;

  const shareOptions = args.shareOptions.length ? args.shareOptions : DEFAULT_SHARE_OPTIONS;
  const featuredShare = shareOptions[0];
  const tokenPrice = computeTokenPrice(fdvBillion, totalSupply);
  const fixed = { totalSupply, ogPoolPct, fdvBillion, tierPct };

  let baseEstimate = primary?.estimate || cohortSize || 1;
  if (baseEstimate <= 0) baseEstimate = Math.max(cohortSize, 1);

  const cards: ScenarioCard[] = [];
  const bands: Record<string, CohortBandSummary> = {};
  const curveRows: CurvePoint[] = [];
  let primaryResult: ScenarioResult | null = null;
  let primaryLabel = primary?.config.title ?? primaryName;
  let primaryCohortWallets = cohortSize;
  let primaryBand: PercentileBand | null = null;

  for (const [name, cohort] of cohorts) {
    const estimate = cohort.estimate || baseEstimate;
    const scaledSize = scaleCohortSize(cohortSize, estimate, baseEstimate);
    const result = computeScenario({ ...fixed, cohortSize: scaledSize, sharePct: featuredShare });

    let band: PercentileBand | null = null;
    if (report && cohort.rows.length) {
      band = determinePercentileBand(totalUsdSnapshot, cohort.rows, scaledSize);
    }
    const mid = band ? bandMidpoint(band) : null;

    const { title, timelineLabel, tagline } = cohort.config;
    const subtitle = [timelineLabel, tagline].filter(Boolean).join(" · ") || cohort.name;
    const fullLabel = timelineLabel ? `${title} · ${timelineLabel}` : title;

    let walletsText = `Wallets modelled: ${formatInt(scaledSize)}`;
    if (cohort.estimate) walletsText += ` (est. ${formatInt(cohort.estimate)})`;

    bands[name] = {
      label: fullLabel,
      start: band?.startPercentile ?? null,
      end: band?.endPercentile ?? null,
      mid,
      cohortSize: scaledSize,
    };

    const curvePoints = extractCurvePoints(cohort.rows, fullLabel);
    curveRows.push(...curvePoints);

    const isPrimary = name === primaryName;
    cards.push({
      name,
      title,
      subtitle,
      payoutText: `≈ ${formatUsd(result.usdValue)}`,
      tokensText: `${formatInt(result.tokensPerWallet)} tokens per wallet · ${featuredShare.toFixed(0)}% share`,
      walletsText,
      bandText: band ? formatBand(band) : "",
      isPrimary,
      cohortSize: scaledSize,
      usdValue: result.usdValue,
      tokensValue: result.tokensPerWallet,
      fullLabel,
      curvePoints,
      highlightMid: mid,
      highlightUsd: totalUsdSnapshot > 0 ? totalUsdSnapshot : null,
    });

    if (isPrimary) {
      primaryResult = result;
      primaryCohortWallets = scaledSize;
      primaryLabel = fullLabel || primaryLabel;
      primaryBand = band;
    }
  }

  const headline =
    primaryResult ?? computeScenario({ ...fixed, cohortSize, sharePct: featuredShare });
  const tierWallets = walletsInTierCount(primaryCohortWallets, tierPct);

  const steps = revealSteps({
    fdvBillion,
    totalSupply,
    tokenPrice,
    ogPoolPct,
    tierPct,
    walletsInTier: tierWallets,
    featuredShare,
    result: headline,
  });

  const snapshot: ScenarioSnapshot = {
    tokenPrice,
    walletsInTier: tierWallets,
    ogPoolTokens: ogPoolTokens(totalSupply, ogPoolPct),
    featuredShare,
    tierPct,
    shareTable: buildShareTable(shareOptions, { ...fixed, cohortSize }),
    heatmap: buildHeatmapData(shareOptions, fdvSensitivity, { totalSupply, ogPoolPct, tierPct, cohortSize }),
    steps,
  };

  return {
    cards,
    snapshot,
    bands,
    curveRows,
    primaryResult: headline,
    primaryLabel,
    primaryCohortWallets,
    primaryBand,
    steps,
    signature: scenarioSignature({ ogPoolPct, fdvBillion, cohortSize, tierPct, shareOptions, fdvSensitivity }),
    featuredShare,
    tokenPrice,
    totalUsdSnapshot,
  };
}
