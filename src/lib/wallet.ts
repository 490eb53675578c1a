// src/lib/wallet.ts
// Wallet trade-history reports, as returned by the wallet stats query.
import { z } from "zod";
import { safeFloat, safeInt } from "./safeNumber";

const Cell = z.union([z.string(), z.number(), z.boolean(), z.null()]).optional();

export const WalletSummarySchema = z
  .object({
    section: z.string().optional(),
    total_usd: Cell,
    total_eth: Cell,
    trade_count: Cell,
    buy_trade_count: Cell,
    sell_trade_count: Cell,
    platform_fee_eth: Cell,
    platform_fee_usd: Cell,
    royalty_fee_eth: Cell,
    royalty_fee_usd: Cell,
    first_trade: z.string().nullable().optional(),
    last_trade: z.string().nullable().optional(),
    last_activity: z.string().nullable().optional(),
  })
  .passthrough();

export const WalletReportSchema = z
  .object({
    summary: WalletSummarySchema.nullable().optional(),
    buyer_seller: z.array(z.record(z.unknown())).optional(),
    collections: z.array(z.record(z.unknown())).optional(),
  })
  .passthrough();

export type WalletSummary = z.infer<typeof WalletSummarySchema>;
export type WalletReport = z.infer<typeof WalletReportSchema>;

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export function isWalletAddress(value: string): boolean {
  return ADDRESS_RE.test(value.trim());
}

export function parseWalletReport(payload: unknown): WalletReport | null {
  const parsed = WalletReportSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}

export function hasSummary(report: WalletReport | null | undefined): report is WalletReport & { summary: WalletSummary } {
  return !!report?.summary;
}

/** `summary.total_usd` as a number; 0 when absent or malformed. */
export function walletTotalUsd(report: WalletReport | null | undefined): number {
  return safeFloat(report?.summary?.total_usd);
}

export function walletStats(summary: WalletSummary) {
  return {
    tradeCount: safeInt(summary.trade_count),
    totalEth: safeFloat(summary.total_eth),
    totalUsd: safeFloat(summary.total_usd),
    lastTrade: summary.last_trade || summary.last_activity || undefined,
  };
}

/** Whether the wallet's first trade happened on or before the cohort cutoff. */
export function qualifiesForCutoff(report: WalletReport | null | undefined, cutoffIso: string): boolean {
  const first = report?.summary?.first_trade;
  if (!first) return false;
  const firstMs = Date.parse(first);
  const cutoffMs = Date.parse(cutoffIso);
  if (Number.isNaN(firstMs) || Number.isNaN(cutoffMs)) return false;
  return firstMs <= cutoffMs;
}

/** `0x1234…abcd` for long addresses; short values pass through trimmed. */
export function formatWalletAddress(address: string | null | undefined): string {
  if (!address) return "";
  const value = address.trim();
  if (value.length <= 12) return value;
  return `${value.slice(0, 6)}…${value.slice(-4)}`;
}

export type FeeRow = {
  type: "Platform" | "Royalties" | "Net to trader";
  eth: number;
  usd: number;
  ethPct: number;
  usdPct: number;
};

const share = (part: number, whole: number) => (whole ? (part / whole) * 100 : 0);

/** Fees paid out of the wallet's volume and what was left for the trader. */
export function walletFeeProfile(summary: WalletSummary): FeeRow[] {
  const totalEth = safeFloat(summary.total_eth);
  const totalUsd = safeFloat(summary.total_usd);
  const platformEth = safeFloat(summary.platform_fee_eth);
  const platformUsd = safeFloat(summary.platform_fee_usd);
  const royaltyEth = safeFloat(summary.royalty_fee_eth);
  const royaltyUsd = safeFloat(summary.royalty_fee_usd);

  const row = (type: FeeRow["type"], eth: number, usd: number): FeeRow => ({
    type,
    eth,
    usd,
    ethPct: share(eth, totalEth),
    usdPct: share(usd, totalUsd),
  });

  const rows: FeeRow[] = [];
  if (platformEth || platformUsd) rows.push(row("Platform", platformEth, platformUsd));
  if (royaltyEth || royaltyUsd) rows.push(row("Royalties", royaltyEth, royaltyUsd));
  if (totalEth || totalUsd) {
    rows.push(
      row(
        "Net to trader",
        Math.max(totalEth - platformEth - royaltyEth, 0),
        Math.max(totalUsd - platformUsd - royaltyUsd, 0)
      )
    );
  }
  return rows;
}

export type CollectionRow = {
  collection: string;
  trades: number;
  eth: number;
  usd: number;
  usdPct: number;
};

const LABEL_KEYS = ["collection", "label", "collection_name", "collection_slug", "project", "project_slug", "name"];

function collectionLabel(row: Record<string, unknown>): string {
  for (const key of LABEL_KEYS) {
    const v = row[key];
    if (typeof v === "string" && v.trim()) return v.trim();
  }
  return "Unknown collection";
}

/**
 * Per-collection volume, richest first. Shares are of the summary's USD total and
 * round to two decimals; they are 0 when the wallet has no USD volume.
 */
export function walletCollectionMix(report: WalletReport | null | undefined): CollectionRow[] {
  const totalUsd = walletTotalUsd(report);
  return (report?.collections ?? [])
    .map((row) => {
      const usd = safeFloat(row.total_usd);
      return {
        collection: collectionLabel(row),
        trades: safeInt(row.trade_count),
        eth: safeFloat(row.total_eth),
        usd,
        usdPct: totalUsd ? Math.round((usd / totalUsd) * 100 * 100) / 100 : 0,
      };
    })
    .sort((a, b) => b.usd - a.usd);
}
