import { describe, expect, it } from "vitest";
import {
  formatWalletAddress,
  hasSummary,
  isWalletAddress,
  parseWalletReport,
  qualifiesForCutoff,
  walletStats,
  walletCollectionMix,
  walletFeeProfile,
  walletTotalUsd,
} from "./wallet";

describe("wallet reports", () => {
  it("validates addresses", () => {
    expect(isWalletAddress("0x1234567890abcdef1234567890ABCDEF12345678")).toBe(true);
    expect(isWalletAddress(" 0x1234567890abcdef1234567890abcdef12345678 ")).toBe(true);
    expect(isWalletAddress("0x1234")).toBe(false);
    expect(isWalletAddress("1234567890abcdef1234567890abcdef12345678")).toBe(false);
  });

  it("reads totals tolerantly", () => {
    expect(walletTotalUsd({ summary: { total_usd: "1500.25" } })).toBe(1500.25);
    expect(walletTotalUsd({ summary: { total_usd: null } })).toBe(0);
    expect(walletTotalUsd(null)).toBe(0);
    expect(walletStats({ trade_count: "7.9", total_eth: 2, last_activity: "2022-01-02" })).toEqual({
      tradeCount: 7,
      totalEth: 2,
      totalUsd: 0,
      lastTrade: "2022-01-02",
    });
  });

  it("parses and guards reports", () => {
    const report = parseWalletReport({ summary: { total_usd: 10, extra: "kept" } });
    expect(hasSummary(report)).toBe(true);
    expect(hasSummary(parseWalletReport({}))).toBe(false);
    expect(parseWalletReport("nope")).toBeNull();
  });

  it("checks cohort cutoffs against the first trade", () => {
    const report = { summary: { first_trade: "2021-06-01T12:00:00Z" } };
    expect(qualifiesForCutoff(report, "2021-12-31T23:59:59Z")).toBe(true);
    expect(qualifiesForCutoff({ summary: { first_trade: "2023-01-01T00:00:00Z" } }, "2022-12-31T23:59:59Z")).toBe(false);
    expect(qualifiesForCutoff({ summary: {} }, "2022-12-31T23:59:59Z")).toBe(false);
  });

  it("shortens long addresses", () => {
    expect(formatWalletAddress("0x1234567890abcdef1234567890abcdef12345678")).toBe("0x1234…5678");
    expect(formatWalletAddress(" demo.eth ")).toBe("demo.eth");
    expect(formatWalletAddress(null)).toBe("");
  });
});

describe("walletFeeProfile", () => {
  it("splits volume into fees and the trader's net", () => {
    expect(
      walletFeeProfile({
        total_eth: "10",
        total_usd: "20000",
        platform_fee_eth: 0.25,
        platform_fee_usd: 500,
        royalty_fee_eth: "0.5",
        royalty_fee_usd: "1000",
      })
    ).toEqual([
      { type: "Platform", eth: 0.25, usd: 500, ethPct: 2.5, usdPct: 2.5 },
      { type: "Royalties", eth: 0.5, usd: 1000, ethPct: 5, usdPct: 5 },
      { type: "Net to trader", eth: 9.25, usd: 18_500, ethPct: 92.5, usdPct: 92.5 },
    ]);
  });

  it("skips fee rows that are zero", () => {
    expect(walletFeeProfile({ total_usd: 100 })).toEqual([
      { type: "Net to trader", eth: 0, usd: 100, ethPct: 0, usdPct: 100 },
    ]);
    expect(walletFeeProfile({})).toEqual([]);
  });
});

describe("walletCollectionMix", () => {
  it("labels, sorts and shares collections against the wallet total", () => {
    const rows = walletCollectionMix({
      summary: { total_usd: "3000" },
      collections: [
        { collection_slug: "beta-slug", total_usd: "500", total_eth: 0.2, trade_count: "3" },
        { collection: "Alpha", label: "ignored", total_usd: 2000, total_eth: "1", trade_count: 5 },
        { label: "", name: "Gamma", total_usd: "n/a" },
        { total_usd: 500 },
      ],
    });
    expect(rows).toEqual([
      { collection: "Alpha", trades: 5, eth: 1, usd: 2000, usdPct: 66.67 },
      { collection: "beta-slug", trades: 3, eth: 0.2, usd: 500, usdPct: 16.67 },
      { collection: "Unknown collection", trades: 0, eth: 0, usd: 500, usdPct: 16.67 },
      { collection: "Gamma", trades: 0, eth: 0, usd: 0, usdPct: 0 },
    ]);
  });

  it("reports zero shares without USD volume", () => {
    expect(walletCollectionMix({ summary: {}, collections: [{ collection: "Solo", total_usd: 10 }] })).toEqual([
      { collection: "Solo", trades: 0, eth: 0, usd: 10, usdPct: 0 },
    ]);
    expect(walletCollectionMix({ summary: { total_usd: 5 } })).toEqual([]);
    expect(walletCollectionMix(null)).toEqual([]);
  });
});
