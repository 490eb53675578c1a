// src/components/WalletPanel.tsx
import type { FormEvent } from "react";
import type { CohortBandSummary } from "../lib/context";
import { formatInt, formatUsd, formatUsdCents } from "../lib/format";
import {
  hasSummary,
  qualifiesForCutoff,
  walletCollectionMix,
  walletFeeProfile,
  walletStats,
  formatWalletAddress,
  type WalletReport,
} from "../lib/wallet";
import { Section } from "./Section";

export type WalletStatus =
  | { kind: "idle" }
  | { kind: "loading" }
  | { kind: "info"; message: string }
  | { kind: "error"; message: string }
  | { kind: "ok"; message: string };

type Props = {
  input: string;
  onInput: (value: string) => void;
  onLookup: (address: string) => void;
  onClear: () => void;
  demoWallet: string;
  status: WalletStatus;
  address: string | null;
  report: WalletReport | null;
  bands: Record<string, CohortBandSummary>;
  cutoff: string | null;
};

const eth = (n: number) => `Ξ${n.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 3 })}`;
const pct = (n: number) => `${n.toFixed(1)}%`;

function StatusLine({ status }: { status: WalletStatus }) {
  switch (status.kind) {
    case "idle":
      return null;
    case "loading":
      return <div className="text-xs text-slate-500">Contacting the query service…</div>;
    case "info":
      return <div className="text-xs text-sky-800 bg-sky-50 rounded px-2 py-1">{status.message}</div>;
    case "error":
      return <div className="text-xs text-red-800 bg-red-50 rounded px-2 py-1">{status.message}</div>;
    case "ok":
      return <div className="text-xs text-emerald-800 bg-emerald-50 rounded px-2 py-1">{status.message}</div>;
  }
}

export function WalletPanel({ input, onInput, onLookup, onClear, demoWallet, status, address, report, bands, cutoff }: Props) {
  const submit = (e: FormEvent) => {
    e.preventDefault();
    onLookup(input);
  };

  const summary = hasSummary(report) ? report.summary : null;
  const stats = summary ? walletStats(summary) : null;
  const fees = summary ? walletFeeProfile(summary) : [];
  const collections = summary ? walletCollectionMix(report) : [];
  const qualifies = cutoff ? qualifiesForCutoff(report, cutoff) : false;
  const firstTrade = summary?.first_trade ? summary.first_trade.slice(0, 10) : "N/A";

  return (
    <Section id="wallet" title="Your wallet" subtitle="Look up trade history to place yourself in each cohort.">
      <form className="flex flex-wrap gap-2" onSubmit={submit}>
        <input
          className="flex-1 min-w-0 border rounded px-2 py-1 text-sm font-mono"
          placeholder="0x..."
          value={input}
          onChange={(e) => onInput(e.target.value)}
          aria-label="Wallet address"
        />
        <button
          type="submit"
          className="text-sm px-3 py-1 rounded border bg-slate-900 text-white disabled:opacity-50"
          disabled={status.kind === "loading" || !input.trim()}
        >
          Fetch history
        </button>
        {demoWallet ? (
          <button
            type="button"
            className="text-sm px-3 py-1 rounded border bg-white hover:bg-slate-50"
            onClick={() => {
              onInput(demoWallet);
              onLookup(demoWallet);
            }}
          >
            Try demo wallet
          </button>
        ) : null}
        {address ? (
          <button type="button" className="text-sm px-3 py-1 rounded border bg-white hover:bg-slate-50" onClick={onClear}>
            Clear
          </button>
        ) : null}
      </form>

      <StatusLine status={status} />

      {summary && stats ? (
        <>
          <div className="flex flex-wrap items-center gap-2 text-sm">
            <span
              className={`px-3 py-0.5 rounded-full font-semibold ${qualifies ? "bg-green-500" : "bg-orange-400"} text-slate-900`}
            >
              {qualifies ? "OG qualification confirmed" : "Activity after OG cutoff"}
            </span>
            <span className="text-slate-600">
              Wallet {formatWalletAddress(address) || "n/a"} · First trade: {firstTrade}
            </span>
          </div>

          <div className="grid grid-cols-3 gap-2 text-center">
            <div className="rounded-lg border p-2">
              <div className="text-xs text-slate-500">Total trades</div>
              <div className="font-semibold">{formatInt(stats.tradeCount)}</div>
            </div>
            <div className="rounded-lg border p-2">
              <div className="text-xs text-slate-500">Volume</div>
              <div className="font-semibold">{eth(stats.totalEth)}</div>
            </div>
            <div className="rounded-lg border p-2">
              <div className="text-xs text-slate-500">Volume (USD)</div>
              <div className="font-semibold">{formatUsd(stats.totalUsd)}</div>
            </div>
          </div>

          <div>
            <div className="text-sm font-medium mb-1">Percentile placement across cohorts</div>
            <ul className="text-sm space-y-0.5">
              {Object.entries(bands).map(([name, band]) => (
                <li key={name}>
                  <strong>{band.label}</strong> ·{" "}
                  {band.start !== null && band.end !== null
                    ? `top ${band.start.toFixed(1)}% – ${band.end.toFixed(1)}% of ${formatInt(band.cohortSize)} wallets`
                    : "below the modelled volume range"}
                </li>
              ))}
            </ul>
          </div>

          {fees.length ? (
            <table className="w-full text-xs">
              <thead>
                <tr className="text-left text-slate-500">
                  <th className="py-1">Fee profile</th>
                  <th>ETH</th>
                  <th>USD</th>
                  <th>% of USD</th>
                </tr>
              </thead>
              <tbody>
                {fees.map((row) => (
                  <tr key={row.type} className="border-t">
                    <td className="py-1">{row.type}</td>
                    <td>{eth(row.eth)}</td>
                    <td>{formatUsdCents(row.usd)}</td>
                    <td>{pct(row.usdPct)}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          ) : null}

          {collections.length ? (
            <table className="w-full text-xs">
              <thead>
                <tr className="text-left text-slate-500">
                  <th className="py-1">Collection mix</th>
                  <th>Trades</th>
                  <th>ETH</th>
                  <th>USD</th>
                  <th>% of USD</th>
                </tr>
              </thead>
              <tbody>
                {collections.map((row, i) => (
                  <tr key={`${row.collection}-${i}`} className="border-t">
                    <td className="py-1 break-all">{row.collection}</td>
                    <td>{formatInt(row.trades)}</td>
                    <td>{eth(row.eth)}</td>
                    <td>{formatUsdCents(row.usd)}</td>
                    <td>{`${row.usdPct.toFixed(2)}%`}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          ) : null}
        </>
      ) : null}
    </Section>
  );
}
