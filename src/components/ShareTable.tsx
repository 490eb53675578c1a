// src/components/ShareTable.tsx
import { downloadCsv } from "../lib/download";
import { formatInt, formatUsdCents } from "../lib/format";
import { shareTableCsv, type ShareTableRow } from "../lib/scenario";

export function ShareTable({ rows, featuredShare }: { rows: ShareTableRow[]; featuredShare: number }) {
  return (
    <div>
      <table className="w-full text-sm">
        <thead>
          <tr className="text-left text-slate-500 text-xs">
            <th className="py-1">Tier share</th>
            <th>Tokens per wallet</th>
            <th>USD value</th>
          </tr>
        </thead>
        <tbody>
          {rows.map((row) => (
            <tr key={row.sharePct} className={`border-t ${row.sharePct === featuredShare ? "font-semibold" : ""}`}>
              <td className="py-1">{row.sharePct}%</td>
              <td>{formatInt(row.tokensPerWallet)}</td>
              <td>{formatUsdCents(row.usdValue)}</td>
            </tr>
          ))}
        </tbody>
      </table>
      <button
        className="no-print mt-2 text-xs border px-2 py-1 rounded"
        onClick={() => downloadCsv(shareTableCsv(rows), "tier-share-table")}
      >
        Download CSV
      </button>
    </div>
  );
}
