import { Section } from "./Section";
import { formatUsd } from "../lib/format";

type Props = {
  journal: string[];
  payoutUsd: number;
  tokensPerWallet: number;
  walletsInTier: number;
  tokenPrice: number;
  onClear: () => void;
  onDownload: () => void;
};

export function ScenarioJournalSection({
  journal,
  payoutUsd,
  tokensPerWallet,
  walletsInTier,
  tokenPrice,
  onClear,
  onDownload,
}: Props) {
  return (
    <Section id="scenario-journal" title="Scenario Journal">
      <ul className="text-xs text-gray-700 space-y-1 max-h-64 overflow-auto pr-1 break-words min-w-0">
        {journal.length === 0 ? (
          <li className="text-gray-400">Adjust sliders or look up a wallet to log changes...</li>
        ) : (
          journal.map((line, i) => <li key={i}>{line}</li>)
        )}
        <li>
          Estimated payout: <strong>{formatUsd(payoutUsd)}</strong>
        </li>
        <li>
          Tokens per wallet: <strong>{Math.round(tokensPerWallet).toLocaleString()}</strong>
        </li>
        <li>
          Wallets in tier: <strong>{walletsInTier.toLocaleString()}</strong>
        </li>
        <li>
          Token price: <strong>${tokenPrice.toFixed(2)}</strong>
        </li>
      </ul>
      <div className="mt-2 flex gap-2">
        <button className="text-xs border px-2 py-1 rounded" onClick={onClear}>
          Clear
        </button>
        <button className="text-xs border px-2 py-1 rounded" onClick={onDownload}>
          Download .txt
        </button>
      </div>
    </Section>
  );
}
