// src/components/SharePanel.tsx
import { useState } from "react";
import type { ShareCard, ShareCardPayload } from "../lib/shareCard";
import { formatUsd } from "../lib/format";

type Props = {
  card: ShareCard | null;
  payload: ShareCardPayload | null;
  warning: string | null;
  busy: boolean;
  onCreate: () => void;
};

export function SharePanel({ card, payload, warning, busy, onCreate }: Props) {
  const [copied, setCopied] = useState(false);

  if (!payload) {
    return <div className="text-sm text-slate-500">Look up a wallet to create a shareable card.</div>;
  }

  const tweet = card
    ? `https://twitter.com/intent/tweet?text=${encodeURIComponent(
        `My OG airdrop estimate: ${formatUsd(payload.payoutUsd)} (${payload.percentileLabel}, ${payload.cohortLabel})`
      )}&url=${encodeURIComponent(card.shareUrl)}`
    : "";

  const copy = () => {
    if (!card) return;
    navigator.clipboard
      .writeText(card.shareUrl)
      .then(() => setCopied(true))
      .catch(() => setCopied(false));
  };

  return (
    <div className="space-y-2">
      {warning ? <div className="text-xs text-amber-800 bg-amber-50 rounded px-2 py-1">{warning}</div> : null}
      {card ? (
        <>
          <img src={card.imageUrl} alt="Airdrop estimate card" className="w-full rounded-lg border" />
          <div className="flex flex-wrap gap-2">
            <button className="text-xs border px-2 py-1 rounded" onClick={copy}>
              {copied ? "Link copied" : "Copy link"}
            </button>
            <a className="text-xs border px-2 py-1 rounded" href={tweet} target="_blank" rel="noreferrer">
              Post on X
            </a>
            <a className="text-xs border px-2 py-1 rounded" href={card.imageUrl} target="_blank" rel="noreferrer">
              Open image
            </a>
          </div>
        </>
      ) : (
        <button className="text-sm border px-3 py-1 rounded disabled:opacity-50" onClick={onCreate} disabled={busy}>
          {busy ? "Rendering card…" : "Create share card"}
        </button>
      )}
    </div>
  );
}
