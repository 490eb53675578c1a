// src/components/CohortCards.tsx
import type { ScenarioCard } from "../lib/context";

export function CohortCards({ cards }: { cards: ScenarioCard[] }) {
  if (!cards.length) {
    return <div className="text-sm text-slate-500">No cohort snapshots are loaded yet.</div>;
  }
  return (
    <div className="grid gap-3 md:grid-cols-3">
      {cards.map((card) => (
        <article
          key={card.name}
          className={`rounded-xl border p-3 ${card.isPrimary ? "border-sky-500 ring-1 ring-sky-200 bg-sky-50" : "border-slate-200"}`}
        >
          <div className="flex items-baseline justify-between gap-2">
            <h3 className="font-semibold">{card.title}</h3>
            {card.isPrimary ? <span className="text-[10px] uppercase tracking-wide text-sky-700">Primary</span> : null}
          </div>
          <div className="text-xs text-slate-500">{card.subtitle}</div>
          <div className="text-2xl font-bold mt-2">{card.payoutText}</div>
          <div className="text-xs text-slate-600">{card.tokensText}</div>
          <div className="text-xs text-slate-500 mt-1">{card.walletsText}</div>
          {card.bandText ? <div className="text-xs text-emerald-700 mt-1">{card.bandText}</div> : null}
        </article>
      ))}
    </div>
  );
}
