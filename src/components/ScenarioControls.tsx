// src/components/ScenarioControls.tsx
import { FDV_CHOICES, FDV_SENSITIVITY_CHOICES, OG_POOL_RANGE, SHARE_CHOICES } from "../lib/config";
import { formatBillions, formatInt } from "../lib/format";
import type { InputsPatch, SessionContext } from "../lib/session";
import { formatPercentileOption, generatePercentileOptions, snapValueToOptions } from "../lib/sliders";
import { Section } from "./Section";

const PERCENTILE_OPTIONS = generatePercentileOptions();

type Props = {
  session: SessionContext;
  cohortNames: string[];
  primaryName: string;
  cohortOptions: number[];
  cohortEstimate: number;
  onChange: (patch: InputsPatch) => void;
};

function toggle(list: ReadonlyArray<number>, value: number): number[] {
  const next = list.includes(value) ? list.filter((v) => v !== value) : [...list, value];
  return next.sort((a, b) => a - b);
}

function Chip({ active, onClick, children }: { active: boolean; onClick: () => void; children: string }) {
  return (
    <button
      type="button"
      onClick={onClick}
      aria-pressed={active}
      className={`text-xs px-2 py-1 rounded border ${
        active ? "bg-slate-900 text-white border-slate-900" : "bg-white hover:bg-slate-50 border-slate-300"
      }`}
    >
      {children}
    </button>
  );
}

export function ScenarioControls({ session, cohortNames, primaryName, cohortOptions, cohortEstimate, onChange }: Props) {
  const cohortValue = snapValueToOptions(session.cohortSize, cohortOptions);
  const cohortIndex = Math.max(0, cohortOptions.indexOf(cohortValue));
  const fromWallet = session.tierSource?.fromWallet ?? false;

  return (
    <Section id="assumptions" title="Assumptions" subtitle="Every number below feeds the estimate on the right.">
      <label className="block text-sm">
        <span className="font-medium">OG definition</span>
        <select
          className="mt-1 w-full border rounded px-2 py-1 text-sm"
          value={primaryName}
          onChange={(e) => onChange({ primaryCohort: e.target.value })}
        >
          {cohortNames.map((name) => (
            <option key={name} value={name}>
              {name}
            </option>
          ))}
        </select>
      </label>

      <label className="block text-sm">
        <span className="font-medium">OG pool: {session.ogPoolPct}% of supply</span>
        <input
          type="range"
          className="w-full"
          min={OG_POOL_RANGE.min}
          max={OG_POOL_RANGE.max}
          step={OG_POOL_RANGE.step}
          value={session.ogPoolPct}
          onChange={(e) => onChange({ ogPoolPct: Number(e.target.value) })}
        />
      </label>

      <div className="text-sm">
        <div className="font-medium mb-1">Fully diluted valuation</div>
        <div className="flex flex-wrap gap-1">
          {FDV_CHOICES.map((fdv) => (
            <Chip key={fdv} active={session.fdvBillion === fdv} onClick={() => onChange({ fdvBillion: fdv })}>
              {formatBillions(fdv)}
            </Chip>
          ))}
        </div>
      </div>

      <label className="block text-sm">
        <span className="font-medium">OG wallets: {formatInt(cohortValue)}</span>
        <input
          type="range"
          className="w-full"
          min={0}
          max={Math.max(cohortOptions.length - 1, 0)}
          step={1}
          value={cohortIndex}
          disabled={!cohortOptions.length}
          onChange={(e) => {
            const next = cohortOptions[Number(e.target.value)];
            if (next !== undefined) onChange({ cohortSize: next });
          }}
        />
        {cohortEstimate ? (
          <span className="text-xs text-slate-500">Snapshot estimate: {formatInt(cohortEstimate)} wallets</span>
        ) : null}
      </label>

      <label className="block text-sm">
        <span className="font-medium">Your tier</span>
        <select
          className="mt-1 w-full border rounded px-2 py-1 text-sm"
          value={session.tierPct}
          onChange={(e) => onChange({ tierPct: Number(e.target.value) })}
        >
          {PERCENTILE_OPTIONS.map((p) => (
            <option key={p} value={p}>
              {formatPercentileOption(p)}
            </option>
          ))}
        </select>
        {fromWallet && session.tierSource ? (
          <span className="text-xs text-emerald-700">
            Set from your wallet (band midpoint {session.tierSource.value.toFixed(1)}%)
          </span>
        ) : null}
      </label>

      <div className="text-sm">
        <div className="font-medium mb-1">Share of the OG pool going to your tier</div>
        <div className="flex flex-wrap gap-1">
          {SHARE_CHOICES.map((share) => (
            <Chip
              key={share}
              active={session.shareOptions.includes(share)}
              onClick={() => onChange({ shareOptions: toggle(session.shareOptions, share) })}
            >
              {`${share}%`}
            </Chip>
          ))}
        </div>
        <div className="text-xs text-slate-500 mt-1">The smallest selected share is featured on the cards.</div>
      </div>

      <div className="text-sm">
        <div className="font-medium mb-1">FDV sensitivity</div>
        <div className="flex flex-wrap gap-1">
          {FDV_SENSITIVITY_CHOICES.map((fdv) => (
            <Chip
              key={fdv}
              active={session.fdvSensitivity.includes(fdv)}
              onClick={() => onChange({ fdvSensitivity: toggle(session.fdvSensitivity, fdv) })}
            >
              {formatBillions(fdv)}
            </Chip>
          ))}
        </div>
      </div>
    </Section>
  );
}
