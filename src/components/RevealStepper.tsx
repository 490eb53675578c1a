// src/components/RevealStepper.tsx
import { useEffect, useMemo, useState } from "react";
import type { RevealStep } from "../lib/context";
import { revealLengthMs, revealTimeline } from "../lib/reveal";

type Props = {
  steps: RevealStep[];
  durationS: number;
  onDone: () => void;
};

/** Narrates the estimate one step at a time, then hands control back. */
export function RevealStepper({ steps, durationS, onDone }: Props) {
  const timeline = useMemo(() => revealTimeline(steps, durationS), [steps, durationS]);
  const [index, setIndex] = useState(0);

  useEffect(() => {
    const timers = timeline.slice(1).map((step, i) => window.setTimeout(() => setIndex(i + 1), step.atMs));
    timers.push(window.setTimeout(onDone, revealLengthMs(steps, durationS)));
    return () => timers.forEach((t) => window.clearTimeout(t));
  }, [timeline, steps, durationS, onDone]);

  const current = timeline[index];
  if (!current) return null;

  return (
    <div className="rounded-xl border border-sky-200 bg-sky-50 p-4" aria-live="polite">
      <div className="h-2 rounded bg-sky-100 overflow-hidden">
        <div className="h-2 bg-sky-500 transition-all duration-300" style={{ width: `${current.progressPct}%` }} />
      </div>
      <div className="mt-3 text-xs uppercase tracking-wide text-sky-700">{current.title}</div>
      <div className="text-base font-medium">{current.detail}</div>
      <button className="mt-3 text-xs border px-2 py-1 rounded bg-white" onClick={onDone}>
        Skip
      </button>
    </div>
  );
}
