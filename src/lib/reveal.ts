// src/lib/reveal.ts
import type { RevealStep } from "./context";

export const MIN_STEP_SECONDS = 0.35;

export type TimedRevealStep = RevealStep & { atMs: number; progressPct: number };

/** Spread the steps evenly over `durationS`, with a floor per step. */
export function revealTimeline(steps: ReadonlyArray<RevealStep>, durationS: number): TimedRevealStep[] {
  const total = Math.max(steps.length, 1);
  const stepMs = Math.max(durationS / total, MIN_STEP_SECONDS) * 1000;
  return steps.map((step, i) => ({
    ...step,
    atMs: Math.round(i * stepMs),
    progressPct: Math.trunc(((i + 1) / total) * 100),
  }));
}

/** Total running time of a timeline, including the dwell on its last step. */
export function revealLengthMs(steps: ReadonlyArray<RevealStep>, durationS: number): number {
  const total = Math.max(steps.length, 1);
  return Math.round(total * Math.max(durationS / total, MIN_STEP_SECONDS) * 1000);
}
