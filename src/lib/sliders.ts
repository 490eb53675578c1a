// src/lib/sliders.ts
// Discrete option sets for the cohort-size and tier sliders.

export const COHORT_STEP = 5_000;

export type CohortSliderArgs = {
  minVal?: number;
  midVal?: number;
  maxVal?: number;
  belowSteps?: number;
  aboveSteps?: number;
};

export type SliderDefaults = { options: number[]; midpoint: number };

/** Round half to even, matching banker's rounding on ties. */
export function roundHalfEven(x: number): number {
  if (Math.abs(x % 1) === 0.5) return 2 * Math.round(x / 2);
  return Math.round(x);
}

export function roundToStep(value: number, step: number): number {
  return roundHalfEven(value / step) * step;
}

export function roundUpToStep(value: number, step: number): number {
  return Math.ceil(value / step) * step;
}

function geomspace(start: number, stop: number, steps: number): number[] {
  if (steps <= 1) return [start];
  const ratio = (stop / start) ** (1 / (steps - 1));
  return Array.from({ length: steps }, (_, i) => start * ratio ** i);
}

/**
 * Cohort sizes spaced geometrically on both sides of `midVal`, so resolution is finest near
 * the anchored midpoint. Values snap to 5k; duplicates collapse, keeping first-seen order.
 */
export function generateCohortSliderOptions({
  minVal = 50_000,
  midVal = 100_000,
  maxVal = 500_000,
  belowSteps = 31,
  aboveSteps = 30,
}: CohortSliderArgs = {}): number[] {
  const below = geomspace(minVal, midVal, belowSteps);
  const above = geomspace(midVal, maxVal, aboveSteps + 1).slice(1);

  const seen = new Set<number>();
  const out: number[] = [];
  for (const value of [...below, ...above]) {
    const snapped = roundToStep(value, COHORT_STEP);
    if (seen.has(snapped)) continue;
    seen.add(snapped);
    out.push(snapped);
  }
  return out;
}

const FINE_GRAIN = [0.1, 0.2, 0.3, 0.5, 0.75, 1.0, 1.5, 2.0, 3.0, 5.0, 7.5, 10.0];
const BROADER = [12.5, 15.0, 20.0, 25.0, 30.0, 35.0, 40.0, 50.0, 60.0, 70.0, 80.0, 90.0, 100.0];

/** Tier percentiles: dense near the top of the cohort, coarse toward 100%. */
export function generatePercentileOptions(): number[] {
  return [...FINE_GRAIN, ...BROADER];
}

export function formatPercentileOption(value: number): string {
  const formatted = value.toFixed(1).replace(/0+$/, "").replace(/\.$/, "");
  return `Top ${formatted}%`;
}

/** Closest option by absolute distance; the earliest option wins a tie. */
export function snapValueToOptions(value: number, options: Iterable<number>): number {
  let best: number | null = null;
  let bestDist = Infinity;
  for (const opt of options) {
    const d = Math.abs(opt - value);
    if (d < bestDist) {
      best = opt;
      bestDist = d;
    }
  }
  return best ?? value;
}

/** Slider options anchored on a cohort's estimated wallet count. */
export function buildSliderDefaults(estimate: number): SliderDefaults {
  const sliderMin = 50_000;
  let sliderMid = 100_000;
  let sliderMax = 500_000;

  if (estimate) {
    sliderMid = roundToStep(Math.max(sliderMin, estimate), COHORT_STEP);
    sliderMax = Math.max(sliderMax, roundUpToStep(estimate * 1.2, COHORT_STEP));
    sliderMid = Math.min(sliderMax, sliderMid);
  }

  return {
    options: generateCohortSliderOptions({ minVal: sliderMin, midVal: sliderMid, maxVal: sliderMax }),
    midpoint: sliderMid,
  };
}
