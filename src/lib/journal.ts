// src/lib/journal.ts
import { formatBillions, formatInt } from "./format";
import { formatSetting, formatSliderChange } from "./logger";
import type { SessionContext } from "./session";
import { formatPercentileOption } from "./sliders";

const pct = (v: number) => `${v}%`;
const list = (xs: ReadonlyArray<number>, fmt: (v: number) => string) => (xs.length ? xs.map(fmt).join(", ") : "none");

/** One journal line per assumption that differs between two sessions. */
export function journalLines(prev: SessionContext, next: SessionContext): string[] {
  const lines: string[] = [];
  if (next.primaryCohort && prev.primaryCohort !== next.primaryCohort) {
    lines.push(formatSetting("OG definition", next.primaryCohort));
  }
  if (prev.ogPoolPct !== next.ogPoolPct) {
    lines.push(formatSliderChange("OG pool", prev.ogPoolPct, next.ogPoolPct, pct));
  }
  if (prev.fdvBillion !== next.fdvBillion) {
    lines.push(formatSliderChange("FDV", prev.fdvBillion, next.fdvBillion, formatBillions));
  }
  if (prev.cohortSize !== next.cohortSize) {
    lines.push(formatSliderChange("OG wallets", prev.cohortSize, next.cohortSize, formatInt));
  }
  if (prev.tierPct !== next.tierPct) {
    lines.push(formatSliderChange("Tier", prev.tierPct, next.tierPct, formatPercentileOption));
  }
  const shares = list(next.shareOptions, pct);
  if (list(prev.shareOptions, pct) !== shares) lines.push(formatSetting("Tier shares", shares));
  const fdvs = list(next.fdvSensitivity, formatBillions);
  if (list(prev.fdvSensitivity, formatBillions) !== fdvs) lines.push(formatSetting("FDV sensitivity", fdvs));
  return lines;
}
