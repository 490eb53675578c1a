import { describe, expect, it } from "vitest";
import { revealLengthMs, revealTimeline } from "./reveal";

const steps = [
  { title: "Token price", detail: "a" },
  { title: "OG pool allocation", detail: "b" },
  { title: "Tier sizing", detail: "c" },
  { title: "Tier share assumption", detail: "d" },
  { title: "Estimated payout", detail: "e" },
];

describe("revealTimeline", () => {
  it("spreads steps across the duration", () => {
    const timeline = revealTimeline(steps, 6);
    expect(timeline.map((s) => s.atMs)).toEqual([0, 1200, 2400, 3600, 4800]);
    expect(timeline.map((s) => s.progressPct)).toEqual([20, 40, 60, 80, 100]);
    expect(revealLengthMs(steps, 6)).toBe(6000);
  });

  it("keeps a minimum dwell per step", () => {
    expect(revealTimeline(steps, 0).map((s) => s.atMs)).toEqual([0, 350, 700, 1050, 1400]);
    expect(revealLengthMs(steps, 1)).toBe(1750);
  });

  it("handles an empty list", () => {
    expect(revealTimeline([], 6)).toEqual([]);
    expect(revealLengthMs([], 6)).toBe(6000);
  });
});
