// src/components/PercentileCurveChart.tsx

import { useEffect, useMemo, useRef } from "react";
import { init, use as echartsUse, type ECharts, type ComposeOption } from "echarts/core";
import { LineChart, type LineSeriesOption } from "echarts/charts";
import {
  GridComponent,
  LegendComponent,
  MarkLineComponent,
  TooltipComponent,
  type GridComponentOption,
  type LegendComponentOption,
  type MarkLineComponentOption,
  type TooltipComponentOption,
} from "echarts/components";
import { CanvasRenderer } from "echarts/renderers";
import type { ScenarioCard } from "../lib/context";
import { formatUsd } from "../lib/format";

echartsUse([LineChart, GridComponent, LegendComponent, MarkLineComponent, TooltipComponent, CanvasRenderer]);

type ECOption = ComposeOption<
  LineSeriesOption | GridComponentOption | LegendComponentOption | MarkLineComponentOption | TooltipComponentOption
>;

const COLORS = ["#0ea5e9", "#a855f7", "#f97316", "#10b981"];

export default function PercentileCurveChart({ cards, height = 300 }: { cards: ScenarioCard[]; height?: number }) {
  const divRef = useRef<HTMLDivElement>(null);
  const chartRef = useRef<ECharts | null>(null);

  const series = useMemo<LineSeriesOption[]>(
    () =>
      cards
        .filter((card) => card.curvePoints.length)
        .map((card, i) => ({
          type: "line",
          name: card.fullLabel,
          showSymbol: false,
          smooth: true,
          lineStyle: { width: card.isPrimary ? 3 : 1.5 },
          color: COLORS[i % COLORS.length],
          data: card.curvePoints.map((p) => [p.percentile, p.usd]),
          markLine:
            card.highlightMid !== null
              ? {
                  symbol: "none",
                  label: { formatter: `You · Top ${card.highlightMid.toFixed(1)}%` },
                  data: [{ xAxis: card.highlightMid }],
                }
              : undefined,
        })),
    [cards]
  );

  useEffect(() => {
    if (!divRef.current) return;
    chartRef.current = init(divRef.current, undefined, { renderer: "canvas" });
    const onResize = () => chartRef.current?.resize();
    window.addEventListener("resize", onResize);
    return () => {
      window.removeEventListener("resize", onResize);
      chartRef.current?.dispose();
      chartRef.current = null;
    };
  }, []);

  useEffect(() => {
    if (!chartRef.current) return;
    const option: ECOption = {
      grid: { left: 72, right: 20, top: 40, bottom: 44 },
      legend: { top: 0 },
      tooltip: { trigger: "axis", valueFormatter: (v) => (typeof v === "number" ? formatUsd(v) : String(v)) },
      xAxis: {
        type: "value",
        min: 0,
        max: 100,
        name: "Percentile rank (1 = top volume)",
        nameLocation: "middle",
        nameGap: 28,
      },
      yAxis: { type: "log", name: "Volume ceiling (USD)", axisLabel: { formatter: (v: number) => formatUsd(v) } },
      series,
    };
    chartRef.current.setOption(option, true);
  }, [series]);

  return <div ref={divRef} style={{ width: "100%", height }} role="img" aria-label="Volume by percentile per cohort" />;
}
