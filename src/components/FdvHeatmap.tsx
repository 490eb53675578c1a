// src/components/FdvHeatmap.tsx

import { useEffect, useMemo, useRef } from "react";
import { init, use as echartsUse, type ECharts, type ComposeOption } from "echarts/core";
import { HeatmapChart, type HeatmapSeriesOption } from "echarts/charts";
import {
  GridComponent,
  TooltipComponent,
  VisualMapComponent,
  type GridComponentOption,
  type TooltipComponentOption,
  type VisualMapComponentOption,
} from "echarts/components";
import { CanvasRenderer } from "echarts/renderers";
import type { TopLevelFormatterParams } from "echarts/types/dist/shared";
import { formatBillions, formatInt, formatUsd } from "../lib/format";
import type { HeatmapCell } from "../lib/scenario";

echartsUse([HeatmapChart, GridComponent, TooltipComponent, VisualMapComponent, CanvasRenderer]);

type ECOption = ComposeOption<
  HeatmapSeriesOption | GridComponentOption | TooltipComponentOption | VisualMapComponentOption
>;

export default function FdvHeatmap({ cells, height = 260 }: { cells: HeatmapCell[]; height?: number }) {
  const divRef = useRef<HTMLDivElement>(null);
  const chartRef = useRef<ECharts | null>(null);

  const { shares, fdvs, data, tooltips, maxUsd } = useMemo(() => {
    const shares = Array.from(new Set(cells.map((c) => c.sharePct)));
    const fdvs = Array.from(new Set(cells.map((c) => c.fdvBillion)));
    const data: Array<[number, number, number]> = [];
    const tooltips: string[] = [];
    for (const c of cells) {
      data.push([fdvs.indexOf(c.fdvBillion), shares.indexOf(c.sharePct), Math.round(c.usdValue)]);
      tooltips.push(
        `${c.sharePct}% share @ ${formatBillions(c.fdvBillion)}<br/>${formatUsd(c.usdValue)} · ${formatInt(c.tokensPerWallet)} tokens`
      );
    }
    const maxUsd = cells.reduce((m, c) => Math.max(m, c.usdValue), 0);
    return { shares, fdvs, data, tooltips, maxUsd };
  }, [cells]);

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
      grid: { left: 56, right: 16, top: 16, bottom: 64 },
      tooltip: {
        position: "top",
        formatter: (p: TopLevelFormatterParams) => {
          const first = Array.isArray(p) ? p[0] : p;
          return tooltips[first?.dataIndex ?? -1] ?? "";
        },
      },
      xAxis: { type: "category", name: "FDV", nameLocation: "middle", nameGap: 28, data: fdvs.map(formatBillions) },
      yAxis: { type: "category", name: "Tier share", data: shares.map((s) => `${s}%`) },
      visualMap: {
        min: 0,
        max: Math.max(1, Math.round(maxUsd)),
        calculable: true,
        orient: "horizontal",
        left: "center",
        bottom: 0,
        itemHeight: 120,
        inRange: { color: ["#e0f2fe", "#38bdf8", "#0369a1"] },
      },
      series: [
        {
          type: "heatmap",
          data,
          label: { show: true, formatter: (p) => (Array.isArray(p.value) ? formatUsd(Number(p.value[2])) : "") },
          emphasis: { itemStyle: { shadowBlur: 8, shadowColor: "rgba(0,0,0,0.3)" } },
        },
      ],
    };
    chartRef.current.setOption(option, true);
  }, [shares, fdvs, data, tooltips, maxUsd]);

  return <div ref={divRef} style={{ width: "100%", height }} role="img" aria-label="Payout by tier share and FDV" />;
}
