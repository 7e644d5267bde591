import QuickChart from "quickchart-js";
import type { KnownEvent } from "../evidence/schemas.js";
import { pointsInWindow, windowContains } from "../analytics/windows.js";
import type { Reading, ReadingWindow } from "../shared/types.js";

export interface WindowChartInput {
  window: ReadingWindow;
  /** Critical points to mark, typically every raw critical point in the window */
  criticalPoints: readonly Reading[];
  /** Forward or backward critical-height curve */
  projection?: readonly Reading[];
  events?: readonly KnownEvent[];
  title?: string;
}

export interface ChartDataset {
  label: string;
  data: Array<number | null>;
  borderColor: string;
  backgroundColor?: string;
  borderDash?: number[];
  pointRadius: number;
  showLine?: boolean;
  fill: boolean;
  spanGaps?: boolean;
}

export interface WindowChartConfig {
  type: "line";
  data: { labels: string[]; datasets: ChartDataset[] };
  options: Record<string, unknown>;
}

/** "2016-02-09 15:45" in UTC */
export function chartLabel(instant: Date): string {
  return instant.toISOString().slice(0, 16).replace("T", " ");
}

/**
 * Chart.js line config for one event window: the gauge trace, critical
 * points, the projected critical-height curve and event markers.
 * Every dataset is aligned on the union of all timestamps involved.
 */
export function buildWindowChartConfig(input: WindowChartInput): WindowChartConfig {
  const { window, criticalPoints } = input;
  const projection = input.projection ?? [];
  const events = (input.events ?? []).filter((e) => windowContains(window, e.timestamp));

  const instants = new Set<number>();
  for (const r of window.readings) instants.add(r.timestamp.getTime());
  for (const r of projection) instants.add(r.timestamp.getTime());
  for (const e of events) instants.add(e.timestamp.getTime());
  const axis = [...instants].sort((a, b) => a - b);

  const align = (points: readonly Reading[]): Array<number | null> => {
    const byTime = new Map(points.map((p) => [p.timestamp.getTime(), p.height]));
    return axis.map((t) => byTime.get(t) ?? null);
  };

  const peak = Math.max(...window.readings.map((r) => r.height), ...projection.map((r) => r.height));
  const eventTimes = new Set(events.map((e) => e.timestamp.getTime()));

  const datasets: ChartDataset[] = [
    {
      label: "Gauge height (ft)",
      data: align(window.readings),
      borderColor: "#2563eb",
      backgroundColor: "rgba(37, 99, 235, 0.1)",
      pointRadius: 0,
      fill: false,
      spanGaps: true,
    },
    {
      label: "Critical points",
      data: align(pointsInWindow(window, criticalPoints)),
      borderColor: "#dc2626",
      pointRadius: 4,
      showLine: false,
      fill: false,
    },
  ];

  if (projection.length > 0) {
    datasets.push({
      label: "Critical height",
      data: align(projection),
      borderColor: "#059669",
      borderDash: [5, 5],
      pointRadius: 0,
      fill: false,
      spanGaps: true,
    });
  }

  if (events.length > 0) {
    datasets.push({
      label: "Known events",
      data: axis.map((t) => (eventTimes.has(t) ? peak : null)),
      borderColor: "#7c3aed",
      pointRadius: 6,
      showLine: false,
      fill: false,
    });
  }

  return {
    type: "line",
    data: { labels: axis.map((t) => chartLabel(new Date(t))), datasets },
    options: {
      title: {
        display: true,
        text: input.title ?? `Critical point ${chartLabel(window.anchor.timestamp)}`,
        fontSize: 16,
      },
      scales: {
        xAxes: [{ display: true, scaleLabel: { display: true, labelString: "Time (UTC)" } }],
        yAxes: [{ display: true, scaleLabel: { display: true, labelString: "Gauge Height (ft)" } }],
      },
      legend: { position: "bottom" },
    },
  };
}

/**
 * Render a window chart to PNG through the QuickChart API (network call).
 */
export async function generateWindowChart(input: WindowChartInput): Promise<Buffer> {
  const chart = new QuickChart();
  chart.setConfig(buildWindowChartConfig(input));
  chart.setWidth(800);
  chart.setHeight(400);
  chart.setBackgroundColor("#ffffff");

  const buffer = await chart.toBinary();
  return Buffer.from(buffer);
}
