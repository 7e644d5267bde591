import { describe, it, expect } from "vitest";
import { buildBundleManifest, createCaseBundle } from "../src/exports/bundle.js";
import { sha256String } from "../src/shared/hash.js";
import { buildWindowChartConfig, chartLabel } from "../src/exports/chart.js";
import { renderAnalysisReport } from "../src/exports/docx.js";
import { ResultsAggregator } from "../src/analytics/aggregator.js";
import { classifyWindows } from "../src/analytics/classifier.js";
import { extractWindow } from "../src/analytics/windows.js";
import { DEFAULT_THRESHOLDS } from "../src/shared/thresholds.js";
import { flat, makeEvent, makeSeries, MINUTE } from "./helpers.js";

describe("Case bundle", () => {
  const meta = {
    caseId: "case-1",
    generatedAt: new Date("2020-11-01T00:00:00Z"),
    fingerprint: "f".repeat(64),
  };

  it("lists every file with size and hash in name order", () => {
    const manifest = buildBundleManifest(
      [
        { name: "summary.json", content: "{}" },
        { name: "audit/trace.jsonl", content: Buffer.from("test") },
      ],
      meta
    );
    expect(manifest).toEqual({
      caseId: "case-1",
      generatedAt: "2020-11-01T00:00:00.000Z",
      fingerprint: "f".repeat(64),
      files: [
        {
          name: "audit/trace.jsonl",
          bytes: 4,
          sha256: "9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08",
        },
        { name: "summary.json", bytes: 2, sha256: sha256String("{}") },
      ],
    });
  });

  it("rejects duplicate or reserved entry names", () => {
    expect(() =>
      buildBundleManifest(
        [
          { name: "summary.json", content: "{}" },
          { name: "summary.json", content: "[]" },
        ],
        meta
      )
    ).toThrow(/reserved or duplicated/);
    expect(() => buildBundleManifest([{ name: "MANIFEST.json", content: "{}" }], meta)).toThrow(
      /reserved or duplicated/
    );
  });

  it("produces a zip archive carrying the manifest", async () => {
    const zip = await createCaseBundle([{ name: "summary.json", content: "{}" }], meta);
    expect(zip.subarray(0, 2).toString("latin1")).toBe("PK");
    expect(zip.includes("MANIFEST.json")).toBe(true);
    expect(zip.includes("summary.json")).toBe(true);
  });
});

describe("Window chart config", () => {
  const series = makeSeries("2020-10-01T00:00:00Z", [20, 20, 21, 22, 23, 22]);
  // Anchor 00:45; radius 0.5 h keeps two readings before it and one after.
  const window = extractWindow(series[3], series, 0.5);
  const projection = [
    { timestamp: new Date(series[4].timestamp.getTime() + 15 * MINUTE), height: 25 },
  ];
  const events = [
    makeEvent("inside", "2020-10-01T00:35:00Z"),
    makeEvent("outside", "2020-10-02T00:00:00Z"),
  ];

  const config = buildWindowChartConfig({
    window,
    criticalPoints: [series[0], series[3]],
    projection,
    events,
  });

  it("labels the union of all timestamps", () => {
    expect(config.data.labels).toEqual([
      "2020-10-01 00:15",
      "2020-10-01 00:30",
      "2020-10-01 00:35",
      "2020-10-01 00:45",
      "2020-10-01 01:00",
      "2020-10-01 01:15",
    ]);
  });

  it("aligns every dataset on the axis", () => {
    expect(config.data.datasets.map((d) => [d.label, d.data])).toEqual([
      ["Gauge height (ft)", [20, 21, null, 22, 23, null]],
      ["Critical points", [null, null, null, 22, null, null]],
      ["Critical height", [null, null, null, null, null, 25]],
      ["Known events", [null, null, 25, null, null, null]],
    ]);
  });

  it("titles the chart by its anchor", () => {
    expect(config.options.title).toEqual({
      display: true,
      text: "Critical point 2020-10-01 00:45",
      fontSize: 16,
    });
  });

  it("omits optional datasets", () => {
    const bare = buildWindowChartConfig({ window, criticalPoints: [] });
    expect(bare.data.datasets.map((d) => d.label)).toEqual(["Gauge height (ft)", "Critical points"]);
  });

  it("formats labels in UTC", () => {
    expect(chartLabel(new Date("2016-02-10T00:45:00Z"))).toBe("2016-02-10 00:45");
  });
});

describe("Analysis report", () => {
  it("renders a docx document", async () => {
    const series = makeSeries("2020-10-01T00:00:00Z", flat(200, 20));
    const event = makeEvent("slide", "2020-10-02T01:30:00Z");
    const aggregator = new ResultsAggregator([event]);
    aggregator.observeSeries(series);
    aggregator.accumulate(classifyWindows([extractWindow(series[100], series)], [event]));

    const docx = await renderAnalysisReport(aggregator.summarize(), [event], {
      packName: "test_pack",
      gaugeName: "Test Creek",
      caseId: "case-1",
      thresholds: DEFAULT_THRESHOLDS,
      seriesIds: ["s1"],
      generatedAt: new Date("2020-11-01T00:00:00Z"),
    });

    expect(docx.subarray(0, 2).toString("latin1")).toBe("PK");
    expect(docx.length).toBeGreaterThan(1000);
  });
});
