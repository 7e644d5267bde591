import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { fileURLToPath } from "url";
import { KnownEventSchema, ReadingRowSchema, validateRecords } from "../src/evidence/schemas.js";
import { parseEventCatalog } from "../src/evidence/catalog.js";
import { parseGaugeFile, parseReadingsCsv } from "../src/evidence/gauge_formats.js";
import { loadPack, loadSeriesFile } from "../src/packs/loader.js";
import { CatalogValidationError } from "../src/shared/errors.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.join(__dirname, "fixtures");
const TEN_DAY = path.join(FIXTURES, "packs", "ten_day");

function fixture(name: string): string {
  return readFileSync(path.join(FIXTURES, "gauge_files", name), "utf-8");
}

describe("Schema Validation: Known Events", () => {
  it("accepts a space-separated timestamp with offset", () => {
    const event = KnownEventSchema.parse({
      id: "e1",
      timestamp: "2020-10-03 15:00:00+00:00",
      name: "Slide",
    });
    expect(event.timestamp.toISOString()).toBe("2020-10-03T15:00:00.000Z");
    expect(event.location).toBe("");
    expect(event.urls).toEqual([]);
  });

  it("converts offsets to UTC", () => {
    const event = KnownEventSchema.parse({
      id: "e1",
      timestamp: "2016-02-09T15:45:00-09:00",
      name: "Slide",
    });
    expect(event.timestamp.toISOString()).toBe("2016-02-10T00:45:00.000Z");
  });

  it("rejects a timestamp without offset", () => {
    const result = KnownEventSchema.safeParse({
      id: "e1",
      timestamp: "2020-10-03T15:00:00",
      name: "Slide",
    });
    expect(result.success).toBe(false);
  });

  it("allows nullable optional details", () => {
    const result = KnownEventSchema.safeParse({
      id: "e1",
      timestamp: "2020-10-03T15:00:00Z",
      name: "Slide",
      fatalities: null,
      powerOutage: null,
      gpsLocation: null,
    });
    expect(result.success).toBe(true);
  });
});

describe("Schema Validation: Reading Rows", () => {
  it("coerces numeric text", () => {
    const { valid, errors } = validateRecords(
      [
        { timestamp: "2020-10-01T00:00:00Z", height: "20.25" },
        { timestamp: "2020-10-01T00:15:00Z", height: "" },
      ],
      ReadingRowSchema
    );
    expect(valid).toEqual([{ timestamp: new Date("2020-10-01T00:00:00Z"), height: 20.25 }]);
    expect(errors.map((e) => e.index)).toEqual([1]);
  });
});

describe("Event Catalog", () => {
  it("returns events in chronological order", () => {
    const events = parseEventCatalog([
      { id: "b", timestamp: "2020-10-03T15:00:00Z", name: "Later" },
      { id: "a", timestamp: "2019-06-01T08:00:00Z", name: "Earlier" },
    ]);
    expect(events.map((e) => e.id)).toEqual(["a", "b"]);
  });

  it("rejects unknown keys", () => {
    try {
      parseEventCatalog([
        { id: "a", timestamp: "2020-10-03T15:00:00Z", name: "Slide", dt_slide: "x" },
      ]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CatalogValidationError);
      if (err instanceof CatalogValidationError) {
        expect(err.issues).toEqual(["0: Unrecognized key(s) in object: 'dt_slide'"]);
      }
    }
  });

  it("rejects duplicate ids", () => {
    try {
      parseEventCatalog([
        { id: "a", timestamp: "2020-10-03T15:00:00Z", name: "Slide" },
        { id: "a", timestamp: "2020-10-04T15:00:00Z", name: "Slide again" },
      ]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CatalogValidationError);
      if (err instanceof CatalogValidationError) {
        expect(err.issues).toEqual(['1.id: Duplicate event id "a"']);
      }
    }
  });

  it("rejects a non-array catalog", () => {
    expect(() => parseEventCatalog({ events: [] })).toThrow(CatalogValidationError);
  });
});

describe("Gauge File Formats", () => {
  it("parses readings CSV", () => {
    const { readings, errors } = parseReadingsCsv(
      "timestamp,height\n2020-10-01T00:00:00Z,20\n2020-10-01T00:15:00Z, 20.5 \n"
    );
    expect(readings.map((r) => r.height)).toEqual([20, 20.5]);
    expect(errors).toEqual([]);
  });

  it("parses the historical export, skipping placeholder rows", () => {
    const { readings, errors } = parseGaugeFile(fixture("historical.csv"), "historical_csv");
    expect(readings.map((r) => [r.timestamp.toISOString(), r.height])).toEqual([
      ["2016-02-09T15:45:00.000Z", 20.86],
      ["2016-02-09T16:00:00.000Z", 20.91],
      ["2016-02-09T16:30:00.000Z", 21.02],
    ]);
    expect(errors).toEqual([{ index: 6, issues: ["height: Expected number, received nan"] }]);
  });

  it("parses USGS RDB rows in local Alaska time", () => {
    const { readings, errors } = parseGaugeFile(fixture("usgs.rdb"), "usgs_rdb");
    expect(readings.map((r) => [r.timestamp.toISOString(), r.height])).toEqual([
      ["2016-02-10T00:45:00.000Z", 20.86],
      ["2016-02-10T01:00:00.000Z", 20.91],
      ["2016-07-01T17:00:00.000Z", 19.5],
    ]);
    expect(errors).toEqual([
      { index: 5, issues: ['timestamp: unrecognised "2016-07-01 09:15" XYZ'] },
      { index: 6, issues: ["height: Expected number, received nan"] },
    ]);
  });
});

describe("Pack Loader", () => {
  let tmp: string | null = null;

  function makeTmp(): string {
    const dir = mkdtempSync(path.join(tmpdir(), "gauge-pack-"));
    tmp = dir;
    return dir;
  }

  afterEach(() => {
    if (tmp) rmSync(tmp, { recursive: true, force: true });
    tmp = null;
  });

  it("loads the manifest, catalog and series", () => {
    const pack = loadPack(TEN_DAY);
    expect(pack.manifest.packName).toBe("ten_day");
    expect(pack.manifest.thresholds).toEqual({ debounceHours: 12 });
    expect(pack.catalog.map((e) => e.id)).toEqual(["old-quarry-slide", "upper-bench-slide"]);
    expect(pack.catalogHash).toMatch(/^[0-9a-f]{64}$/);
    expect(pack.series).toHaveLength(1);
    expect(pack.series[0].readings).toHaveLength(960);
    expect(pack.series[0].rejectedRows).toBe(0);
    expect(pack.warnings).toEqual([]);
  });

  it("warns about rejected rows", () => {
    const dir = makeTmp();
    writeFileSync(path.join(dir, "historical.csv"), fixture("historical.csv"));
    const { series, warnings } = loadSeriesFile(dir, {
      id: "hist",
      filename: "historical.csv",
      format: "historical_csv",
    });
    expect(series.readings).toHaveLength(3);
    expect(series.rejectedRows).toBe(1);
    expect(warnings).toEqual([
      "historical.csv: 1 row(s) rejected (first at row 6: height: Expected number, received nan)",
    ]);
  });

  it("fails when a series has no valid readings", () => {
    const dir = makeTmp();
    writeFileSync(path.join(dir, "empty.csv"), "timestamp,height\n");
    expect(() =>
      loadSeriesFile(dir, { id: "empty", filename: "empty.csv", format: "readings_csv" })
    ).toThrow(/no valid readings/);
  });

  it("fails on a catalog that is not JSON", () => {
    const dir = makeTmp();
    writeFileSync(
      path.join(dir, "pack.manifest.json"),
      JSON.stringify({
        packName: "broken",
        gauge: { name: "Test Creek" },
        series: [{ id: "s", filename: "s.csv" }],
      })
    );
    writeFileSync(path.join(dir, "known_events.json"), "[{");
    expect(() => loadPack(dir)).toThrow(CatalogValidationError);
  });
});
