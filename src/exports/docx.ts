import {
  Document,
  Packer,
  Paragraph,
  TextRun,
  Table,
  TableRow,
  TableCell,
  WidthType,
  HeadingLevel,
  ImageRun,
  AlignmentType,
  BorderStyle,
  ExternalHyperlink,
} from "docx";
import type { KnownEvent } from "../evidence/schemas.js";
import type { ThresholdConfig } from "../shared/thresholds.js";
import type { RunSummary } from "../shared/types.js";

export interface ReportMeta {
  packName: string;
  gaugeName: string;
  stationId?: string;
  caseId: string;
  thresholds: ThresholdConfig;
  seriesIds: string[];
  generatedAt?: Date;
}

export interface ReportChart {
  title: string;
  image: Buffer;
}

const tableBorders = {
  top: { style: BorderStyle.SINGLE, size: 1 },
  bottom: { style: BorderStyle.SINGLE, size: 1 },
  left: { style: BorderStyle.SINGLE, size: 1 },
  right: { style: BorderStyle.SINGLE, size: 1 },
};

function headerCell(text: string): TableCell {
  return new TableCell({
    borders: tableBorders,
    children: [
      new Paragraph({
        children: [new TextRun({ text, bold: true, size: 20, font: "Arial" })],
      }),
    ],
  });
}

function cell(text: string): TableCell {
  return new TableCell({
    borders: tableBorders,
    children: [
      new Paragraph({
        children: [new TextRun({ text, size: 20, font: "Arial" })],
      }),
    ],
  });
}

function heading(text: string): Paragraph {
  return new Paragraph({
    heading: HeadingLevel.HEADING_2,
    children: [new TextRun({ text, bold: true, size: 26, font: "Arial" })],
  });
}

function body(text: string): Paragraph {
  return new Paragraph({
    children: [new TextRun({ text, size: 20, font: "Arial" })],
  });
}

function table(headers: string[], rows: string[][]): Table {
  return new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: [
      new TableRow({ children: headers.map(headerCell) }),
      ...rows.map((r) => new TableRow({ children: r.map(cell) })),
    ],
  });
}

/** Table, or a one-line note when there is nothing to list. */
function tableOrNote(headers: string[], rows: string[][], note: string): Paragraph | Table {
  return rows.length > 0 ? table(headers, rows) : body(note);
}

function formatRatio(value: number | null): string {
  return value === null ? "n/a" : value.toFixed(4);
}

/**
 * Render report.docx: parameters, results, per-outcome tables and the
 * known event catalog.
 */
export async function renderAnalysisReport(
  summary: RunSummary,
  catalog: readonly KnownEvent[],
  meta: ReportMeta,
  charts: readonly ReportChart[] = []
): Promise<Buffer> {
  const sections: Array<Paragraph | Table> = [];
  const station = meta.stationId ? ` (${meta.stationId})` : "";

  sections.push(
    new Paragraph({
      heading: HeadingLevel.HEADING_1,
      children: [
        new TextRun({
          text: "Gauge Critical Point Analysis",
          bold: true,
          size: 32,
          font: "Arial",
        }),
      ],
    }),
    new Paragraph({
      children: [
        new TextRun({
          text: `Gauge: ${meta.gaugeName}${station} | Pack: ${meta.packName} | Case: ${meta.caseId}`,
          size: 22,
          font: "Arial",
        }),
      ],
    }),
    body(
      `Readings analysed: ${summary.earliestReading ?? "n/a"} to ${summary.latestReading ?? "n/a"} | Generated: ${(meta.generatedAt ?? new Date()).toISOString()}`
    ),
    new Paragraph({ children: [] })
  );

  const t = meta.thresholds;
  sections.push(
    heading("Parameters"),
    table(
      ["Parameter", "Value"],
      [
        ["Critical rise (ft)", String(t.riseCritical)],
        ["Critical rate (ft/hr)", String(t.rateCritical)],
        ["Debounce (hours)", String(t.debounceHours)],
        ["Window radius (hours)", String(t.windowRadiusHours)],
        ["Floor height (ft)", t.floorHeight === undefined ? "none" : String(t.floorHeight)],
        ["Series", meta.seriesIds.join(", ")],
      ]
    ),
    new Paragraph({ children: [] })
  );

  const leadStats = summary.leadTimeStats;
  sections.push(
    heading("Results Summary"),
    table(
      ["Measure", "Value"],
      [
        ["Notifications issued", String(summary.notificationsIssued)],
        ["Associated with an event (TP)", String(summary.truePositives)],
        ["Unassociated (FP)", String(summary.falsePositives)],
        ["Events missed (FN)", String(summary.falseNegatives)],
        ["Events outside the readings", String(summary.outOfRangeEvents.length)],
        ["Precision", formatRatio(summary.precision)],
        ["Recall", formatRatio(summary.recall)],
        [
          "Lead time min / median / max (minutes)",
          leadStats ? `${leadStats.min} / ${leadStats.median} / ${leadStats.max}` : "n/a",
        ],
      ]
    ),
    new Paragraph({ children: [] })
  );

  sections.push(
    heading("True Positives"),
    tableOrNote(
      ["Critical Point (UTC)", "Height (ft)", "Event", "Event Time", "Lead Time (min)"],
      summary.truePositiveDetails.map((tp) => [
        tp.criticalPoint.timestamp,
        tp.criticalPoint.height.toFixed(2),
        tp.event.name,
        tp.event.timestamp,
        tp.detectedAfterEvent ? `${tp.leadTimeMinutes} (after event)` : String(tp.leadTimeMinutes),
      ]),
      "No notification was associated with a known event."
    ),
    new Paragraph({ children: [] }),
    heading("False Positives"),
    tableOrNote(
      ["Critical Point (UTC)", "Height (ft)"],
      summary.unassociatedNotificationPoints.map((p) => [p.timestamp, p.height.toFixed(2)]),
      "Every notification was associated with a known event."
    ),
    new Paragraph({ children: [] }),
    heading("False Negatives"),
    tableOrNote(
      ["Event", "Time (UTC)", "Location"],
      summary.falseNegativeEvents.map((e) => [e.name, e.timestamp, e.location]),
      "No known event inside the readings was missed."
    ),
    new Paragraph({ children: [] })
  );

  if (summary.outOfRangeEvents.length > 0) {
    sections.push(
      heading("Events Outside the Readings"),
      body("These events fall outside the analysed readings and are not scored."),
      table(
        ["Event", "Time (UTC)", "Location"],
        summary.outOfRangeEvents.map((e) => [e.name, e.timestamp, e.location])
      ),
      new Paragraph({ children: [] })
    );
  }

  sections.push(heading("Known Event Catalog"));
  for (const event of catalog) {
    const details = [
      event.timestamp.toISOString(),
      event.location,
      event.fatalities !== undefined && event.fatalities !== null
        ? `fatalities: ${event.fatalities}`
        : "",
    ].filter((d) => d.length > 0);
    sections.push(
      new Paragraph({
        children: [
          new TextRun({ text: event.name, bold: true, size: 20, font: "Arial" }),
          new TextRun({ text: ` (${event.id}): ${details.join(", ")}`, size: 20, font: "Arial" }),
        ],
      })
    );
    for (const url of event.urls) {
      sections.push(
        new Paragraph({
          children: [
            new ExternalHyperlink({
              link: url,
              children: [new TextRun({ text: url, style: "Hyperlink", size: 18, font: "Arial" })],
            }),
          ],
        })
      );
    }
  }

  for (const chart of charts) {
    sections.push(
      new Paragraph({ children: [] }),
      heading(chart.title),
      new Paragraph({
        alignment: AlignmentType.CENTER,
        children: [
          new ImageRun({
            data: chart.image,
            transformation: { width: 600, height: 300 },
            type: "png",
          }),
        ],
      })
    );
  }

  const doc = new Document({
    sections: [{ children: sections }],
  });

  return Buffer.from(await Packer.toBuffer(doc));
}
