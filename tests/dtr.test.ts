import { describe, it, expect } from "vitest";
import { DTRRecorder, validateChain } from "../src/trace/dtr.js";
import { exportJSONL, generateAuditSummaryMd } from "../src/trace/exporters.js";
import type { DTRRecord } from "../src/shared/types.js";

function makeRecorder() {
  const recorder = new DTRRecorder("case-001");
  const now = new Date(Date.UTC(2024, 0, 1));

  recorder.record({
    traceType: "SERIES_INGEST",
    initiatedAt: now,
    completedAt: new Date(now.getTime() + 100),
    inputLineage: {
      primarySources: [
        { sourceId: "known_events.json", sourceHash: "abc123", sourceType: "event_catalog" },
      ],
    },
    parameters: { riseCritical: 2.5, rateCritical: 0.5 },
    reasoningChain: {
      steps: [{ stepNumber: 1, action: "load_catalog", detail: "2 known events" }],
    },
    outputContent: { events: 2 },
    validationResults: { pass: true, messages: [] },
  });

  recorder.record({
    traceType: "CRITICAL_POINT_DETECTION",
    initiatedAt: new Date(now.getTime() + 200),
    completedAt: new Date(now.getTime() + 500),
    inputLineage: {
      primarySources: [
        { sourceId: "known_events.json", sourceHash: "abc123", sourceType: "event_catalog" },
        { sourceId: "gauge_a", sourceHash: "def456", sourceType: "readings_csv" },
      ],
    },
    parameters: { riseCritical: 2.5, rateCritical: 0.5 },
    outputContent: { firstCriticalPoints: 1 },
    validationResults: { pass: false, messages: ["gauge_a segment 1 skipped"] },
  });

  return recorder;
}

describe("DTR Recorder", () => {
  it("maintains chain positions", () => {
    const chain = makeRecorder().getChain();
    expect(chain.map((d) => d.chainPosition)).toEqual([0, 1]);
  });

  it("links each record to the previous content hash", () => {
    const chain = makeRecorder().getChain();
    expect(chain[0].hashChain.previousHash).toBeNull();
    expect(chain[1].hashChain.previousHash).toBe(chain[0].hashChain.contentHash);
  });

  it("content hashes and merkle roots are 64-char hex strings", () => {
    for (const dtr of makeRecorder().getChain()) {
      expect(dtr.hashChain.contentHash).toMatch(/^[a-f0-9]{64}$/);
      expect(dtr.hashChain.merkleRoot).toMatch(/^[a-f0-9]{64}$/);
    }
  });

  it("includes durationMs", () => {
    const chain = makeRecorder().getChain();
    expect(chain[0].durationMs).toBe(100);
    expect(chain[1].durationMs).toBe(300);
  });

  it("filters records by trace type", () => {
    const recorder = makeRecorder();
    expect(recorder.byType("CRITICAL_POINT_DETECTION")).toHaveLength(1);
    expect(recorder.byType("RUN_SUMMARY")).toHaveLength(0);
  });

  it("validateChain returns valid for untampered chain", () => {
    expect(makeRecorder().validateChain()).toEqual({ valid: true, errors: [] });
  });

  it("validateChain accepts a chain read back from JSONL", () => {
    const jsonl = exportJSONL(makeRecorder().getChain());
    const chain: DTRRecord[] = jsonl
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(validateChain(chain).valid).toBe(true);
  });

  it("validateChain detects a tampered parameter", () => {
    const chain = makeRecorder().getChain();
    const tampered = [chain[0], { ...chain[1], parameters: { riseCritical: 3, rateCritical: 0.5 } }];
    expect(validateChain(tampered)).toEqual({
      valid: false,
      errors: ["DTR 1: content hash mismatch"],
    });
  });
});

describe("DTR Exporters", () => {
  it("exportJSONL produces one JSON line per record", () => {
    const jsonl = exportJSONL(makeRecorder().getChain());
    const lines = jsonl.trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1]).traceType).toBe("CRITICAL_POINT_DETECTION");
  });

  it("generateAuditSummaryMd lists the chain, parameters, sources and warnings", () => {
    const chain = makeRecorder().getChain();
    const md = generateAuditSummaryMd(chain, "case-001", new Date(Date.UTC(2024, 0, 2)));
    const lines = md.split("\n");

    expect(lines[0]).toBe("# Audit Summary: Case case-001");
    expect(lines).toContain("Generated: 2024-01-02T00:00:00.000Z");
    expect(lines).toContain(
      `| 0 | SERIES_INGEST | 100 | ${chain[0].hashChain.contentHash.slice(0, 16)}... | PASS |`
    );
    expect(lines).toContain(
      `| 1 | CRITICAL_POINT_DETECTION | 300 | ${chain[1].hashChain.contentHash.slice(0, 16)}... | WARN |`
    );
    expect(lines).toContain(`- **Merkle Root**: \`${chain[1].hashChain.merkleRoot}\``);
    expect(lines).toContain("- **riseCritical**: 2.5");
    expect(lines).toContain("- gauge_a: readings_csv `def456...`");
    expect(lines).toContain("- CRITICAL_POINT_DETECTION: gauge_a segment 1 skipped");
  });
});
