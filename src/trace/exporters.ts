import type { DTRRecord } from "../shared/types.js";

/**
 * Export DTR chain as JSONL string (one JSON line per record).
 */
export function exportJSONL(chain: readonly DTRRecord[]): string {
  return chain.map((record) => JSON.stringify(record)).join("\n") + "\n";
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Generate a markdown audit summary from the DTR chain.
 */
export function generateAuditSummaryMd(
  chain: readonly DTRRecord[],
  caseId: string,
  generatedAt: Date = new Date()
): string {
  const lines: string[] = [
    `# Audit Summary: Case ${caseId}`,
    "",
    `Generated: ${generatedAt.toISOString()}`,
    "",
    `## Decision Trace Chain (${chain.length} records)`,
    "",
    "| # | Type | Duration (ms) | Content Hash | Valid |",
    "|---|------|--------------|--------------|-------|",
  ];

  for (const dtr of chain) {
    const valid = dtr.validationResults
      ? dtr.validationResults.pass
        ? "PASS"
        : "WARN"
      : "-";
    lines.push(
      `| ${dtr.chainPosition} | ${dtr.traceType} | ${dtr.durationMs} | ${dtr.hashChain.contentHash.slice(0, 16)}... | ${valid} |`
    );
  }

  lines.push("");
  lines.push("## Hash Chain Integrity");
  lines.push("");

  const lastDtr = chain[chain.length - 1];
  if (lastDtr) {
    lines.push(`- **Merkle Root**: \`${lastDtr.hashChain.merkleRoot}\``);
    lines.push(`- **Final Content Hash**: \`${lastDtr.hashChain.contentHash}\``);
    lines.push(`- **Chain Length**: ${chain.length}`);
  }

  // Parameters are the same for every phase of a run; report the first set seen.
  const withParams = chain.find((d) => d.parameters && Object.keys(d.parameters).length > 0);
  if (withParams?.parameters) {
    lines.push("");
    lines.push("## Parameters");
    lines.push("");
    for (const [key, value] of Object.entries(withParams.parameters)) {
      lines.push(`- **${key}**: ${formatValue(value)}`);
    }
  }

  const sources = new Map<string, string>();
  for (const dtr of chain) {
    for (const src of dtr.inputLineage.primarySources) {
      sources.set(src.sourceId, `${src.sourceType} \`${src.sourceHash.slice(0, 16)}...\``);
    }
  }
  if (sources.size > 0) {
    lines.push("");
    lines.push("## Input Sources");
    lines.push("");
    for (const [id, label] of sources) {
      lines.push(`- ${id}: ${label}`);
    }
  }

  const warnings = chain.flatMap((d) =>
    d.validationResults && !d.validationResults.pass
      ? d.validationResults.messages.map((m) => `${d.traceType}: ${m}`)
      : []
  );
  if (warnings.length > 0) {
    lines.push("");
    lines.push("## Validation Warnings");
    lines.push("");
    for (const w of warnings) {
      lines.push(`- ${w}`);
    }
  }

  return lines.join("\n");
}
