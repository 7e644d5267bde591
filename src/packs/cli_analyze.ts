#!/usr/bin/env tsx
/**
 * CLI: analyze
 *
 * Usage: npm run analyze -- --pack <packName|packDir> [--case-id <id>] [--out <dir>]
 *          [--rise <ft>] [--rate <ft/hr>] [--debounce <hours>] [--radius <hours>]
 *          [--floor <ft>] [--charts] [--clean]
 *
 * Thresholds not given on the command line come from the environment
 * (RISE_CRITICAL, RATE_CRITICAL, ...), then the pack manifest.
 */

import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";
import { runPackPipeline } from "./pipeline.js";
import { parseArgs, resolvePackDir } from "./cli_args.js";
import type { ParsedArgs } from "./cli_args.js";
import { cleanCaseDir } from "../cli/out_clean.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.resolve(__dirname, "..", "..");

const USAGE =
  "Usage: npm run analyze -- --pack <packName|packDir> [--case-id <id>] [--out <dir>] [--rise <ft>] [--rate <ft/hr>] [--debounce <h>] [--radius <h>] [--floor <ft>] [--charts] [--clean]";

async function main() {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2), ["--pack", "--case-id", "--out"]);
  } catch (err) {
    console.error(`  ✗ ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    process.exit(1);
  }
  const pack = args.values["pack"] ?? args.positional[0] ?? "";
  if (!pack) {
    console.error(USAGE);
    process.exit(1);
  }

  const packDir = resolvePackDir(pack, ROOT);
  const caseName = args.values["case-id"] || path.basename(packDir);
  const outRoot = path.join(ROOT, "out");
  const outputDir = args.values["out"] ?? path.join(outRoot, "cases", caseName);

  console.log("╔══════════════════════════════════════════════════════════════╗");
  console.log("║  Gauge Critical Point Analysis                              ║");
  console.log("║  Rise / rate thresholds · landslide event correlation       ║");
  console.log("╚══════════════════════════════════════════════════════════════╝");
  console.log();

  const startTime = Date.now();

  function log(step: string, msg: string) {
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`  [${elapsed}s] [${step}] ${msg}`);
  }

  try {
    if (args.switches.has("clean") && !args.values["out"]) {
      const removed = cleanCaseDir(outRoot, caseName);
      log("CLEAN", removed ? `Removed previous case ${caseName}` : "Nothing to clean");
    }

    log("PIPELINE", `Pack: ${packDir}`);
    log("PIPELINE", `Output: ${outputDir}`);

    const result = await runPackPipeline({
      packDir,
      caseId: args.values["case-id"],
      outputDir,
      thresholds: args.thresholds,
      env: process.env,
      charts: args.switches.has("charts"),
      log,
    });

    const t = result.thresholds;
    const s = result.summary;
    log("PARAMS", `rise ${t.riseCritical} ft | rate ${t.rateCritical} ft/hr | debounce ${t.debounceHours} h | radius ${t.windowRadiusHours} h`);
    log("RESULTS", `${s.notificationsIssued} notifications: ${s.associatedNotifications} associated, ${s.unassociatedNotifications} unassociated`);
    log("RESULTS", `TP ${s.truePositives} | FP ${s.falsePositives} | FN ${s.falseNegatives} | out of range ${s.outOfRangeEvents.length}`);
    for (const tp of s.truePositiveDetails) {
      log("RESULTS", `  ${tp.event.name}: lead time ${tp.leadTimeMinutes} min${tp.detectedAfterEvent ? " (after event)" : ""}`);
    }
    for (const w of result.warnings) {
      log("WARN", w);
    }

    const chain = result.dtrRecorder.getChain();
    const chainValidation = result.dtrRecorder.validateChain();
    log("AUDIT", `DTR chain: ${chain.length} records, ${chainValidation.valid ? "VALID" : "INVALID"}`);
    if (chain.length > 0) {
      log("AUDIT", `Merkle root: ${chain[chain.length - 1].hashChain.merkleRoot.slice(0, 32)}...`);
    }
    log("AUDIT", `Fingerprint: ${result.fingerprint}`);

    log("OUTPUT", `Files written to: ${result.outputDir}`);
    log("OUTPUT", `  summary.json, outcomes.json, windows.json, report.docx, audit/, bundle.zip`);

    const totalTime = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log();
    console.log(`  ✓ Analysis complete in ${totalTime}s`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ✗ Analysis failed: ${message}`);
    if (err instanceof Error && err.stack) console.error(err.stack);
    process.exit(1);
  }
}

if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
