#!/usr/bin/env tsx
/**
 * CLI: sweep
 *
 * Usage: npm run sweep -- --pack <packName|packDir> --rise 2,2.5,3 --rate 0.4,0.5
 *          [--debounce <hours>] [--radius <hours>] [--floor <ft>] [--out <file.tsv>]
 *
 * Prints the trial table and optionally writes it (and all_results.json
 * beside it).
 */

import "dotenv/config";
import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { loadPack } from "./loader.js";
import { formatSweepTable, runThresholdSweep } from "./sweep.js";
import { parseArgs, parseNumberList, resolvePackDir } from "./cli_args.js";
import type { ParsedArgs } from "./cli_args.js";
import { resolveThresholds } from "../shared/thresholds.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.resolve(__dirname, "..", "..");

const USAGE =
  "Usage: npm run sweep -- --pack <packName|packDir> --rise <list> --rate <list> [--debounce <h>] [--radius <h>] [--floor <ft>] [--out <file.tsv>]";

function main(): void {
  const argv = process.argv.slice(2);
  // --rise and --rate hold lists here, so read them before threshold parsing.
  const lists: Record<string, string> = {};
  const rest: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    if ((argv[i] === "--rise" || argv[i] === "--rate") && i + 1 < argv.length) {
      lists[argv[i]] = argv[i + 1];
      i++;
    } else {
      rest.push(argv[i]);
    }
  }
  let args: ParsedArgs;
  try {
    args = parseArgs(rest, ["--pack", "--out"]);
  } catch (err) {
    console.error(`  ✗ ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    process.exit(1);
  }

  const pack = args.values["pack"] ?? args.positional[0] ?? "";
  if (!pack || !lists["--rise"] || !lists["--rate"]) {
    console.error(USAGE);
    process.exit(1);
  }

  const startTime = Date.now();
  function log(step: string, msg: string) {
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.error(`  [${elapsed}s] [${step}] ${msg}`);
  }

  try {
    const grid = {
      riseCritical: parseNumberList(lists["--rise"], "--rise"),
      rateCritical: parseNumberList(lists["--rate"], "--rate"),
    };
    const loaded = loadPack(resolvePackDir(pack, ROOT));
    for (const w of loaded.warnings) log("WARN", w);

    const base = resolveThresholds(args.thresholds, process.env, loaded.manifest.thresholds);
    log("SWEEP", `${grid.riseCritical.length * grid.rateCritical.length} trials over ${loaded.series.length} series`);

    const trials = runThresholdSweep(loaded, grid, base);
    const table = formatSweepTable(trials);
    process.stdout.write(table);

    const out = args.values["out"];
    if (out) {
      mkdirSync(path.dirname(path.resolve(out)), { recursive: true });
      writeFileSync(out, table);
      writeFileSync(
        path.join(path.dirname(path.resolve(out)), "all_results.json"),
        JSON.stringify(trials, null, 2)
      );
      log("OUTPUT", `Table written to ${out}`);
    }

    log("SWEEP", `✓ Sweep complete in ${((Date.now() - startTime) / 1000).toFixed(1)}s`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ✗ Sweep failed: ${message}`);
    process.exit(1);
  }
}

if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  main();
}
