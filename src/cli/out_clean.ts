#!/usr/bin/env tsx
/**
 * Output Cleanup Utility
 *
 * Removes generated analysis cases under /out/.
 *
 * Usage:
 *   npm run out:clean            clean the whole /out/ directory
 *   analyze -- --clean           clean before analyzing
 */

import { rmSync, mkdirSync, existsSync, readdirSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

function assertOutDir(outDir: string): string {
  const resolved = path.resolve(outDir);
  if (path.basename(resolved) !== "out") {
    throw new Error(
      `Safety: refusing to clean "${resolved}": target must be named "out".`
    );
  }
  return resolved;
}

/**
 * Remove everything under an output root and recreate it empty.
 * Only directories named "out" are accepted.
 */
export function cleanOutputDir(outDir: string): void {
  const resolved = assertOutDir(outDir);
  if (existsSync(resolved)) {
    rmSync(resolved, { recursive: true, force: true });
  }
  mkdirSync(resolved, { recursive: true });
}

/**
 * Remove a single case directory (out/cases/<caseId>). Returns whether
 * anything was removed.
 */
export function cleanCaseDir(outDir: string, caseId: string): boolean {
  const resolved = assertOutDir(outDir);
  if (caseId.length === 0 || caseId.includes("/") || caseId.includes("\\") || caseId.startsWith(".")) {
    throw new Error(`Safety: invalid case id "${caseId}"`);
  }
  const caseDir = path.join(resolved, "cases", caseId);
  if (!existsSync(caseDir)) return false;
  rmSync(caseDir, { recursive: true, force: true });
  return true;
}

/** Case ids currently present under out/cases/. */
export function listCases(outDir: string): string[] {
  const casesDir = path.join(assertOutDir(outDir), "cases");
  if (!existsSync(casesDir)) return [];
  return readdirSync(casesDir, { withFileTypes: true })
    .filter((d) => d.isDirectory())
    .map((d) => d.name)
    .sort();
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  const ROOT = path.resolve(__dirname, "..", "..");
  const outDir = path.join(ROOT, "out");

  const cases = listCases(outDir);
  console.log(`Cleaning output directory: ${outDir} (${cases.length} case(s))`);
  cleanOutputDir(outDir);
  console.log("Done. /out/ is now empty.");
}
