/**
 * Argument parsing shared by the analysis CLIs.
 */

import { existsSync } from "fs";
import path from "path";
import type { ThresholdInput } from "../shared/thresholds.js";
import { MANIFEST_FILENAME } from "./loader.js";

/** Flag name → threshold key. */
export const THRESHOLD_FLAGS: Record<string, keyof ThresholdInput> = {
  "--rise": "riseCritical",
  "--rate": "rateCritical",
  "--debounce": "debounceHours",
  "--radius": "windowRadiusHours",
  "--floor": "floorHeight",
};

export interface ParsedArgs {
  /** Flags taking a value, by name without dashes */
  values: Record<string, string>;
  /** Flags without a value */
  switches: Set<string>;
  positional: string[];
  thresholds: ThresholdInput;
}

/**
 * Split argv into valued flags, switches and positionals. `valued` lists
 * the flags (besides threshold flags) that consume the next argument; such
 * a flag at the end of argv is a usage error.
 */
export function parseArgs(args: readonly string[], valued: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { values: {}, switches: new Set(), positional: [], thresholds: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const thresholdKey = THRESHOLD_FLAGS[arg];

    if (thresholdKey || valued.includes(arg)) {
      if (i + 1 >= args.length) {
        throw new Error(`${arg} expects a value`);
      }
      const value = args[i + 1];
      i++;
      if (thresholdKey) parsed.thresholds[thresholdKey] = value;
      else parsed.values[arg.slice(2)] = value;
    } else if (arg.startsWith("--")) {
      parsed.switches.add(arg.slice(2));
    } else {
      parsed.positional.push(arg);
    }
  }

  return parsed;
}

/** "2,2.5,3" → [2, 2.5, 3] */
export function parseNumberList(value: string, flag: string): number[] {
  const numbers = value
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0)
    .map(Number);
  if (numbers.length === 0 || numbers.some((n) => !Number.isFinite(n) || n <= 0)) {
    throw new Error(`${flag} expects a comma-separated list of positive numbers; got "${value}"`);
  }
  return numbers;
}

/**
 * A directory holding a manifest is used as is; anything else names a
 * pack under <root>/packs/.
 */
export function resolvePackDir(pack: string, root: string): string {
  if (existsSync(path.join(pack, MANIFEST_FILENAME))) return path.resolve(pack);
  return path.join(root, "packs", pack);
}
