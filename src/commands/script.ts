/**
 * Script mode: non-interactive rename via `seqname rename`.
 */

import { existsSync, statSync } from "node:fs";
import { resolve } from "node:path";
import {
  createRenameConfig,
  parseConflictStrategy,
  parsePadding,
  parseSortMethod,
  type RenameConfig,
} from "../config.js";
import { executePlan, verifyResults } from "../executor.js";
import type { ParsedArgs } from "../flags.js";
import type { HistoryLog } from "../history.js";
import { generatePlan, summarizePlan, type PlanEntry } from "../planner.js";
import type { Settings } from "../settings.js";
import { validateStartNumber } from "../validators.js";
import { formatPreview, formatSummary, listFiles, PREVIEW_MAX_LINES } from "./common.js";

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    console.error(`Error: Directory does not exist: ${dir}`);
    process.exit(1);
  }
  if (!statSync(dir).isDirectory()) {
    console.error(`Error: Not a directory: ${dir}`);
    process.exit(1);
  }
}

/** Flags override the saved defaults. Throws on an invalid start number. */
export function configFromArgs(args: ParsedArgs, defaults: Partial<RenameConfig>): RenameConfig {
  const merged = createRenameConfig(defaults);
  let startNumber = merged.startNumber;
  if (args.start !== undefined) {
    const check = validateStartNumber(args.start);
    if (!check.valid) throw new Error(check.reason);
    startNumber = Number(args.start);
  }
  return createRenameConfig({
    ...merged,
    baseName: args.name ?? merged.baseName,
    separator: args.separator ?? merged.separator,
    startNumber,
    sortMethod: args.sort !== undefined ? parseSortMethod(args.sort) : merged.sortMethod,
    conflictStrategy: args.conflict !== undefined ? parseConflictStrategy(args.conflict) : merged.conflictStrategy,
    padding: args.padding !== undefined ? parsePadding(args.padding) : merged.padding,
  });
}

export async function runScriptMode(args: ParsedArgs, history: HistoryLog, settings: Settings): Promise<void> {
  const files = args.args.map((f) => resolve(f));
  if (args.dir !== undefined) {
    ensureDir(args.dir);
    files.push(...listFiles(resolve(args.dir)));
  }
  if (files.length === 0) {
    console.log("No files to rename.");
    process.exit(0);
  }

  let plan: PlanEntry[];
  try {
    plan = generatePlan(files, configFromArgs(args, settings.defaults));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error("Error:", msg);
    process.exit(1);
  }

  console.log(formatPreview(plan, PREVIEW_MAX_LINES));
  const summary = summarizePlan(plan);
  console.log(`\n${summary.ready} ready, ${summary.conflicts} conflicting, ${summary.invalid} invalid`);
  if (args.dryRun) {
    process.exit(0);
  }
  if (summary.ready === 0) {
    console.error("Nothing can be renamed.");
    process.exit(1);
  }
  if (!args.yes) {
    console.error("Use --yes to apply renames in script mode.");
    process.exit(1);
  }

  const results = await executePlan(plan, history);
  const stats = verifyResults(results);
  console.log(formatSummary(stats));
  process.exit(stats.failed > 0 ? 1 : 0);
}
