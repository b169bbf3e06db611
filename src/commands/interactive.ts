/**
 * Interactive mode: prompts for folder and naming options, then preview,
 * confirm, rename with progress, and a summary of the results.
 */

import { existsSync, statSync } from "node:fs";
import { resolve } from "node:path";
import * as p from "@clack/prompts";
import pc from "picocolors";
import {
  CONFLICT_LABELS,
  CONFLICT_STRATEGIES,
  createRenameConfig,
  parsePadding,
  SORT_LABELS,
  SORT_METHODS,
  type ConflictStrategy,
  type RenameConfig,
} from "../config.js";
import { executePlan, verifyResults } from "../executor.js";
import { VERSION } from "../flags.js";
import type { HistoryLog } from "../history.js";
import { generatePlan, summarizePlan, type PlanEntry } from "../planner.js";
import type { Settings } from "../settings.js";
import {
  validateBaseName,
  validateSeparator,
  validateStartNumber,
  type ValidationResult,
} from "../validators.js";
import { formatPreview, formatSummary, listFiles, PREVIEW_MAX_LINES } from "./common.js";

const PADDING_CHOICES = [
  { value: "auto", label: "Auto-detect" },
  { value: "none", label: "No padding (1, 2, 3…)" },
  { value: "2", label: "2 digits (01, 02, 03…)" },
  { value: "3", label: "3 digits (001, 002, 003…)" },
  { value: "4", label: "4 digits (0001, 0002, 0003…)" },
];

function exitIfCancel<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  return value;
}

/** Clack expects an error message, or undefined when the value is fine. */
function reasonOf(check: ValidationResult): string | undefined {
  return check.valid ? undefined : check.reason;
}

async function promptConfig(defaults: RenameConfig): Promise<RenameConfig> {
  const baseName = exitIfCancel(
    await p.text({
      message: "Base name",
      placeholder: "e.g. holiday",
      initialValue: defaults.baseName,
      validate: (value) => reasonOf(validateBaseName(value ?? "")),
    }),
  );
  const separator = exitIfCancel(
    await p.text({
      message: "Separator",
      initialValue: defaults.separator,
      validate: (value) => reasonOf(validateSeparator(value ?? "")),
    }),
  );
  const start = exitIfCancel(
    await p.text({
      message: "Start number",
      initialValue: String(defaults.startNumber),
      validate: (value) => reasonOf(validateStartNumber(value ?? "")),
    }),
  );
  const sortMethod = exitIfCancel(
    await p.select({
      message: "Sort files by",
      initialValue: defaults.sortMethod,
      options: SORT_METHODS.map((m) => ({ value: m, label: SORT_LABELS[m] })),
    }),
  );
  const padding = exitIfCancel(
    await p.select({
      message: "Number padding",
      initialValue: String(defaults.padding),
      options: PADDING_CHOICES,
    }),
  );
  const conflictStrategy = exitIfCancel(
    await p.select({
      message: "When a new name is already taken",
      initialValue: defaults.conflictStrategy,
      options: CONFLICT_STRATEGIES.map((s) => ({ value: s, label: CONFLICT_LABELS[s] })),
    }),
  );

  return createRenameConfig({
    baseName: baseName ?? "",
    separator: separator ?? "",
    startNumber: Number(start),
    sortMethod,
    padding: parsePadding(padding),
    conflictStrategy,
  });
}

/** "prompt" leaves conflicts open; ask once how to settle all of them and re-plan. */
async function settleConflicts(files: string[], config: RenameConfig, plan: PlanEntry[]): Promise<PlanEntry[]> {
  const open = plan.filter((e) => !e.valid && e.conflict).length;
  if (config.conflictStrategy !== "prompt" || open === 0) return plan;

  const choices: ConflictStrategy[] = ["skip", "add_suffix", "auto_increment"];
  const strategy = exitIfCancel(
    await p.select({
      message: `${open} new name${open === 1 ? " is" : "s are"} already taken. How should they be handled?`,
      options: choices.map((s) => ({ value: s, label: CONFLICT_LABELS[s] })),
    }),
  );
  return generatePlan(files, createRenameConfig({ ...config, conflictStrategy: strategy }));
}

export async function runInteractive(dryRun: boolean, history: HistoryLog, settings: Settings): Promise<void> {
  p.intro(pc.bold(pc.cyan(`seqname v${VERSION}`)));

  const dirResult = exitIfCancel(
    await p.path({
      message: "Folder with the files to rename",
      directory: true,
      initialValue: process.cwd(),
    }),
  );
  if (typeof dirResult !== "string") {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  const dir = resolve(dirResult);

  if (!existsSync(dir)) {
    p.log.error(`Directory does not exist: ${dir}`);
    process.exit(1);
  }
  if (!statSync(dir).isDirectory()) {
    p.log.error(`Not a directory: ${dir}`);
    process.exit(1);
  }
  const files = listFiles(dir);
  if (files.length === 0) {
    p.log.message("No files in that folder. Exiting.");
    process.exit(0);
  }
  p.log.info(`${files.length} file${files.length === 1 ? "" : "s"} found.`);

  const config = await promptConfig(createRenameConfig(settings.defaults));

  let plan: PlanEntry[];
  try {
    plan = await settleConflicts(files, config, generatePlan(files, config));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    p.log.error(msg);
    process.exit(1);
  }

  p.note(formatPreview(plan, PREVIEW_MAX_LINES), "Preview");
  const summary = summarizePlan(plan);
  if (summary.ready === 0) {
    p.outro(pc.yellow("No file can be renamed with these settings. Exiting."));
    process.exit(0);
  }

  if (dryRun) {
    p.note("Dry run: no files were renamed.", "Done");
    p.outro(pc.green("Done."));
    process.exit(0);
  }

  const confirmResult = exitIfCancel(
    await p.confirm({
      message: `Rename ${summary.ready} file${summary.ready === 1 ? "" : "s"}?`,
      initialValue: false,
    }),
  );
  if (!confirmResult) {
    p.cancel("Rename cancelled.");
    process.exit(0);
  }

  const sessionsBefore = history.getSessions().length;
  const s = p.spinner();
  s.start("Renaming…");
  const results = await executePlan(plan, history, {
    onProgress: (current, total, filename) => s.message(`Renaming ${current}/${total}: ${filename}`),
  });
  const stats = verifyResults(results);
  s.stop(stats.successful > 0 ? "Done." : "Failed.");

  p.note(formatSummary(stats), "Results");
  const [latest] = history.getSessions();
  if (history.getSessions().length > sessionsBefore && latest !== undefined) {
    p.log.info(`Undo with: seqname undo ${latest.id}`);
  }
  if (stats.successful > 0) {
    p.outro(pc.green("Done."));
  } else {
    p.outro(pc.red("No files were renamed."));
  }
}
