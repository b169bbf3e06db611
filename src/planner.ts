/**
 * Plan generation: sort files, number them, synthesize target names, then
 * detect and resolve target conflicts. Planning never touches the filesystem
 * beyond stat/exists checks, so it can be re-run for every preview.
 */

import { existsSync, statSync, type Stats } from "node:fs";
import { basename, dirname, extname, join } from "node:path";
import { ConfigError, paddingWidth, type RenameConfig, type SortMethod } from "./config.js";
import { resolvePath, validateConfig, validateRenamePair } from "./validators.js";

/** Safety limit for the auto-increment search before falling back to a timestamp. */
export const MAX_INCREMENT_ATTEMPTS = 10_000;

/** One proposed rename: source → target, with validity and diagnostic. */
export interface PlanEntry {
  readonly source: string;
  readonly target: string;
  readonly valid: boolean;
  readonly diagnostic: string | undefined;
  /** The synthesized target collided with an existing file or an earlier entry. */
  readonly conflict: boolean;
}

/** A numbered target before conflict resolution. */
export interface PlanDraft {
  readonly source: string;
  readonly target: string;
  readonly index: number;
}

export interface PlanSummary {
  readonly total: number;
  readonly ready: number;
  readonly conflicts: number;
  readonly invalid: number;
}

/** Case-insensitive, by code point rather than UTF-16 unit. */
function compareNames(a: string, b: string): number {
  const x = [...basename(a).toLowerCase()];
  const y = [...basename(b).toLowerCase()];
  for (let i = 0; i < Math.min(x.length, y.length); i++) {
    const diff = (x[i].codePointAt(0) ?? 0) - (y[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return x.length - y.length;
}

function statOrUndefined(path: string): Stats | undefined {
  try {
    return statSync(path, { throwIfNoEntry: false });
  } catch {
    return undefined;
  }
}

function modifiedTime(path: string): number {
  return statOrUndefined(path)?.mtimeMs ?? 0;
}

/** Birth time where the filesystem records one, otherwise the inode change time. */
function createdTime(path: string): number {
  const stats = statOrUndefined(path);
  if (stats === undefined) return 0;
  return stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs;
}

function byTime(files: readonly string[], timeOf: (path: string) => number, descending: boolean): string[] {
  const times = new Map(files.map((f) => [f, timeOf(f)]));
  const sign = descending ? -1 : 1;
  return [...files].sort((a, b) => sign * ((times.get(a) ?? 0) - (times.get(b) ?? 0)));
}

/** Sort is stable, so ties keep their input order. */
export function sortFiles(files: readonly string[], method: SortMethod): string[] {
  switch (method) {
    case "date_modified":
      return byTime(files, modifiedTime, false);
    case "date_modified_desc":
      return byTime(files, modifiedTime, true);
    case "date_created":
      return byTime(files, createdTime, false);
    case "date_created_desc":
      return byTime(files, createdTime, true);
    case "selection_order":
      return [...files];
    case "alphabetical":
    default:
      return [...files].sort(compareNames);
  }
}

export function formatIndex(index: number, width: number): string {
  const digits = String(index);
  return width > 0 ? digits.padStart(width, "0") : digits;
}

export function synthesizeName(config: RenameConfig, index: number, extension: string, width: number): string {
  return `${config.baseName}${config.separator}${formatIndex(index, width)}${extension}`;
}

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

function withSuffix(target: string, attempt: number): string {
  const ext = extname(target);
  const stem = basename(target, ext);
  return join(dirname(target), `${stem}_copy${attempt > 1 ? attempt : ""}${ext}`);
}

export type IsTaken = (candidate: string) => boolean;

function nextSuffixed(target: string, isTaken: IsTaken): string {
  let attempt = 1;
  while (isTaken(withSuffix(target, attempt))) attempt++;
  return withSuffix(target, attempt);
}

/**
 * First free numbered name from the draft's index onwards. After
 * MAX_INCREMENT_ATTEMPTS taken names, falls back to a timestamped one.
 */
export function nextIncrement(draft: PlanDraft, config: RenameConfig, width: number, isTaken: IsTaken): string {
  const dir = dirname(draft.target);
  const ext = extname(draft.target);
  for (let index = draft.index; index <= draft.index + MAX_INCREMENT_ATTEMPTS; index++) {
    const candidate = join(dir, synthesizeName(config, index, ext, width));
    if (!isTaken(candidate)) return candidate;
  }
  return join(dir, `${config.baseName}${config.separator}${formatTimestamp(new Date())}${ext}`);
}

function validated(source: string, target: string, conflict: boolean): PlanEntry {
  const check = validateRenamePair(source, target);
  return check.valid
    ? { source, target, valid: true, diagnostic: undefined, conflict }
    : { source, target, valid: false, diagnostic: check.reason, conflict };
}

/**
 * Resolve conflicts in plan order. A target is taken when another file exists
 * there or an earlier valid entry already claimed it, so the first entry wins.
 */
export function resolveConflicts(drafts: readonly PlanDraft[], config: RenameConfig, width: number): PlanEntry[] {
  const claimed = new Set<string>();
  const entries: PlanEntry[] = [];

  for (const draft of drafts) {
    const source = resolvePath(draft.source);
    const isTaken: IsTaken = (candidate) => {
      const resolved = resolvePath(candidate);
      if (claimed.has(resolved)) return true;
      return resolved !== source && existsSync(candidate);
    };

    let entry: PlanEntry;
    if (!isTaken(draft.target)) {
      entry = validated(draft.source, draft.target, false);
    } else {
      const name = basename(draft.target);
      switch (config.conflictStrategy) {
        case "skip":
          entry = {
            source: draft.source,
            target: draft.target,
            valid: false,
            diagnostic: `${name} already exists, will be skipped`,
            conflict: true,
          };
          break;
        case "add_suffix":
          entry = validated(draft.source, nextSuffixed(draft.target, isTaken), true);
          break;
        case "auto_increment":
          entry = validated(draft.source, nextIncrement(draft, config, width, isTaken), true);
          break;
        case "prompt":
        default:
          entry = {
            source: draft.source,
            target: draft.target,
            valid: false,
            diagnostic: `${name} already exists, choose a conflict strategy`,
            conflict: true,
          };
      }
    }

    if (entry.valid) claimed.add(resolvePath(entry.target));
    entries.push(entry);
  }

  return entries;
}

function uniqueFiles(files: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const file of files) {
    const key = resolvePath(file);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(file);
  }
  return out;
}

/**
 * Build the rename plan for a file selection. Throws ConfigError when the
 * configuration itself is invalid; per-file problems are carried in the entries.
 */
export function generatePlan(files: readonly string[], config: RenameConfig): PlanEntry[] {
  const check = validateConfig(config);
  if (!check.valid) throw new ConfigError(check.reason);

  const sorted = sortFiles(uniqueFiles(files), config.sortMethod);
  const width = paddingWidth(config.padding, sorted.length);
  const drafts = sorted.map((source, i): PlanDraft => {
    const index = config.startNumber + i;
    const name = synthesizeName(config, index, extname(source), width);
    return { source, target: join(dirname(source), name), index };
  });
  return resolveConflicts(drafts, config, width);
}

export function summarizePlan(plan: readonly PlanEntry[]): PlanSummary {
  const ready = plan.filter((e) => e.valid).length;
  const conflicts = plan.filter((e) => !e.valid && e.conflict).length;
  return { total: plan.length, ready, conflicts, invalid: plan.length - ready - conflicts };
}
