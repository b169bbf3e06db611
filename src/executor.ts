/**
 * Plan execution and session undo. Each file is renamed independently: a
 * failure is recorded as a result and the batch carries on.
 */

import type { Stats } from "node:fs";
import { lstat, rename } from "node:fs/promises";
import { basename } from "node:path";
import type { RenameRecord, Session, SessionRecorder } from "./history.js";
import type { PlanEntry } from "./planner.js";
import { errorCode, isPermissionError, resolvePath } from "./validators.js";

export const PERMISSION_DENIED = "Permission denied - file may be locked or in use";

export interface RenameResult {
  readonly source: string;
  readonly target: string;
  readonly success: boolean;
  readonly error: string | undefined;
}

/** Called after each file with its 1-based position. */
export type ProgressSink = (current: number, total: number, filename: string) => void;

export interface ExecuteOptions {
  onProgress?: ProgressSink;
}

export interface VerifyStats {
  readonly total: number;
  readonly successful: number;
  readonly failed: number;
  readonly skipped: number;
  /** Percentage, 0 for an empty batch. */
  readonly successRate: number;
  readonly failures: readonly RenameResult[];
}

function succeeded(source: string, target: string): RenameResult {
  return { source, target, success: true, error: undefined };
}

function failed(source: string, target: string, error: string): RenameResult {
  return { source, target, success: false, error };
}

export function describeRenameError(err: unknown): string {
  if (isPermissionError(err)) return PERMISSION_DENIED;
  if (err instanceof Error && errorCode(err) !== undefined) return `OS error: ${err.message}`;
  const msg = err instanceof Error ? err.message : String(err);
  return `Unexpected error: ${msg}`;
}

async function statOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await lstat(path);
  } catch (err: unknown) {
    if (errorCode(err) === "ENOENT") return undefined;
    throw err;
  }
}

/** True when something other than `source` itself occupies `target`. */
async function occupiedByOther(source: string, target: string): Promise<boolean> {
  const targetStats = await statOrUndefined(target);
  if (targetStats === undefined) return false;
  const sourceStats = await statOrUndefined(source);
  return sourceStats === undefined || sourceStats.ino !== targetStats.ino || sourceStats.dev !== targetStats.dev;
}

async function renameOne(source: string, target: string): Promise<RenameResult> {
  try {
    if (await occupiedByOther(source, target)) {
      return failed(source, target, `Target already exists: ${basename(target)}`);
    }
    await rename(source, target);
    return succeeded(source, target);
  } catch (err: unknown) {
    return failed(source, target, describeRenameError(err));
  }
}

/**
 * Execute a plan in order. Invalid entries are reported with their diagnostic
 * and left alone; entries whose source and target are the same file succeed
 * without touching the disk. Successful renames are recorded as one session.
 */
export async function executePlan(
  plan: readonly PlanEntry[],
  history: SessionRecorder,
  options: ExecuteOptions = {},
): Promise<RenameResult[]> {
  const results: RenameResult[] = [];
  const records: RenameRecord[] = [];
  const total = plan.length;

  for (const [i, entry] of plan.entries()) {
    let result: RenameResult;
    if (!entry.valid) {
      result = failed(entry.source, entry.target, entry.diagnostic ?? "Invalid rename");
    } else if (resolvePath(entry.source) === resolvePath(entry.target)) {
      result = succeeded(entry.source, entry.target);
    } else {
      result = await renameOne(entry.source, entry.target);
      if (result.success) records.push({ oldPath: entry.source, newPath: entry.target });
    }
    results.push(result);
    options.onProgress?.(i + 1, total, basename(entry.source));
  }

  await history.addSession(records);
  return results;
}

/**
 * Reverse a session, newest record first. The restored file never replaces
 * something already at its original path. Undo does not record a new session.
 */
export async function undoSession(session: Session, options: ExecuteOptions = {}): Promise<RenameResult[]> {
  const results: RenameResult[] = [];
  const records = [...session.files].reverse();
  const total = records.length;

  for (const [i, record] of records.entries()) {
    const current = record.newPath;
    const original = record.oldPath;
    let result: RenameResult;
    try {
      if ((await statOrUndefined(current)) === undefined) {
        result = failed(current, original, "File not found");
      } else if ((await statOrUndefined(original)) !== undefined) {
        result = failed(current, original, "Target path already exists");
      } else {
        await rename(current, original);
        result = succeeded(current, original);
      }
    } catch (err: unknown) {
      result = failed(current, original, describeRenameError(err));
    }
    results.push(result);
    options.onProgress?.(i + 1, total, basename(current));
  }

  return results;
}

export function verifyResults(results: readonly RenameResult[]): VerifyStats {
  const failures = results.filter((r) => !r.success);
  const successful = results.length - failures.length;
  const skipped = failures.filter((r) => r.error?.toLowerCase().includes("skip") ?? false).length;
  return {
    total: results.length,
    successful,
    failed: failures.length,
    skipped,
    successRate: results.length > 0 ? (successful / results.length) * 100 : 0,
    failures,
  };
}
