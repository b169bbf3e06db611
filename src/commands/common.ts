/**
 * Shared utilities for the CLI commands.
 */

import { lstatSync, readdirSync } from "node:fs";
import { basename, join } from "node:path";
import type { RenameResult, VerifyStats } from "../executor.js";
import type { Session } from "../history.js";
import type { PlanEntry } from "../planner.js";

export const PREVIEW_MAX_LINES = 20;
export const MAX_ERRORS_SHOWN = 5;

/** Regular files directly inside `dir`, as full paths. */
export function listFiles(dir: string): string[] {
  const files: string[] = [];
  for (const name of readdirSync(dir)) {
    const path = join(dir, name);
    try {
      if (lstatSync(path).isFile()) files.push(path);
    } catch {
      // Skip entries we can't stat (e.g. permission denied)
    }
  }
  return files;
}

function planLine(entry: PlanEntry): string {
  const line = `${basename(entry.source)} → ${basename(entry.target)}`;
  if (entry.valid) return entry.conflict ? `${line} (renumbered)` : line;
  return `${line}  ✗ ${entry.diagnostic ?? "invalid"}`;
}

export function formatPreview(plan: readonly PlanEntry[], maxLines: number): string {
  const lines = plan.slice(0, maxLines).map(planLine);
  if (plan.length > maxLines) {
    lines.push(`… and ${plan.length - maxLines} more`);
  }
  return lines.join("\n");
}

function resultLine(result: RenameResult): string {
  return `${basename(result.source)}: ${result.error ?? "failed"}`;
}

export function formatSummary(stats: VerifyStats, maxErrors: number = MAX_ERRORS_SHOWN): string {
  const lines = [
    `Total: ${stats.total}`,
    `Successful: ${stats.successful}`,
    `Failed: ${stats.failed}`,
  ];
  if (stats.skipped > 0) lines.push(`Skipped: ${stats.skipped}`);
  lines.push(`Success rate: ${stats.successRate.toFixed(1)}%`);
  if (stats.failures.length > 0) {
    lines.push("", "Errors:");
    for (const result of stats.failures.slice(0, maxErrors)) {
      lines.push(`  • ${resultLine(result)}`);
    }
    if (stats.failures.length > maxErrors) {
      lines.push(`  … and ${stats.failures.length - maxErrors} more`);
    }
  }
  return lines.join("\n");
}

export function formatSessionList(sessions: readonly Session[]): string {
  return sessions
    .map((s) => `${s.id}  ${s.timestamp}  ${s.count} file${s.count === 1 ? "" : "s"}`)
    .join("\n");
}

export function formatSession(session: Session, maxLines: number): string {
  const lines = session.files
    .slice(0, maxLines)
    .map((r) => `${basename(r.oldPath)} → ${basename(r.newPath)}`);
  if (session.files.length > maxLines) {
    lines.push(`… and ${session.files.length - maxLines} more`);
  }
  return lines.join("\n");
}
