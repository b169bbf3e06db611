/**
 * History commands: list, show, clear, undo, trace and relocating the store.
 */

import { undoSession, verifyResults } from "../executor.js";
import type { ParsedArgs } from "../flags.js";
import type { HistoryLog } from "../history.js";
import { setHistoryPath } from "../settings.js";
import { formatSession, formatSessionList, formatSummary, PREVIEW_MAX_LINES } from "./common.js";

export async function runHistory(args: ParsedArgs, history: HistoryLog): Promise<void> {
  if (args.clear) {
    if (!args.yes) {
      console.error("Use --yes to clear all history.");
      process.exit(1);
    }
    await history.clear();
    console.log("History cleared.");
    return;
  }

  const [id] = args.args;
  if (id !== undefined) {
    const session = history.getSession(id);
    if (session === undefined) {
      console.error(`Error: No session with id ${id}`);
      process.exit(1);
    }
    console.log(`${session.id}  ${session.timestamp}`);
    console.log(formatSession(session, PREVIEW_MAX_LINES));
    return;
  }

  const sessions = history.getSessions();
  if (sessions.length === 0) {
    console.log(`No history yet (${history.path}).`);
    return;
  }
  console.log(formatSessionList(sessions));
}

export async function runUndo(args: ParsedArgs, history: HistoryLog): Promise<void> {
  const [id] = args.args;
  const session = id !== undefined ? history.getSession(id) : history.getSessions()[0];
  if (session === undefined) {
    console.error(id !== undefined ? `Error: No session with id ${id}` : "Nothing to undo.");
    process.exit(1);
  }

  console.log(formatSession(session, PREVIEW_MAX_LINES));
  if (!args.yes) {
    console.error("Use --yes to undo this session.");
    process.exit(1);
  }
  const stats = verifyResults(await undoSession(session));
  console.log(formatSummary(stats));
  process.exit(stats.failed > 0 ? 1 : 0);
}

export function runTrace(args: ParsedArgs, history: HistoryLog): void {
  const [file] = args.args;
  if (file === undefined) {
    console.error("Error: trace requires a file path.");
    process.exit(1);
  }
  const original = history.traceOriginalName(file);
  if (original === undefined) {
    console.log("No rename history for this file.");
    return;
  }
  console.log(original);
}

export async function runSetHistory(args: ParsedArgs): Promise<void> {
  const [path] = args.args;
  if (path === undefined) {
    console.error("Error: set-history requires a path.");
    process.exit(1);
  }
  try {
    const settings = await setHistoryPath(path);
    console.log(`History will be stored at ${settings.historyPath}`);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error("Error:", msg);
    process.exit(1);
  }
}
