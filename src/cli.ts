#!/usr/bin/env node
/**
 * seqname – rename files to a numbered sequence, with history and undo.
 * Interactive by default; `rename`, `history`, `undo`, `trace` and
 * `set-history` for scripts.
 */

import { runHistory, runSetHistory, runTrace, runUndo } from "./commands/history.js";
import { runInteractive } from "./commands/interactive.js";
import { runScriptMode } from "./commands/script.js";
import { parseArgs, printHelp, printVersion, type ParsedArgs } from "./flags.js";
import { HistoryLog } from "./history.js";
import { readSettings } from "./settings.js";

async function main(): Promise<void> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error("Error:", msg);
    printHelp();
    process.exit(1);
  }

  if (args.help) {
    printHelp();
    process.exit(0);
  }
  if (args.version) {
    printVersion();
    process.exit(0);
  }

  if (args.command === "set-history") {
    await runSetHistory(args);
    return;
  }

  const settings = await readSettings();
  const history = await HistoryLog.open(args.history ?? settings.historyPath);

  switch (args.command) {
    case "rename":
      await runScriptMode(args, history, settings);
      return;
    case "history":
      await runHistory(args, history);
      return;
    case "undo":
      await runUndo(args, history);
      return;
    case "trace":
      runTrace(args, history);
      return;
    case undefined:
      await runInteractive(args.dryRun, history, settings);
      return;
  }
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error("Error:", msg);
  process.exit(1);
});
