/**
 * CLI flag parsing and usage/version output.
 */

import { parse } from "@bomb.sh/args";

export const VERSION = "0.1.0";

export const COMMANDS = ["rename", "history", "undo", "trace", "set-history"] as const;

export type Command = (typeof COMMANDS)[number];

export interface ParsedArgs {
  help: boolean;
  version: boolean;
  dryRun: boolean;
  yes: boolean;
  clear: boolean;
  /** undefined means interactive mode. */
  command: Command | undefined;
  /** Positional arguments after the command. */
  args: string[];
  dir: string | undefined;
  name: string | undefined;
  separator: string | undefined;
  start: string | undefined;
  sort: string | undefined;
  conflict: string | undefined;
  padding: string | undefined;
  history: string | undefined;
}

const ARGS_CONFIG = {
  boolean: ["help", "version", "dry-run", "yes", "clear"] as const,
  string: ["dir", "name", "separator", "start", "sort", "conflict", "padding", "history"] as const,
  alias: { h: "help", v: "version", y: "yes" } as const,
};

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

/** Throws on an unknown command. */
export function parseArgs(argv: string[]): ParsedArgs {
  const raw = parse(argv, ARGS_CONFIG);
  const positionals = raw._.map(String);
  const [first, ...rest] = positionals;

  let command: Command | undefined;
  let args: string[] = [];
  if (first !== undefined) {
    if (!isCommand(first)) throw new Error(`Unknown command: ${first}`);
    command = first;
    args = rest;
  }

  return {
    help: Boolean(raw.help),
    version: Boolean(raw.version),
    dryRun: Boolean(raw["dry-run"]),
    yes: Boolean(raw.yes),
    clear: Boolean(raw.clear),
    command,
    args,
    dir: raw.dir,
    name: raw.name,
    separator: raw.separator,
    start: raw.start,
    sort: raw.sort,
    conflict: raw.conflict,
    padding: raw.padding,
    history: raw.history,
  };
}

export function printHelp(): void {
  const usage = `seqname – rename files to a numbered sequence, with history and undo

Usage:
  seqname                                   Interactive mode
  seqname rename [files...] --name <base>   Script mode (preview, then --yes to apply)
  seqname history [id]                      List sessions, or show one session
  seqname history --clear --yes             Delete all history
  seqname undo [id] [--yes]                 Undo a session (newest when no id)
  seqname trace <file>                      Show the name a file had before it was renamed
  seqname set-history <path>                Store history at <path> from now on
  seqname --help                            Show this help
  seqname --version                         Show version

Rename options:
  --dir <path>           Rename every file in this directory (in addition to listed files)
  --name <base>          Base name for the new file names (required)
  --separator <s>        Text between base name and number (default: "_")
  --start <n>            First number (default: 1)
  --sort <method>        alphabetical | date_modified | date_modified_desc |
                         date_created | date_created_desc | selection_order
  --conflict <strategy>  skip | add_suffix | auto_increment | prompt
  --padding <mode>       auto | none | <digits>
  --dry-run              Show preview only, do not rename
  --yes, -y              Apply without confirmation

Global options:
  --history <path>       Use this history file for one invocation

Examples:
  seqname
  seqname rename --dir ./photos --name holiday --dry-run
  seqname rename a.jpg b.jpg --name img --padding 3 --yes
  seqname trace ./photos/holiday_03.jpg`;
  console.log(usage);
}

export function printVersion(): void {
  console.log(VERSION);
}
