/**
 * User settings (~/.seqname/settings.json): history store location and
 * default rename options.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import {
  parseConflictStrategy,
  parsePadding,
  parseSortMethod,
  type RenameConfig,
} from "./config.js";
import { DEFAULT_HISTORY_PATH } from "./history.js";

export const SETTINGS_DIR = join(homedir(), ".seqname");
const SETTINGS_FILE = "settings.json";

export interface Settings {
  historyPath: string;
  defaults: Partial<RenameConfig>;
}

function settingsPath(dir: string): string {
  return join(dir, SETTINGS_FILE);
}

function defaultSettings(): Settings {
  return { historyPath: DEFAULT_HISTORY_PATH, defaults: {} };
}

/** Keep only the recognised fields with the right types. */
function readDefaults(obj: unknown): Partial<RenameConfig> {
  if (obj === null || typeof obj !== "object") return {};
  const o = obj as Record<string, unknown>;
  const out: { -readonly [K in keyof RenameConfig]?: RenameConfig[K] } = {};
  if (typeof o.baseName === "string") out.baseName = o.baseName;
  if (typeof o.separator === "string") out.separator = o.separator;
  if (typeof o.startNumber === "number" && Number.isInteger(o.startNumber)) out.startNumber = o.startNumber;
  if (typeof o.sortMethod === "string") out.sortMethod = parseSortMethod(o.sortMethod);
  if (typeof o.conflictStrategy === "string") out.conflictStrategy = parseConflictStrategy(o.conflictStrategy);
  if (typeof o.padding === "string" || typeof o.padding === "number") out.padding = parsePadding(o.padding);
  return out;
}

/**
 * Load settings. Returns defaults if the file is missing or invalid.
 */
export async function readSettings(dir: string = SETTINGS_DIR): Promise<Settings> {
  try {
    const raw = await readFile(settingsPath(dir), "utf-8");
    const data = JSON.parse(raw) as unknown;
    if (data === null || typeof data !== "object") return defaultSettings();
    const o = data as Record<string, unknown>;
    return {
      historyPath:
        typeof o.historyPath === "string" && o.historyPath.length > 0 ? o.historyPath : DEFAULT_HISTORY_PATH,
      defaults: readDefaults(o.defaults),
    };
  } catch {
    return defaultSettings();
  }
}

/**
 * Write settings. Creates the directory if needed. Throws on write error.
 */
export async function writeSettings(settings: Settings, dir: string = SETTINGS_DIR): Promise<void> {
  await mkdir(dir, { recursive: true });
  await writeFile(settingsPath(dir), JSON.stringify(settings, null, 2), "utf-8");
}

/** Persist a new history store location, keeping the other settings. */
export async function setHistoryPath(path: string, dir: string = SETTINGS_DIR): Promise<Settings> {
  const current = await readSettings(dir);
  const next: Settings = { ...current, historyPath: resolve(path) };
  await writeSettings(next, dir);
  return next;
}
