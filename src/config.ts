/**
 * Rename configuration: naming policy types, defaults and padding rules.
 */

export const SORT_METHODS = [
  "alphabetical",
  "date_modified",
  "date_modified_desc",
  "date_created",
  "date_created_desc",
  "selection_order",
] as const;

export type SortMethod = (typeof SORT_METHODS)[number];

export const SORT_LABELS: Record<SortMethod, string> = {
  alphabetical: "Alphabetical (A-Z)",
  date_modified: "Date modified (oldest first)",
  date_modified_desc: "Date modified (newest first)",
  date_created: "Date created (oldest first)",
  date_created_desc: "Date created (newest first)",
  selection_order: "Selection order",
};

export const CONFLICT_STRATEGIES = ["skip", "add_suffix", "auto_increment", "prompt"] as const;

export type ConflictStrategy = (typeof CONFLICT_STRATEGIES)[number];

export const CONFLICT_LABELS: Record<ConflictStrategy, string> = {
  skip: "Skip (keep original)",
  add_suffix: "Add suffix (_copy)",
  auto_increment: "Auto-increment number",
  prompt: "Ask me",
};

/** "auto" derives the width from the file count; a number is a literal width. */
export type PaddingMode = "auto" | "none" | number;

export const MAX_PADDING = 10;

export interface RenameConfig {
  readonly baseName: string;
  readonly startNumber: number;
  readonly separator: string;
  readonly sortMethod: SortMethod;
  readonly conflictStrategy: ConflictStrategy;
  readonly padding: PaddingMode;
}

export const DEFAULT_CONFIG: RenameConfig = Object.freeze({
  baseName: "",
  startNumber: 1,
  separator: "_",
  sortMethod: "alphabetical",
  conflictStrategy: "auto_increment",
  padding: "auto",
});

/** Thrown when a configuration that fails validation reaches the planner. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function paddingWidth(padding: PaddingMode, totalFiles: number): number {
  if (padding === "none") return 0;
  if (padding === "auto") {
    if (totalFiles < 10) return 0;
    if (totalFiles < 100) return 2;
    if (totalFiles < 1000) return 3;
    return 4;
  }
  return padding;
}

function isSortMethod(value: string): value is SortMethod {
  return SORT_METHODS.some((m) => m === value);
}

function isConflictStrategy(value: string): value is ConflictStrategy {
  return CONFLICT_STRATEGIES.some((s) => s === value);
}

/** Unknown methods fall back to alphabetical. */
export function parseSortMethod(value: string): SortMethod {
  return isSortMethod(value) ? value : "alphabetical";
}

/** Unknown strategies fall back to "prompt", which leaves conflicting targets untouched. */
export function parseConflictStrategy(value: string): ConflictStrategy {
  return isConflictStrategy(value) ? value : "prompt";
}

export function parsePadding(value: string | number): PaddingMode {
  if (value === "auto" || value === "none") return value;
  const width = typeof value === "number" ? value : Number(value);
  if (Number.isInteger(width) && width >= 0 && width <= MAX_PADDING) return width;
  return "auto";
}

/** Merge a partial config over the defaults and freeze the result. */
export function createRenameConfig(partial: Partial<RenameConfig> = {}): RenameConfig {
  return Object.freeze({ ...DEFAULT_CONFIG, ...partial });
}
