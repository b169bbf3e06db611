/**
 * Validation of names, separators, start numbers and rename pairs against
 * filesystem and naming constraints. Every check returns a ValidationResult
 * rather than throwing.
 */

import { accessSync, closeSync, constants, existsSync, openSync, realpathSync, statSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import { MAX_PADDING, type PaddingMode, type RenameConfig } from "./config.js";

export const FORBIDDEN_CHARS = '<>:"/\\|?*';
export const MAX_FILENAME_LENGTH = 255;
export const MAX_PATH_LENGTH = 260;
export const MAX_SEPARATOR_LENGTH = 5;
export const MAX_START_NUMBER = 999_999;

const DECIMAL_DIGITS = /^\s*\d+\s*$/;

export const RESERVED_NAMES: readonly string[] = [
  "CON",
  "PRN",
  "AUX",
  "NUL",
  ...Array.from({ length: 9 }, (_, i) => `COM${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `LPT${i + 1}`),
];

export type ValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: string };

const OK: ValidationResult = { valid: true };

function fail(reason: string): ValidationResult {
  return { valid: false, reason };
}

/** Node system errors carry a string `code` such as "EACCES". */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isPermissionError(err: unknown): boolean {
  const code = errorCode(err);
  return code === "EACCES" || code === "EPERM" || code === "EBUSY";
}

/**
 * Canonical identity of a path: the real path of its parent directory joined
 * with its own name. The file itself is not dereferenced, so a symlink is
 * identified by its own location, as a plain rename would treat it.
 */
export function resolvePath(path: string): string {
  const absolute = resolve(path);
  try {
    return join(realpathSync(dirname(absolute)), basename(absolute));
  } catch {
    return absolute;
  }
}

function forbiddenCharsIn(value: string): string[] {
  return [...FORBIDDEN_CHARS].filter((c) => value.includes(c));
}

export function validateBaseName(name: string): ValidationResult {
  if (name.trim() === "") return fail("Base name cannot be empty");
  const forbidden = forbiddenCharsIn(name);
  if (forbidden.length > 0) {
    return fail(`Base name contains forbidden characters: ${forbidden.join(", ")}`);
  }
  if (RESERVED_NAMES.includes(name.toUpperCase())) {
    return fail(`'${name}' is a reserved system name and cannot be used`);
  }
  if (name !== name.trim()) return fail("Base name cannot have leading or trailing spaces");
  if (name.endsWith(".")) return fail("Base name cannot end with a period");
  return OK;
}

export function validateSeparator(separator: string): ValidationResult {
  if (separator === "") return OK;
  if (forbiddenCharsIn(separator).length > 0) return fail("Separator contains forbidden characters");
  if ([...separator].length > MAX_SEPARATOR_LENGTH) {
    return fail(`Separator is too long (max: ${MAX_SEPARATOR_LENGTH} characters)`);
  }
  return OK;
}

/**
 * Accepts numbers and plain decimal digit strings, since values often come
 * straight from a prompt or flag. "1e3", "0x10" and "1.0" are rejected.
 */
export function validateStartNumber(value: number | string): ValidationResult {
  const num = typeof value === "number" ? value : DECIMAL_DIGITS.test(value) ? Number(value) : Number.NaN;
  if (!Number.isInteger(num)) return fail("Starting number must be a valid integer");
  if (num < 0) return fail("Starting number must be non-negative");
  if (num > MAX_START_NUMBER) return fail(`Starting number is too large (max: ${MAX_START_NUMBER})`);
  return OK;
}

export function validatePadding(padding: PaddingMode): ValidationResult {
  if (padding === "auto" || padding === "none") return OK;
  if (!Number.isInteger(padding) || padding < 0 || padding > MAX_PADDING) {
    return fail(`Padding must be an integer between 0 and ${MAX_PADDING}`);
  }
  return OK;
}

export function validateConfig(config: RenameConfig): ValidationResult {
  for (const check of [
    validateBaseName(config.baseName),
    validateSeparator(config.separator),
    validateStartNumber(config.startNumber),
    validatePadding(config.padding),
  ]) {
    if (!check.valid) return check;
  }
  return OK;
}

/** Exists, is a regular file, and can be opened for append (a proxy for "not locked"). */
export function validateFileAccess(path: string): ValidationResult {
  try {
    const stats = statSync(path, { throwIfNoEntry: false });
    if (stats === undefined) return fail("File does not exist");
    if (!stats.isFile()) return fail("Path is not a file");
    closeSync(openSync(path, "a"));
    return OK;
  } catch (err: unknown) {
    if (isPermissionError(err)) return fail("File is locked or you don't have permission");
    const msg = err instanceof Error ? err.message : String(err);
    return fail(`Cannot access file: ${msg}`);
  }
}

export function validatePathLength(target: string): ValidationResult {
  const name = basename(target);
  if (name.length > MAX_FILENAME_LENGTH) {
    return fail(`Filename too long (${name.length} > ${MAX_FILENAME_LENGTH} chars)`);
  }
  const full = resolvePath(target);
  if (full.length > MAX_PATH_LENGTH) {
    return fail(`Full path too long (${full.length} > ${MAX_PATH_LENGTH} chars)`);
  }
  return OK;
}

export function validateRenamePair(source: string, target: string): ValidationResult {
  if (!existsSync(source)) return fail(`Source file does not exist: ${basename(source)}`);
  const access = validateFileAccess(source);
  if (!access.valid) return access;
  if (resolvePath(source) === resolvePath(target)) return fail("Source and destination are the same");
  const length = validatePathLength(target);
  if (!length.valid) return length;
  const destDir = dirname(resolve(target));
  try {
    accessSync(destDir, constants.W_OK);
  } catch {
    return fail(`Destination directory is not writable: ${destDir}`);
  }
  return OK;
}

export interface FileListReport {
  readonly total: number;
  readonly accessible: number;
  readonly locked: number;
  readonly missing: number;
  readonly errors: readonly { readonly file: string; readonly error: string }[];
}

/** Batch pre-check of a selection: valid when at least one file is accessible. */
export function validateFileList(
  files: readonly string[],
): { readonly result: ValidationResult; readonly report: FileListReport } {
  const errors: { file: string; error: string }[] = [];
  let accessible = 0;
  let locked = 0;
  let missing = 0;

  for (const file of files) {
    const check = validateFileAccess(file);
    if (check.valid) {
      accessible++;
      continue;
    }
    if (check.reason === "File does not exist") missing++;
    else if (check.reason.startsWith("File is locked")) locked++;
    errors.push({ file, error: check.reason });
  }

  const report: FileListReport = { total: files.length, accessible, locked, missing, errors };
  if (files.length === 0) return { result: fail("No files selected"), report };
  if (accessible === 0) return { result: fail("No accessible files found"), report };
  return { result: OK, report };
}
