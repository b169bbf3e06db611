/**
 * History log: persistent, newest-first store of rename sessions.
 *
 * Stored as JSON (default ~/.seqname/history.json) and rewritten wholesale on
 * every mutation using write-to-temp + rename. An unreadable or corrupt store
 * loads as empty.
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { basename, dirname, join } from "node:path";
import pc from "picocolors";
import { resolvePath } from "./validators.js";

export const DEFAULT_HISTORY_PATH = join(homedir(), ".seqname", "history.json");

/** One successful rename inside a session. */
export interface RenameRecord {
  readonly oldPath: string;
  readonly newPath: string;
}

export interface Session {
  readonly id: string;
  /** ISO-8601 creation time. */
  readonly timestamp: string;
  readonly count: number;
  readonly files: readonly RenameRecord[];
}

/** Anything that can persist a finished batch; the executor only needs this. */
export interface SessionRecorder {
  addSession(records: readonly RenameRecord[]): Promise<Session | undefined>;
}

// On-disk shape
interface RecordData {
  old_path: string;
  new_path: string;
}

interface SessionData {
  id: string;
  timestamp: string;
  count: number;
  files: RecordData[];
}

interface HistoryData {
  sessions: SessionData[];
}

export interface HistoryLogOptions {
  /** Called when the store cannot be written; the in-memory change is kept. */
  onSaveError?: (err: Error) => void;
}

function isRecordData(obj: unknown): obj is RecordData {
  if (obj === null || typeof obj !== "object") return false;
  const o = obj as Record<string, unknown>;
  return typeof o.old_path === "string" && typeof o.new_path === "string";
}

function isSessionData(obj: unknown): obj is SessionData {
  if (obj === null || typeof obj !== "object") return false;
  const o = obj as Record<string, unknown>;
  return (
    typeof o.id === "string" &&
    o.id.length > 0 &&
    typeof o.timestamp === "string" &&
    typeof o.count === "number" &&
    Array.isArray(o.files) &&
    o.files.every(isRecordData)
  );
}

function toSession(data: SessionData): Session {
  return {
    id: data.id,
    timestamp: data.timestamp,
    count: data.count,
    files: data.files.map((r) => ({ oldPath: r.old_path, newPath: r.new_path })),
  };
}

function toData(session: Session): SessionData {
  return {
    id: session.id,
    timestamp: session.timestamp,
    count: session.count,
    files: session.files.map((r) => ({ old_path: r.oldPath, new_path: r.newPath })),
  };
}

async function loadSessions(path: string): Promise<Session[]> {
  try {
    const raw = await readFile(path, "utf-8");
    const data = JSON.parse(raw) as unknown;
    if (data === null || typeof data !== "object") return [];
    const sessions = (data as Record<string, unknown>).sessions;
    if (!Array.isArray(sessions)) return [];
    return sessions.filter(isSessionData).map(toSession);
  } catch {
    return [];
  }
}

function reportSaveError(err: Error): void {
  console.error(pc.yellow(`Failed to save history: ${err.message}`));
}

export class HistoryLog implements SessionRecorder {
  private sessions: Session[];

  private constructor(
    readonly path: string,
    sessions: Session[],
    private readonly onSaveError: (err: Error) => void,
  ) {
    this.sessions = sessions;
  }

  /** Load the store at `path`. Never throws for a missing or corrupt file. */
  static async open(path: string = DEFAULT_HISTORY_PATH, options: HistoryLogOptions = {}): Promise<HistoryLog> {
    const sessions = await loadSessions(path);
    return new HistoryLog(path, sessions, options.onSaveError ?? reportSaveError);
  }

  private async save(): Promise<void> {
    const data: HistoryData = { sessions: this.sessions.map(toData) };
    const tmpPath = `${this.path}.tmp.${randomUUID().slice(0, 8)}`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
      await rename(tmpPath, this.path);
    } catch (err: unknown) {
      await rm(tmpPath, { force: true }).catch(() => undefined);
      this.onSaveError(err instanceof Error ? err : new Error(String(err)));
    }
  }

  /** Record a finished batch as the newest session. Empty input records nothing. */
  async addSession(records: readonly RenameRecord[]): Promise<Session | undefined> {
    if (records.length === 0) return undefined;
    const session: Session = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      count: records.length,
      files: records.map((r) => ({ oldPath: r.oldPath, newPath: r.newPath })),
    };
    this.sessions = [session, ...this.sessions];
    await this.save();
    return session;
  }

  getSessions(): readonly Session[] {
    return this.sessions;
  }

  getSession(id: string): Session | undefined {
    return this.sessions.find((s) => s.id === id);
  }

  /**
   * Follow a file's renames backwards, newest session first, and return the
   * file name it had before the earliest recorded rename. A→B then B→C traces
   * C back to A. Returns undefined when the path never appears as a target.
   */
  traceOriginalName(path: string): string | undefined {
    let cursor = resolvePath(path);
    let found = false;

    for (const session of this.sessions) {
      for (const record of session.files) {
        if (resolvePath(record.newPath) === cursor) {
          cursor = resolvePath(record.oldPath);
          found = true;
        }
      }
    }

    return found ? basename(cursor) : undefined;
  }

  async clear(): Promise<void> {
    this.sessions = [];
    await this.save();
  }
}
