import { existsSync, mkdtempSync, readFileSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createRenameConfig } from "../config.js";
import {
  describeRenameError,
  executePlan,
  PERMISSION_DENIED,
  undoSession,
  verifyResults,
  type RenameResult,
} from "../executor.js";
import { HistoryLog, type Session } from "../history.js";
import { generatePlan, type PlanEntry } from "../planner.js";

describe("describeRenameError", () => {
  it("classifies permission and lock errors", () => {
    expect(describeRenameError(Object.assign(new Error("nope"), { code: "EACCES" }))).toBe(PERMISSION_DENIED);
    expect(describeRenameError(Object.assign(new Error("busy"), { code: "EBUSY" }))).toBe(PERMISSION_DENIED);
  });

  it("surfaces other OS errors with their message", () => {
    expect(describeRenameError(Object.assign(new Error("disk gone"), { code: "EIO" }))).toBe("OS error: disk gone");
  });

  it("captures anything else generically", () => {
    expect(describeRenameError(new Error("boom"))).toBe("Unexpected error: boom");
    expect(describeRenameError("boom")).toBe("Unexpected error: boom");
  });
});

describe("verifyResults", () => {
  it("aggregates counts, skips and success rate", () => {
    const results: RenameResult[] = [
      { source: "/a", target: "/x_1", success: true, error: undefined },
      { source: "/b", target: "/x_2", success: true, error: undefined },
      { source: "/c", target: "/x_3", success: false, error: "x_3 already exists, will be skipped" },
      { source: "/d", target: "/x_4", success: false, error: "OS error: disk gone" },
    ];
    const stats = verifyResults(results);
    expect(stats).toEqual({
      total: 4,
      successful: 2,
      failed: 2,
      skipped: 1,
      successRate: 50,
      failures: [results[2], results[3]],
    });
  });

  it("reports a zero success rate for an empty batch", () => {
    expect(verifyResults([]).successRate).toBe(0);
  });
});

describe("executePlan and undoSession", () => {
  let dir: string;
  let history: HistoryLog;

  function touch(...names: string[]): string[] {
    return names.map((name) => {
      const path = join(dir, name);
      writeFileSync(path, name);
      return path;
    });
  }

  beforeEach(async () => {
    dir = realpathSync(mkdtempSync(join(tmpdir(), "seqname-executor-")));
    history = await HistoryLog.open(join(dir, "state", "history.json"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("renames every valid entry and records one session", async () => {
    const files = touch("vid2.mp4", "vid1.mp4");
    const plan = generatePlan(files, createRenameConfig({ baseName: "clip" }));
    const results = await executePlan(plan, history);

    expect(results.map((r) => r.success)).toEqual([true, true]);
    expect(readFileSync(join(dir, "clip_1.mp4"), "utf-8")).toBe("vid1.mp4");
    expect(readFileSync(join(dir, "clip_2.mp4"), "utf-8")).toBe("vid2.mp4");
    expect(existsSync(join(dir, "vid1.mp4"))).toBe(false);

    const sessions = history.getSessions();
    expect(sessions).toHaveLength(1);
    expect(sessions[0].count).toBe(2);
    expect(sessions[0].files).toEqual([
      { oldPath: join(dir, "vid1.mp4"), newPath: join(dir, "clip_1.mp4") },
      { oldPath: join(dir, "vid2.mp4"), newPath: join(dir, "clip_2.mp4") },
    ]);
  });

  it("reports invalid entries without touching them and keeps going", async () => {
    touch("x_1.txt");
    const files = touch("a.txt", "b.txt");
    const plan = generatePlan(files, createRenameConfig({ baseName: "x", conflictStrategy: "skip" }));
    const results = await executePlan(plan, history);

    expect(results).toEqual([
      {
        source: join(dir, "a.txt"),
        target: join(dir, "x_1.txt"),
        success: false,
        error: "x_1.txt already exists, will be skipped",
      },
      { source: join(dir, "b.txt"), target: join(dir, "x_2.txt"), success: true, error: undefined },
    ]);
    expect(readFileSync(join(dir, "a.txt"), "utf-8")).toBe("a.txt");
    expect(history.getSessions()[0].count).toBe(1);
  });

  it("treats a same-path entry as a successful no-op", async () => {
    const [file] = touch("a.txt");
    const plan: PlanEntry[] = [{ source: file, target: file, valid: true, diagnostic: undefined, conflict: false }];
    const results = await executePlan(plan, history);

    expect(results).toEqual([{ source: file, target: file, success: true, error: undefined }]);
    expect(readFileSync(file, "utf-8")).toBe("a.txt");
    expect(history.getSessions()).toEqual([]);
  });

  it("creates no session when every entry fails", async () => {
    const plan = generatePlan([join(dir, "ghost.txt")], createRenameConfig({ baseName: "x" }));
    const results = await executePlan(plan, history);

    expect(results[0].success).toBe(false);
    expect(history.getSessions()).toEqual([]);
    expect(existsSync(join(dir, "state", "history.json"))).toBe(false);
  });

  it("refuses to overwrite a target that appeared after planning", async () => {
    const plan = generatePlan(touch("a.txt"), createRenameConfig({ baseName: "x" }));
    writeFileSync(join(dir, "x_1.txt"), "intruder");
    const results = await executePlan(plan, history);

    expect(results[0]).toEqual({
      source: join(dir, "a.txt"),
      target: join(dir, "x_1.txt"),
      success: false,
      error: "Target already exists: x_1.txt",
    });
    expect(readFileSync(join(dir, "x_1.txt"), "utf-8")).toBe("intruder");
  });

  it("reports an OS error when the source vanished after planning", async () => {
    const [file] = touch("a.txt");
    const plan = generatePlan([file], createRenameConfig({ baseName: "x" }));
    rmSync(file);
    const [result] = await executePlan(plan, history);

    expect(result.success).toBe(false);
    expect(result.error?.startsWith("OS error: ENOENT")).toBe(true);
  });

  it("reports progress after each file", async () => {
    const files = touch("a.txt", "b.txt");
    const plan = generatePlan(files, createRenameConfig({ baseName: "x" }));
    const calls: [number, number, string][] = [];
    await executePlan(plan, history, { onProgress: (current, total, name) => calls.push([current, total, name]) });

    expect(calls).toEqual([
      [1, 2, "a.txt"],
      [2, 2, "b.txt"],
    ]);
  });

  it("undo restores every renamed file without recording a session", async () => {
    const files = touch("vid2.mp4", "vid1.mp4");
    await executePlan(generatePlan(files, createRenameConfig({ baseName: "clip" })), history);
    const [session] = history.getSessions();

    const results = await undoSession(session);

    expect(results.map((r) => r.success)).toEqual([true, true]);
    expect(readFileSync(join(dir, "vid1.mp4"), "utf-8")).toBe("vid1.mp4");
    expect(readFileSync(join(dir, "vid2.mp4"), "utf-8")).toBe("vid2.mp4");
    expect(existsSync(join(dir, "clip_1.mp4"))).toBe(false);
    expect(history.getSessions()).toHaveLength(1);
  });

  it("undo fails rather than overwrite an existing original path", async () => {
    await executePlan(generatePlan(touch("a.txt"), createRenameConfig({ baseName: "x" })), history);
    writeFileSync(join(dir, "a.txt"), "new file");
    const [session] = history.getSessions();

    const results = await undoSession(session);

    expect(results).toEqual([
      { source: join(dir, "x_1.txt"), target: join(dir, "a.txt"), success: false, error: "Target path already exists" },
    ]);
    expect(readFileSync(join(dir, "a.txt"), "utf-8")).toBe("new file");
    expect(readFileSync(join(dir, "x_1.txt"), "utf-8")).toBe("a.txt");
  });

  it("undo reports a renamed file that no longer exists", async () => {
    await executePlan(generatePlan(touch("a.txt"), createRenameConfig({ baseName: "x" })), history);
    rmSync(join(dir, "x_1.txt"));
    const [session] = history.getSessions();

    const [result] = await undoSession(session);
    expect(result).toEqual({
      source: join(dir, "x_1.txt"),
      target: join(dir, "a.txt"),
      success: false,
      error: "File not found",
    });
  });

  it("undo walks records newest first so chained renames unwind", async () => {
    const [c] = touch("c.txt");
    const a = join(dir, "a.txt");
    const b = join(dir, "b.txt");
    const session: Session = {
      id: "chain",
      timestamp: "2026-01-01T00:00:00.000Z",
      count: 2,
      files: [
        { oldPath: a, newPath: b },
        { oldPath: b, newPath: c },
      ],
    };
    const progress: string[] = [];

    const results = await undoSession(session, { onProgress: (_i, _t, name) => progress.push(name) });

    expect(results.map((r) => r.success)).toEqual([true, true]);
    expect(progress).toEqual(["c.txt", "b.txt"]);
    expect(readFileSync(a, "utf-8")).toBe("c.txt");
    expect(existsSync(c)).toBe(false);
  });
});
