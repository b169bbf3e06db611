import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { HistoryLog } from "../history.js";

describe("HistoryLog", () => {
  let dir: string;
  let storePath: string;

  beforeEach(() => {
    dir = realpathSync(mkdtempSync(join(tmpdir(), "seqname-history-")));
    storePath = join(dir, "history.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("open", () => {
    it("starts empty when the file does not exist", async () => {
      const history = await HistoryLog.open(storePath);
      expect(history.getSessions()).toEqual([]);
    });

    it("treats corrupt JSON as empty", async () => {
      writeFileSync(storePath, "{ not json");
      const history = await HistoryLog.open(storePath);
      expect(history.getSessions()).toEqual([]);
    });

    it("treats a store without a sessions list as empty", async () => {
      writeFileSync(storePath, JSON.stringify({ sessions: "nope" }));
      const history = await HistoryLog.open(storePath);
      expect(history.getSessions()).toEqual([]);
    });

    it("drops malformed sessions and keeps the rest", async () => {
      writeFileSync(
        storePath,
        JSON.stringify({
          sessions: [
            { id: "s2", timestamp: "2026-02-01T00:00:00.000Z", count: 1, files: [{ old_path: "/a", new_path: "/b" }] },
            { id: "broken", timestamp: "2026-01-01T00:00:00.000Z", count: 1, files: [{ old_path: 3 }] },
          ],
        }),
      );
      const history = await HistoryLog.open(storePath);
      expect(history.getSessions()).toEqual([
        { id: "s2", timestamp: "2026-02-01T00:00:00.000Z", count: 1, files: [{ oldPath: "/a", newPath: "/b" }] },
      ]);
    });
  });

  describe("addSession", () => {
    it("does nothing for an empty batch", async () => {
      const history = await HistoryLog.open(storePath);
      expect(await history.addSession([])).toBeUndefined();
      expect(history.getSessions()).toEqual([]);
      expect(existsSync(storePath)).toBe(false);
    });

    it("prepends sessions so the newest comes first", async () => {
      const history = await HistoryLog.open(storePath);
      const first = await history.addSession([{ oldPath: "/a", newPath: "/b" }]);
      const second = await history.addSession([
        { oldPath: "/c", newPath: "/d" },
        { oldPath: "/e", newPath: "/f" },
      ]);

      expect(history.getSessions().map((s) => s.id)).toEqual([second?.id, first?.id]);
      expect(second?.count).toBe(2);
      expect(first?.id).not.toBe(second?.id);
    });

    it("persists the store in the on-disk shape", async () => {
      const history = await HistoryLog.open(storePath);
      const session = await history.addSession([{ oldPath: "/a", newPath: "/b" }]);

      const data = JSON.parse(readFileSync(storePath, "utf-8")) as unknown;
      expect(data).toEqual({
        sessions: [
          {
            id: session?.id,
            timestamp: session?.timestamp,
            count: 1,
            files: [{ old_path: "/a", new_path: "/b" }],
          },
        ],
      });
    });

    it("survives a reopen", async () => {
      const history = await HistoryLog.open(storePath);
      await history.addSession([{ oldPath: "/a", newPath: "/b" }]);

      const reopened = await HistoryLog.open(storePath);
      expect(reopened.getSessions()).toEqual(history.getSessions());
    });

    it("reports a failed write and keeps the session in memory", async () => {
      const blocker = join(dir, "blocker");
      writeFileSync(blocker, "");
      const errors: Error[] = [];
      const history = await HistoryLog.open(join(blocker, "history.json"), {
        onSaveError: (err) => errors.push(err),
      });

      const session = await history.addSession([{ oldPath: "/a", newPath: "/b" }]);

      expect(errors).toHaveLength(1);
      expect(history.getSessions()).toEqual([session]);
    });

    it("removes its temporary file when the final rename fails", async () => {
      mkdirSync(storePath);
      const errors: Error[] = [];
      const history = await HistoryLog.open(storePath, { onSaveError: (err) => errors.push(err) });

      await history.addSession([{ oldPath: "/a", newPath: "/b" }]);

      expect(errors).toHaveLength(1);
      expect(readdirSync(dir)).toEqual(["history.json"]);
    });
  });

  describe("getSession", () => {
    it("finds a session by id", async () => {
      const history = await HistoryLog.open(storePath);
      const session = await history.addSession([{ oldPath: "/a", newPath: "/b" }]);
      expect(history.getSession(session?.id ?? "")).toEqual(session);
    });

    it("returns undefined for an unknown id", async () => {
      const history = await HistoryLog.open(storePath);
      expect(history.getSession("missing")).toBeUndefined();
    });
  });

  describe("traceOriginalName", () => {
    it("follows renames across sessions back to the first name", async () => {
      const a = join(dir, "A.txt");
      const b = join(dir, "B.txt");
      const c = join(dir, "C.txt");
      const history = await HistoryLog.open(storePath);
      await history.addSession([{ oldPath: a, newPath: b }]);
      expect(history.traceOriginalName(b)).toBe("A.txt");

      await history.addSession([{ oldPath: b, newPath: c }]);
      expect(history.traceOriginalName(c)).toBe("A.txt");
    });

    it("matches paths by resolved identity", async () => {
      const history = await HistoryLog.open(storePath);
      await history.addSession([{ oldPath: join(dir, "orig.txt"), newPath: join(dir, "new.txt") }]);
      expect(history.traceOriginalName(join(dir, "sub", "..", "new.txt"))).toBe("orig.txt");
    });

    it("returns undefined for a file with no history", async () => {
      const history = await HistoryLog.open(storePath);
      await history.addSession([{ oldPath: join(dir, "a.txt"), newPath: join(dir, "b.txt") }]);
      expect(history.traceOriginalName(join(dir, "a.txt"))).toBeUndefined();
    });
  });

  describe("clear", () => {
    it("empties the store on disk and in memory", async () => {
      const history = await HistoryLog.open(storePath);
      await history.addSession([{ oldPath: "/a", newPath: "/b" }]);
      await history.clear();

      expect(history.getSessions()).toEqual([]);
      expect(JSON.parse(readFileSync(storePath, "utf-8"))).toEqual({ sessions: [] });
      expect((await HistoryLog.open(storePath)).getSessions()).toEqual([]);
    });
  });
});
