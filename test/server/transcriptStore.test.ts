import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { ChatSession } from "../../server/chat/chatTypes.js";
import { isChatError } from "../../server/chat/errors.js";
import { FileTranscriptStore, isValidSessionId, previewOf } from "../../server/chat/transcriptStore.js";

const dirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "tally-store-"));
  dirs.push(dir);
  return dir;
}

afterEach(async () => {
  vi.restoreAllMocks();
  while (dirs.length > 0) {
    const dir = dirs.pop();
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
});

function session(id: string, createdAt: string, firstMessage?: string): ChatSession {
  return {
    id,
    createdAt,
    model: "sonnet-4.5",
    messages: firstMessage
      ? [
          { role: "user", content: firstMessage },
          { role: "assistant", content: "reply" },
        ]
      : [],
    totalCost: 0.0125,
  };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected a rejection");
}

describe("FileTranscriptStore", () => {
  it("round-trips a saved session", async () => {
    const store = new FileTranscriptStore(await tempDir());
    const original = session("20250102_030405_abc123", "2025-01-02T03:04:05.000Z", "hello");

    await store.save(original);

    expect(await store.load(original.id)).toEqual(original);
  });

  it("writes pretty JSON with a trailing newline and leaves no temp files", async () => {
    const dir = await tempDir();
    const store = new FileTranscriptStore(dir);
    const original = session("s1", "2025-01-02T03:04:05.000Z", "hello");

    await store.save(original);

    const raw = await fs.readFile(path.join(dir, "s1.json"), "utf8");
    expect(raw).toBe(`${JSON.stringify(original, null, 2)}\n`);
    expect(await fs.readdir(dir)).toEqual(["s1.json"]);
  });

  it("creates the directory on first use", async () => {
    const dir = path.join(await tempDir(), "nested", "conversations");
    const store = new FileTranscriptStore(dir);

    expect(await store.list()).toEqual([]);
    expect((await fs.stat(dir)).isDirectory()).toBe(true);
  });

  it("reports missing and malformed ids as not found", async () => {
    const store = new FileTranscriptStore(await tempDir());

    expect(isChatError(await rejection(store.load("nope")), "not_found")).toBe(true);
    expect(isChatError(await rejection(store.load("../etc/passwd")), "not_found")).toBe(true);
  });

  it("reports unreadable files as io failures", async () => {
    const dir = await tempDir();
    await fs.writeFile(path.join(dir, "broken.json"), "{not json", "utf8");
    const store = new FileTranscriptStore(dir);

    const err = await rejection(store.load("broken"));

    expect(isChatError(err, "io_failure")).toBe(true);
    expect(isChatError(err) ? err.message.startsWith("Conversation broken is unreadable: ") : false).toBe(true);
  });

  it("keeps the previous file when a save fails", async () => {
    const dir = await tempDir();
    const store = new FileTranscriptStore(dir);
    const first = session("s1", "2025-01-02T03:04:05.000Z", "first");
    await store.save(first);

    vi.spyOn(fs, "rename").mockRejectedValueOnce(new Error("rename blocked"));
    const err = await rejection(store.save({ ...first, totalCost: 9 }));

    expect(isChatError(err, "io_failure")).toBe(true);
    expect(isChatError(err) ? err.message : "").toBe("Failed to save conversation s1: rename blocked");
    expect(await store.load("s1")).toEqual(first);
    expect(await fs.readdir(dir)).toEqual(["s1.json"]);
  });

  it("refuses to save under an id that is not a file name", async () => {
    const store = new FileTranscriptStore(await tempDir());
    const err = await rejection(store.save(session("a/b", "2025-01-01T00:00:00.000Z")));
    expect(isChatError(err, "io_failure")).toBe(true);
  });

  it("lists newest first and skips files it cannot read", async () => {
    const dir = await tempDir();
    const lines: string[] = [];
    const store = new FileTranscriptStore(dir, { log: (line) => lines.push(line) });
    await store.save(session("old", "2025-01-01T00:00:00.000Z", "oldest question"));
    await store.save(session("new", "2025-03-01T00:00:00.000Z", "x".repeat(70)));
    await store.save(session("mid", "2025-02-01T00:00:00.000Z"));
    await fs.writeFile(path.join(dir, "junk.json"), "[]", "utf8");
    await fs.writeFile(path.join(dir, ".draft.tmp"), "partial", "utf8");
    await fs.writeFile(path.join(dir, "notes.txt"), "ignored", "utf8");

    const summaries = await store.list();

    expect(summaries).toEqual([
      {
        id: "new",
        createdAt: "2025-03-01T00:00:00.000Z",
        model: "sonnet-4.5",
        totalCost: 0.0125,
        preview: `${"x".repeat(60)}...`,
      },
      {
        id: "mid",
        createdAt: "2025-02-01T00:00:00.000Z",
        model: "sonnet-4.5",
        totalCost: 0.0125,
        preview: "New conversation",
      },
      {
        id: "old",
        createdAt: "2025-01-01T00:00:00.000Z",
        model: "sonnet-4.5",
        totalCost: 0.0125,
        preview: "oldest question",
      },
    ]);
    expect(lines).toHaveLength(1);
    expect(lines[0]?.startsWith("[store] skipped unreadable transcript file=junk.json error=")).toBe(true);
  });
});

describe("transcript helpers", () => {
  it("previews the first user message", () => {
    expect(previewOf([])).toBe("New conversation");
    expect(
      previewOf([
        { role: "assistant", content: "greeting" },
        { role: "user", content: "question" },
      ]),
    ).toBe("question");
    expect(previewOf([{ role: "user", content: "y".repeat(60) }])).toBe("y".repeat(60));
  });

  it("accepts only file-name-safe ids", () => {
    expect(isValidSessionId("20250102_030405_abc123")).toBe(true);
    expect(isValidSessionId("-leading")).toBe(false);
    expect(isValidSessionId("has space")).toBe(false);
    expect(isValidSessionId("")).toBe(false);
  });
});
