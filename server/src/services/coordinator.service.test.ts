import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, Mock, vi } from "vitest";
import {
  LargeFileCoordinator,
  MirroredMedia,
  MirroredMessage,
  ProtocolSession,
} from "./coordinator.service";
import { BroadcastHub } from "./broadcast.service";
import { ContextRegistry } from "./context-registry.service";
import { StorageService } from "./storage.service";
import { RateLimitError } from "../errors";
import { MAX_BOT_FILE_SIZE } from "../models/download.model";

const LARGE = MAX_BOT_FILE_SIZE + 1;

function fakeSession(): ProtocolSession {
  return {
    connect: vi.fn(async () => "Test User"),
    disconnect: vi.fn(async () => undefined),
  };
}

function fakeStatusHandle() {
  return { edit: vi.fn(async (_text: string) => undefined) };
}

/** Writes `content` and reports progress at 0%, 50% and 100%. */
function fakeMessage(
  id: number,
  media: MirroredMedia | undefined,
  content = Buffer.alloc(30, 1),
) {
  const download = vi.fn(
    async (
      destination: string,
      onProgress: (current: number, total: number) => void,
    ) => {
      onProgress(0, content.length);
      onProgress(content.length / 2, content.length);
      await fs.promises.writeFile(destination, content);
      onProgress(content.length, content.length);
    },
  );
  const reply = vi.fn(async (_text: string) => undefined);
  const message: MirroredMessage = { id, media, download, reply };
  return { message, download, reply };
}

describe("LargeFileCoordinator", () => {
  let root: string;
  let registry: ContextRegistry;
  let storage: StorageService;
  let hub: BroadcastHub;
  let events: Record<string, unknown>[];
  let wait: Mock<(ms: number) => Promise<void>>;
  let coordinator: LargeFileCoordinator;

  const eventsOfType = (type: string) => events.filter((e) => e.type === type);

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), "file-drop-"));
    registry = new ContextRegistry();
    storage = new StorageService(root);
    hub = new BroadcastHub();
    events = [];
    await hub.join({
      send: async (payload) => {
        events.push(JSON.parse(payload));
      },
    });
    wait = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
    coordinator = new LargeFileCoordinator({
      session: fakeSession(),
      registry,
      storage,
      hub,
      claim: { attempts: 2, intervalMs: 1 },
      wait,
    });
    await coordinator.start();
  });

  afterEach(async () => {
    registry.clear();
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it("is ready only between start and stop", async () => {
    const session = fakeSession();
    const idle = new LargeFileCoordinator({ session, registry, storage, hub });
    expect(idle.isReady).toBe(false);

    await idle.start();
    expect(idle.isReady).toBe(true);

    await idle.stop();
    expect(idle.isReady).toBe(false);
    expect(session.disconnect).toHaveBeenCalledTimes(1);
  });

  it("ignores messages without media", async () => {
    const { message, download } = fakeMessage(1, undefined);

    await coordinator.handleOutgoing(message);

    expect(download).not.toHaveBeenCalled();
  });

  it("leaves files within the Bot API limit alone", async () => {
    registry.put("uid-small", {
      username: "alice",
      fileType: "document",
      originalName: "small.txt",
    });
    const { message, download } = fakeMessage(2, {
      kind: "document",
      uniqueId: "uid-small",
      size: MAX_BOT_FILE_SIZE,
    });

    await coordinator.handleOutgoing(message);

    expect(download).not.toHaveBeenCalled();
    expect(registry.size).toBe(1);
    expect(eventsOfType("file_received")).toHaveLength(0);
  });

  it("downloads a large file under the attribution registered by the bot", async () => {
    const statusHandle = fakeStatusHandle();
    registry.put("uid-1", {
      username: "alice",
      fileType: "video",
      originalName: "movie.mkv",
      statusHandle,
    });
    const { message, reply } = fakeMessage(10, {
      kind: "video",
      uniqueId: "uid-1",
      size: LARGE,
      fileName: "ignored.mkv",
    });

    await coordinator.handleOutgoing(message);

    const saved = await fs.promises.readFile(path.join(root, "movie.mkv"));
    expect(saved.length).toBe(30);
    expect(await fs.promises.readdir(root)).toEqual(["movie.mkv"]);

    const received = eventsOfType("file_received");
    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({
      username: "alice",
      filename: "movie.mkv",
      file_type: "video",
      file_size: 30,
    });

    const progress = eventsOfType("download_progress");
    expect(progress.map((e) => [e.pct, e.done])).toEqual([
      [0, false],
      [50, false],
      [100, false],
      [100, true],
    ]);

    expect(statusHandle.edit.mock.calls.map(([text]) => text)).toEqual([
      "⏳ Downloading: [░░░░░░░░░░] 0%\n`movie.mkv`",
      "⏳ Downloading: [█████░░░░░] 50%\n`movie.mkv`",
      "⏳ Downloading: [██████████] 100%\n`movie.mkv`",
      "✅ *Downloaded:* `movie.mkv`\nSize: 0.0 MB",
    ]);
    expect(reply).not.toHaveBeenCalled();
    expect(registry.size).toBe(0);
  });

  it("waits for a context that is registered after the message arrives", async () => {
    const patient = new LargeFileCoordinator({
      session: fakeSession(),
      registry,
      storage,
      hub,
      claim: { attempts: 5, intervalMs: 60_000 },
    });
    await patient.start();
    const { message } = fakeMessage(11, {
      kind: "audio",
      uniqueId: "uid-late",
      size: LARGE,
    });

    const handled = patient.handleOutgoing(message);
    registry.put("uid-late", {
      username: "bob",
      fileType: "audio",
      originalName: "song.mp3",
    });
    await handled;

    expect(eventsOfType("file_received")[0]).toMatchObject({
      username: "bob",
      filename: "song.mp3",
      file_type: "audio",
    });
  });

  it("falls back to the account name and the media's own name without a context", async () => {
    const { message, reply } = fakeMessage(12, {
      kind: "document",
      uniqueId: "uid-none",
      size: LARGE,
      fileName: "report.pdf",
    });

    await coordinator.handleOutgoing(message);

    expect(eventsOfType("file_received")[0]).toMatchObject({
      username: "Test User",
      filename: "report.pdf",
      file_type: "document",
    });
    expect(reply).toHaveBeenCalledWith("✅ Downloaded: `report.pdf` (0.0 MB)");
  });

  it("names a file after the message when nothing else is known", async () => {
    const { message } = fakeMessage(13, {
      kind: "document",
      uniqueId: "uid-anon",
      size: LARGE,
    });

    await coordinator.handleOutgoing(message);

    expect(await fs.promises.readdir(root)).toEqual(["file_13"]);
  });

  it("downloads media whose size is unknown", async () => {
    const { message, download } = fakeMessage(14, {
      kind: "document",
      uniqueId: "uid-zero",
      size: 0,
      fileName: "unknown.bin",
    });

    await coordinator.handleOutgoing(message);

    expect(download).toHaveBeenCalledTimes(1);
    expect(await fs.promises.readdir(root)).toEqual(["unknown.bin"]);
  });

  it("does not overwrite an existing file with the same name", async () => {
    await fs.promises.writeFile(path.join(root, "movie.mkv"), "old");
    const { message } = fakeMessage(77, {
      kind: "video",
      uniqueId: "uid-dup",
      size: LARGE,
      fileName: "movie.mkv",
    });

    await coordinator.handleOutgoing(message);

    expect(await fs.promises.readFile(path.join(root, "movie.mkv"), "utf8")).toBe(
      "old",
    );
    expect(eventsOfType("file_received")[0]).toMatchObject({
      filename: "movie_77.mkv",
    });
  });

  it("still saves the file when status updates fail", async () => {
    const statusHandle = {
      edit: vi.fn(async (_text: string) => {
        throw new Error("message is not modified");
      }),
    };
    registry.put("uid-2", {
      username: "alice",
      fileType: "document",
      originalName: "big.iso",
      statusHandle,
    });
    const { message } = fakeMessage(15, {
      kind: "document",
      uniqueId: "uid-2",
      size: LARGE,
    });

    await coordinator.handleOutgoing(message);

    expect(await fs.promises.readdir(root)).toEqual(["big.iso"]);
    expect(eventsOfType("file_received")).toHaveLength(1);
  });

  it("reports a failed transfer and leaves no partial file behind", async () => {
    const statusHandle = fakeStatusHandle();
    registry.put("uid-3", {
      username: "alice",
      fileType: "document",
      originalName: "broken.zip",
      statusHandle,
    });
    const { message, download } = fakeMessage(16, {
      kind: "document",
      uniqueId: "uid-3",
      size: LARGE,
    });
    download.mockImplementation(async (destination: string) => {
      await fs.promises.writeFile(destination, "partial");
      throw new Error("connection reset");
    });

    await expect(coordinator.handleOutgoing(message)).resolves.toBeUndefined();

    expect(await fs.promises.readdir(root)).toEqual([]);
    expect(eventsOfType("download_progress")).toEqual([
      expect.objectContaining({
        filename: "broken.zip",
        current_bytes: 0,
        total_bytes: 0,
        pct: 0,
        done: true,
      }),
    ]);
    expect(eventsOfType("error")[0]).toMatchObject({
      error: "Download failed: broken.zip",
    });
    expect(eventsOfType("file_received")).toHaveLength(0);
    expect(statusHandle.edit).toHaveBeenLastCalledWith(
      "❌ Download failed. Check server logs.",
    );
  });

  it("treats a download that produced no file as failed", async () => {
    const { message, download } = fakeMessage(17, {
      kind: "document",
      uniqueId: "uid-4",
      size: LARGE,
      fileName: "ghost.bin",
    });
    download.mockResolvedValue(undefined);

    await coordinator.handleOutgoing(message);

    expect(eventsOfType("file_received")).toHaveLength(0);
    expect(eventsOfType("error")[0]).toMatchObject({
      error: "Download failed: ghost.bin",
    });
  });

  it("backs off for the requested time when rate limited", async () => {
    const statusHandle = fakeStatusHandle();
    registry.put("uid-5", {
      username: "alice",
      fileType: "video",
      originalName: "clip.mp4",
      statusHandle,
    });
    const { message, download } = fakeMessage(18, {
      kind: "video",
      uniqueId: "uid-5",
      size: LARGE,
    });
    download.mockRejectedValue(new RateLimitError(7));

    await coordinator.handleOutgoing(message);

    expect(wait).toHaveBeenCalledWith(7000);
    expect(statusHandle.edit).toHaveBeenLastCalledWith(
      "⚠️ Rate limited — please retry.",
    );
    expect(eventsOfType("file_received")).toHaveLength(0);
  });

  it("keeps handling messages after a failure", async () => {
    const failing = fakeMessage(19, {
      kind: "document",
      uniqueId: "uid-6",
      size: LARGE,
      fileName: "first.bin",
    });
    failing.download.mockRejectedValue(new Error("boom"));
    const working = fakeMessage(20, {
      kind: "document",
      uniqueId: "uid-7",
      size: LARGE,
      fileName: "second.bin",
    });

    await coordinator.handleOutgoing(failing.message);
    await coordinator.handleOutgoing(working.message);

    expect(await fs.promises.readdir(root)).toEqual(["second.bin"]);
  });
});
