import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileDraftStore } from "../minutes/draftStore.js";
import type { PipelineMeta, WatchChannelRecord } from "../minutes/types.js";
import type { AudioInput } from "../providers/types.js";
import type { MessageRef } from "../slack/messenger.js";
import { InMemoryKeyValueStore } from "../store/keyValueStore.js";
import { KeyedLock } from "../store/keyedLock.js";
import { FakeFileStore, tempDataDir } from "../testing/fakes.js";
import { DriveWatcher, MAX_FILE_ATTEMPTS, PROCESSED_MARKER, type DriveWatcherOptions } from "./watcher.js";

class RecordingPipeline {
  text: Array<{ draftId: string; text: string; title: string; channel: string; meta: PipelineMeta }> = [];
  audio: Array<{ draftId: string; audio: AudioInput; title: string }> = [];
  failTitles = new Set<string>();
  attempts: string[] = [];

  async runFromText(
    draftId: string,
    text: string,
    title: string,
    channel: string,
    meta: PipelineMeta
  ): Promise<MessageRef> {
    this.attempts.push(draftId);
    if (this.failTitles.has(title)) throw new Error(`pipeline failed for ${title}`);
    this.text.push({ draftId, text, title, channel, meta });
    return { channel, ts: "1.1" };
  }

  async runFromAudio(
    draftId: string,
    audio: AudioInput,
    title: string,
    channel: string,
    _meta: PipelineMeta
  ): Promise<MessageRef> {
    this.attempts.push(draftId);
    if (this.failTitles.has(title)) throw new Error(`pipeline failed for ${title}`);
    this.audio.push({ draftId, audio, title });
    return { channel, ts: "1.2" };
  }
}

describe("DriveWatcher", () => {
  let dir: string;
  let drafts: FileDraftStore;
  let files: FakeFileStore;
  let pipeline: RecordingPipeline;
  let channels: InMemoryKeyValueStore<WatchChannelRecord>;
  let locks: KeyedLock;

  beforeEach(async () => {
    dir = await tempDataDir();
    drafts = new FileDraftStore(dir);
    await drafts.init();
    files = new FakeFileStore();
    pipeline = new RecordingPipeline();
    channels = new InMemoryKeyValueStore<WatchChannelRecord>();
    locks = new KeyedLock();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function watcher(overrides: Partial<DriveWatcherOptions> = {}): DriveWatcher {
    return new DriveWatcher(
      { files, pipeline, drafts, channels, locks },
      {
        folderId: "folder-1",
        webhookBaseUrl: "",
        webhookSecret: "test-secret",
        pollIntervalMs: 60_000,
        channel: "C1",
        timeZone: "Asia/Tokyo",
        ...overrides,
      }
    );
  }

  describe("scanning", () => {
    it("runs new text and audio files through the pipeline and marks them", async () => {
      files.add({
        id: "f1",
        name: "standup.txt",
        mimeType: "text/plain",
        content: "hello team",
        createdTime: "2026-10-19T01:00:00Z",
      });
      files.add({ id: "f2", name: "call.m4a", mimeType: "audio/mp4", content: "bytes" });
      files.add({ id: "f3", name: `${PROCESSED_MARKER}old.txt`, mimeType: "text/plain", content: "old" });

      const w = watcher();
      await w.requestScan();

      expect(pipeline.text).toHaveLength(1);
      expect(pipeline.text[0]).toMatchObject({
        text: "hello team",
        title: "standup",
        channel: "C1",
        meta: { datetimeLabel: "2026-10-19 10:00" },
      });
      expect(pipeline.audio).toHaveLength(1);
      expect(pipeline.audio[0].audio.filename).toBe("call.m4a");
      expect(path.dirname(pipeline.audio[0].audio.filePath)).toBe(path.join(dir, "uploads"));
      expect(await fs.readFile(pipeline.audio[0].audio.filePath, "utf-8")).toBe("bytes");

      expect(files.nameOf("f1")).toBe("[processed] standup.txt");
      expect(files.nameOf("f2")).toBe("[processed] call.m4a");
      expect(files.nameOf("f3")).toBe("[processed] old.txt");
      expect(w.lastScanResult).toEqual({ listed: 3, processed: 2, failed: 0, skipped: 0 });
    });

    it("never processes a marked file again", async () => {
      files.add({ id: "f1", name: "standup.txt", mimeType: "text/plain", content: "hello" });
      const w = watcher();
      await w.requestScan();
      await w.requestScan();
      expect(pipeline.text).toHaveLength(1);
      expect(w.lastScanResult).toEqual({ listed: 1, processed: 0, failed: 0, skipped: 0 });
    });

    it("leaves a failed file unmarked and carries on", async () => {
      files.add({ id: "f1", name: "bad.txt", mimeType: "text/plain", content: "x" });
      files.add({ id: "f2", name: "broken.txt", mimeType: "text/plain", content: "y" });
      files.add({ id: "f3", name: "good.txt", mimeType: "text/plain", content: "z" });
      pipeline.failTitles.add("bad");
      files.failDownload.add("f2");

      const w = watcher();
      await w.requestScan();

      expect(files.nameOf("f1")).toBe("bad.txt");
      expect(files.nameOf("f2")).toBe("broken.txt");
      expect(files.nameOf("f3")).toBe("[processed] good.txt");
      expect(w.lastScanResult).toEqual({ listed: 3, processed: 1, failed: 2, skipped: 0 });
    });

    it("retries a failing file under one draft id and then gives up", async () => {
      files.add({ id: "f1", name: "call.m4a", mimeType: "audio/mp4", content: "bytes" });
      pipeline.failTitles.add("call");
      const w = watcher();

      for (let i = 0; i < MAX_FILE_ATTEMPTS + 2; i++) await w.requestScan();

      expect(pipeline.attempts).toEqual(["drive-f1", "drive-f1", "drive-f1"]);
      expect(await fs.readdir(path.join(dir, "uploads"))).toEqual(["drive-f1.m4a"]);
      expect(files.nameOf("f1")).toBe("call.m4a");
      expect(w.lastScanResult).toEqual({ listed: 1, processed: 0, failed: 0, skipped: 1 });
    });

    it("processes a file that succeeds on a later attempt", async () => {
      files.add({ id: "f1", name: "notes.txt", mimeType: "text/plain", content: "hello" });
      pipeline.failTitles.add("notes");
      const w = watcher();
      await w.requestScan();
      pipeline.failTitles.clear();
      await w.requestScan();

      expect(pipeline.text.map((t) => t.draftId)).toEqual(["drive-f1"]);
      expect(files.nameOf("f1")).toBe("[processed] notes.txt");
    });

    it("coalesces scan requests that arrive mid-scan", async () => {
      let release: () => void = () => {};
      files.gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const w = watcher();

      const scans = [w.requestScan(), w.requestScan(), w.requestScan(), w.requestScan()];
      expect(files.listCalls).toBe(1);
      release();
      await Promise.all(scans);
      expect(files.listCalls).toBe(2);
    });
  });

  describe("shutdown", () => {
    it("waits for a scan already in flight", async () => {
      let release: () => void = () => {};
      files.gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      files.add({ id: "f1", name: "standup.txt", mimeType: "text/plain", content: "hello" });
      const w = watcher();
      await w.start();
      expect(files.listCalls).toBe(1);

      let stopped = false;
      const stopping = w.stop().then(() => {
        stopped = true;
      });
      await new Promise<void>((resolve) => setImmediate(resolve));
      expect(stopped).toBe(false);

      release();
      await stopping;
      expect(pipeline.text).toHaveLength(1);
      expect(files.nameOf("f1")).toBe("[processed] standup.txt");
    });

    it("ignores scan requests after stop", async () => {
      const w = watcher();
      await w.start();
      await w.stop();
      const listed = files.listCalls;

      files.add({ id: "f1", name: "late.txt", mimeType: "text/plain", content: "late" });
      await w.requestScan();

      expect(files.listCalls).toBe(listed);
      expect(pipeline.text).toEqual([]);
    });
  });

  describe("subscription", () => {
    const base = "https://bot.example.test";

    it("subscribes on start and tears down on stop", async () => {
      const w = watcher({ webhookBaseUrl: base });
      await w.start();

      expect(w.watchState).toBe("watching");
      expect(files.watches).toHaveLength(1);
      expect(files.watches[0].request.address).toBe("https://bot.example.test/webhooks/drive");
      expect(files.watches[0].request.token).toBe("test-secret");
      const record = await channels.get("folder-1");
      expect(record?.resourceId).toBe("resource-1");

      await w.stop();
      expect(files.stopped).toEqual([record?.channelId]);
      expect(await channels.get("folder-1")).toBeUndefined();
      expect(w.watchState).toBe("unwatched");
    });

    it("keeps one channel per folder", async () => {
      const a = watcher({ webhookBaseUrl: base });
      const b = watcher({ webhookBaseUrl: base });
      await Promise.all([a.ensureSubscribed(), b.ensureSubscribed(), a.ensureSubscribed()]);
      expect(files.watches).toHaveLength(1);
      expect(a.watchState).toBe("watching");
      expect(b.watchState).toBe("watching");
    });

    it("renews a channel that is about to expire", async () => {
      files.expiresInMs = 30 * 60 * 1000;
      const w = watcher({ webhookBaseUrl: base });
      await w.ensureSubscribed();
      const first = await channels.get("folder-1");
      await w.ensureSubscribed();

      expect(files.watches).toHaveLength(2);
      expect(files.stopped).toEqual([first?.channelId]);
      expect((await channels.get("folder-1"))?.resourceId).toBe("resource-2");
    });

    it("falls back to polling when the subscription fails", async () => {
      files.watchError = new Error("push not allowed");
      const w = watcher({ webhookBaseUrl: base });
      await w.ensureSubscribed();
      expect(w.watchState).toBe("unwatched");
      expect(await channels.get("folder-1")).toBeUndefined();
    });

    it("never subscribes without a public base URL", async () => {
      const w = watcher();
      await w.start();
      await w.stop();
      expect(files.watches).toEqual([]);
      expect(w.watchState).toBe("unwatched");
    });
  });
});
