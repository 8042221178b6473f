import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DraftPoster } from "../actor/postDraft.js";
import { FileDraftStore } from "../minutes/draftStore.js";
import { parseTasks } from "../minutes/taskParser.js";
import type { RoutingRecord } from "../minutes/types.js";
import { InMemoryKeyValueStore } from "../store/keyValueStore.js";
import { KeyedLock } from "../store/keyedLock.js";
import { FakeMessenger, StubSummarizer, StubTranscriber, tempDataDir } from "../testing/fakes.js";
import { MinutesPipeline } from "./minutesPipeline.js";

const reply = {
  meetingName: "Design review",
  summary: "Agreed on the API shape.",
  actions: "・Write the migration（担当：Tanaka、期限：10/20）",
};

describe("MinutesPipeline", () => {
  let dir: string;
  let drafts: FileDraftStore;
  let messenger: FakeMessenger;
  let routing: InMemoryKeyValueStore<RoutingRecord>;
  let summarizer: StubSummarizer;
  let transcriber: StubTranscriber;
  let pipeline: MinutesPipeline;
  const meta = { datetimeLabel: "2026-10-19 10:00" };

  beforeEach(async () => {
    dir = await tempDataDir();
    drafts = new FileDraftStore(dir);
    await drafts.init();
    messenger = new FakeMessenger();
    routing = new InMemoryKeyValueStore<RoutingRecord>();
    summarizer = new StubSummarizer(reply);
    transcriber = new StubTranscriber("we talked about the API");
    const poster = new DraftPoster(messenger, routing, new KeyedLock());
    pipeline = new MinutesPipeline({ drafts, transcriber, summarizer, poster, messenger });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("turns a transcript into a posted draft", async () => {
    const ref = await pipeline.runFromText("d1", "we talked about the API", "Design review", "C1", meta);

    expect(ref).toEqual({ channel: "C1", ts: "1700000000.000001" });
    const draft = await drafts.read("d1");
    expect(draft.title).toBe("Design review");
    expect(draft.datetimeLabel).toBe("2026-10-19 10:00");
    expect(parseTasks(draft.actions)).toEqual([
      { title: "Write the migration", assignee: "Tanaka", due: "10/20" },
    ]);
    expect(await fs.readFile(path.join(dir, "transcripts", "d1.txt"), "utf-8")).toBe("we talked about the API");
    expect(messenger.posted).toHaveLength(1);
    expect(messenger.posted[0].text).toBe("Minutes draft: Design review");
    expect((await routing.get("d1"))?.state).toBe("posted");
  });

  it("transcribes audio before summarizing", async () => {
    const audio = { filePath: path.join(dir, "uploads", "d2.m4a"), filename: "call.m4a" };
    await pipeline.runFromAudio("d2", audio, "Call", "C1", meta);

    expect(transcriber.calls).toEqual([audio]);
    expect(summarizer.calls).toEqual(["we talked about the API"]);
    expect((await drafts.read("d2")).title).toBe("Call");
  });

  it("posts a failure note and posts no draft when summarizing fails", async () => {
    summarizer.error = new Error("model down");
    await expect(pipeline.runFromText("d1", "text", "Design review", "C1", meta)).rejects.toThrow("model down");

    expect(messenger.posted).toEqual([
      { channel: "C1", text: '❌ Could not create minutes for "Design review": model down' },
    ]);
    expect(await drafts.exists("d1")).toBe(false);
    expect(await routing.get("d1")).toBeUndefined();
  });

  it("updates the draft from an earlier attempt on retry", async () => {
    messenger.failOn.add("postMessage");
    await expect(pipeline.runFromText("d1", "text", "Design review", "C1", meta)).rejects.toThrow(
      "postMessage unavailable"
    );
    expect(await drafts.exists("d1")).toBe(true);

    messenger.failOn.clear();
    await pipeline.runFromText("d1", "text", "Design review v2", "C1", meta);
    expect((await drafts.read("d1")).title).toBe("Design review v2");
    expect(messenger.posted).toHaveLength(1);
  });

  it("truncates long titles", async () => {
    await pipeline.runFromText("d1", "text", `  ${"x".repeat(250)}  `, "C1", meta);
    expect((await drafts.read("d1")).title).toBe("x".repeat(200));
  });
});
