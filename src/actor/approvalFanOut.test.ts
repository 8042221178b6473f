import fs from "fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileDraftStore } from "../minutes/draftStore.js";
import { dueDatePolicy } from "../reminders/policy.js";
import { ReminderScheduler } from "../reminders/scheduler.js";
import { FakeMailer, FakeMessenger, FakeStorage, StubRenderer, sampleDraft, tempDataDir } from "../testing/fakes.js";
import { ApprovalFanOut, summaryText } from "./approvalFanOut.js";

describe("ApprovalFanOut", () => {
  let dir: string;
  let drafts: FileDraftStore;
  let messenger: FakeMessenger;
  let renderer: StubRenderer;
  let reminders: ReminderScheduler;

  beforeEach(async () => {
    dir = await tempDataDir();
    drafts = new FileDraftStore(dir);
    await drafts.init();
    messenger = new FakeMessenger();
    renderer = new StubRenderer();
    reminders = new ReminderScheduler(messenger, {
      policy: dueDatePolicy({ defaultHour: 10, timeZone: "Asia/Tokyo" }),
      userMap: {},
      defaultHour: 10,
      timeZone: "Asia/Tokyo",
      now: () => new Date(Date.UTC(2026, 9, 19, 0, 0)),
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("skips mail and upload when they are not configured", async () => {
    const fanOut = new ApprovalFanOut({ drafts, messenger, renderer, reminders, mailer: null, storage: null });
    const report = await fanOut.run("d1", sampleDraft(), { channel: "C1", ts: "1.1" });

    expect(report.steps).toEqual([
      { step: "progress", status: "ok" },
      { step: "render_minutes", status: "ok" },
      { step: "render_checklist", status: "ok" },
      { step: "mail", status: "skipped", detail: "not configured" },
      { step: "drive_upload", status: "skipped", detail: "not configured" },
      { step: "attach_documents", status: "ok" },
      { step: "task_list", status: "ok" },
      { step: "reminders", status: "ok" },
    ]);
    expect(report.driveLink).toBeNull();
  });

  it("skips the upload when the minutes PDF could not be rendered", async () => {
    renderer.failKinds.add("minutes");
    const mailer = new FakeMailer();
    const storage = new FakeStorage();
    const fanOut = new ApprovalFanOut({ drafts, messenger, renderer, reminders, mailer, storage });
    const report = await fanOut.run("d1", sampleDraft(), { channel: "C1", ts: "1.1" });

    expect(report.steps.find((s) => s.step === "render_minutes")).toEqual({
      step: "render_minutes",
      status: "failed",
      detail: "cannot render minutes",
    });
    expect(report.steps.find((s) => s.step === "drive_upload")).toEqual({
      step: "drive_upload",
      status: "skipped",
      detail: "minutes PDF missing",
    });
    expect(storage.uploaded).toEqual([]);
    expect(mailer.sent[0].attachments).toEqual([
      { filename: "d1_design_checklist.pdf", path: drafts.documentPath("d1", "design_checklist") },
    ]);
    expect(messenger.uploads.map((u) => u.title)).toEqual(["Weekly sync (design checklist)"]);
  });

  it("keeps going after a mail failure", async () => {
    const mailer = new FakeMailer();
    mailer.error = new Error("smtp down");
    const storage = new FakeStorage();
    const fanOut = new ApprovalFanOut({ drafts, messenger, renderer, reminders, mailer, storage });
    const report = await fanOut.run("d1", sampleDraft(), { channel: "C1", ts: "1.1" });

    expect(report.steps.find((s) => s.step === "mail")).toEqual({ step: "mail", status: "failed", detail: "smtp down" });
    expect(report.steps.find((s) => s.step === "drive_upload")).toEqual({ step: "drive_upload", status: "ok" });
    expect(storage.uploaded).toEqual([drafts.documentPath("d1", "minutes")]);
    expect(report.driveLink).toBe("https://drive.example.test/file/drive-file-1");
    const summary = messenger.posted[messenger.posted.length - 1].text ?? "";
    expect(summary.split("\n").pop()).toBe("📁 <https://drive.example.test/file/drive-file-1|Open minutes in Drive>");
  });

  it("posts the task list and the summary into the thread", async () => {
    const fanOut = new ApprovalFanOut({ drafts, messenger, renderer, reminders, mailer: null, storage: null });
    await fanOut.run("d1", sampleDraft(), { channel: "C1", ts: "1.1" });

    expect(messenger.posted.map((m) => m.threadTs)).toEqual(["1.1", "1.1", "1.1"]);
    expect(messenger.posted[1].text).toBe("Action items");
    expect(messenger.posted[2].text?.split("\n")[0]).toBe("📊 *Approval summary*: 6 succeeded, 0 failed, 2 skipped");
  });

  it("reports reminder failures without stopping", async () => {
    messenger.failOn.add("scheduleMessage");
    const fanOut = new ApprovalFanOut({ drafts, messenger, renderer, reminders, mailer: null, storage: null });
    const report = await fanOut.run("d1", sampleDraft(), { channel: "C1", ts: "1.1" });
    expect(report.steps[report.steps.length - 1]).toEqual({
      step: "reminders",
      status: "failed",
      detail: "2 reminder(s) could not be scheduled",
    });
    expect(messenger.posted).toHaveLength(3);
  });
});

describe("summaryText", () => {
  it("lists every step with its status", () => {
    const text = summaryText({
      draftId: "d1",
      driveLink: null,
      steps: [
        { step: "render_minutes", status: "ok" },
        { step: "mail", status: "failed", detail: "smtp down" },
        { step: "drive_upload", status: "skipped", detail: "not configured" },
      ],
    });
    expect(text).toBe(
      [
        "📊 *Approval summary*: 1 succeeded, 1 failed, 1 skipped",
        "  ✅ Minutes PDF",
        "  ❌ Mail: smtp down",
        "  ⏭ Drive upload: not configured",
      ].join("\n")
    );
  });
});
