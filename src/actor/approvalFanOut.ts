import path from "path";
import { errorMessage } from "../errors.js";
import type { DocumentKind, FileDraftStore } from "../minutes/draftStore.js";
import { parseTasks } from "../minutes/taskParser.js";
import type { Draft } from "../minutes/types.js";
import type { CloudStorage, DocumentRenderer, Mailer, UploadedFile } from "../providers/types.js";
import type { ReminderScheduler } from "../reminders/scheduler.js";
import { renderPlainText } from "../slack/blocks.js";
import type { Messenger, MessageRef } from "../slack/messenger.js";
import { approvedMinutes, taskList } from "../slack/views.js";

export type FanOutStep =
  | "progress"
  | "render_minutes"
  | "render_checklist"
  | "mail"
  | "drive_upload"
  | "attach_documents"
  | "task_list"
  | "reminders";

export type StepStatus = "ok" | "failed" | "skipped";

export interface StepResult {
  step: FanOutStep;
  status: StepStatus;
  detail?: string;
}

export interface FanOutReport {
  draftId: string;
  steps: StepResult[];
  driveLink: string | null;
}

const STEP_LABELS: Record<FanOutStep, string> = {
  progress: "Progress note",
  render_minutes: "Minutes PDF",
  render_checklist: "Design checklist PDF",
  mail: "Mail",
  drive_upload: "Drive upload",
  attach_documents: "Attach documents",
  task_list: "Task list",
  reminders: "Reminders",
};

const STATUS_ICONS: Record<StepStatus, string> = { ok: "✅", failed: "❌", skipped: "⏭" };

export interface ApprovalFanOutDeps {
  drafts: FileDraftStore;
  messenger: Messenger;
  renderer: DocumentRenderer;
  reminders: ReminderScheduler;
  /** Absent when mail is not configured; the step is then skipped. */
  mailer: Mailer | null;
  storage: CloudStorage | null;
}

/**
 * Everything that happens after a draft is approved. Steps run in order,
 * each in isolation: a failure is logged and reported, and the remaining
 * steps still run. Steps that need a rendered document are skipped when
 * rendering it failed.
 */
export class ApprovalFanOut {
  constructor(private readonly deps: ApprovalFanOutDeps) {}

  async run(draftId: string, draft: Draft, ref: MessageRef): Promise<FanOutReport> {
    const report: FanOutReport = { draftId, steps: [], driveLink: null };
    const { messenger } = this.deps;
    const thread = { channel: ref.channel, threadTs: ref.ts };
    const title = draft.title || draft.meetingName || "Meeting minutes";

    await this.attempt(report, "progress", async () => {
      await messenger.postMessage({ ...thread, text: "⏳ Approved. Generating documents and notifying…" });
    });

    const minutesPdf = await this.attempt(report, "render_minutes", () => this.render(draftId, "minutes", draft));
    const checklistPdf = await this.attempt(report, "render_checklist", () =>
      this.render(draftId, "design_checklist", draft)
    );
    const documents: Array<{ path: string; label: string }> = [];
    if (minutesPdf) documents.push({ path: minutesPdf, label: "minutes" });
    if (checklistPdf) documents.push({ path: checklistPdf, label: "design checklist" });

    const { mailer, storage } = this.deps;
    if (!mailer) {
      skip(report, "mail", "not configured");
    } else if (documents.length === 0) {
      skip(report, "mail", "no documents rendered");
    } else {
      await this.attempt(report, "mail", () =>
        mailer.send({
          subject: `[Minutes] ${title}`,
          body: renderPlainText(approvedMinutes(draft)),
          attachments: documents.map((d) => ({ filename: path.basename(d.path), path: d.path })),
        })
      );
    }

    if (!storage) {
      skip(report, "drive_upload", "not configured");
    } else if (!minutesPdf) {
      skip(report, "drive_upload", "minutes PDF missing");
    } else {
      const uploaded: UploadedFile | undefined = await this.attempt(report, "drive_upload", () =>
        storage.upload(minutesPdf, "application/pdf")
      );
      report.driveLink = uploaded?.webViewLink ?? null;
    }

    if (documents.length === 0) {
      skip(report, "attach_documents", "no documents rendered");
    } else {
      await this.attempt(report, "attach_documents", async () => {
        for (const doc of documents) {
          await messenger.uploadFile({
            ...thread,
            filePath: doc.path,
            filename: path.basename(doc.path),
            title: `${title} (${doc.label})`,
          });
        }
      });
    }

    await this.attempt(report, "task_list", async () => {
      await messenger.postMessage({
        ...thread,
        text: "Action items",
        blocks: taskList(draftId, parseTasks(draft.actions)),
      });
    });

    await this.attempt(report, "reminders", async () => {
      const result = await this.deps.reminders.schedule(ref.channel, ref.ts, draft);
      if (result.failed > 0) {
        throw new Error(`${result.failed} reminder(s) could not be scheduled`);
      }
    });

    try {
      await messenger.postMessage({ ...thread, text: summaryText(report) });
    } catch (err) {
      console.error(`[fanout] Could not post summary for ${draftId}:`, errorMessage(err));
    }
    return report;
  }

  private async render(draftId: string, kind: DocumentKind, draft: Draft): Promise<string> {
    return this.deps.renderer.render(kind, draft, this.deps.drafts.documentPath(draftId, kind));
  }

  private async attempt<T>(report: FanOutReport, step: FanOutStep, fn: () => Promise<T>): Promise<T | undefined> {
    try {
      const value = await fn();
      report.steps.push({ step, status: "ok" });
      return value;
    } catch (err) {
      console.error(`[fanout] ${report.draftId} ${step} failed:`, err);
      report.steps.push({ step, status: "failed", detail: errorMessage(err) });
      return undefined;
    }
  }
}

function skip(report: FanOutReport, step: FanOutStep, detail: string): void {
  console.log(`[fanout] ${report.draftId} ${step} skipped: ${detail}`);
  report.steps.push({ step, status: "skipped", detail });
}

export function summaryText(report: FanOutReport): string {
  const count = (status: StepStatus) => report.steps.filter((s) => s.status === status).length;
  const lines = [
    `📊 *Approval summary*: ${count("ok")} succeeded, ${count("failed")} failed, ${count("skipped")} skipped`,
  ];
  for (const s of report.steps) {
    const detail = s.detail ? `: ${s.detail}` : "";
    lines.push(`  ${STATUS_ICONS[s.status]} ${STEP_LABELS[s.step]}${detail}`);
  }
  if (report.driveLink) lines.push(`📁 <${report.driveLink}|Open minutes in Drive>`);
  return lines.join("\n");
}
