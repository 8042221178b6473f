import { NotFoundError } from "../../errors.js";
import type { FileDraftStore } from "../../minutes/draftStore.js";
import type { Draft, RoutingRecord, TaskCompletionRecord } from "../../minutes/types.js";
import type { BackgroundTasks } from "../../pipeline/backgroundTasks.js";
import type { Messenger } from "../../slack/messenger.js";
import type { KeyValueStore } from "../../store/keyValueStore.js";
import type { KeyedLock } from "../../store/keyedLock.js";
import type { ApprovalFanOut } from "../approvalFanOut.js";
import type { ButtonPress, FileChangeNotice, ModalSubmit, RouterResult } from "../events.js";

/** Something that can be asked to look for new files. */
export interface ScanTrigger {
  requestScan(): Promise<void>;
}

export interface RouterContext {
  drafts: FileDraftStore;
  messenger: Messenger;
  routing: KeyValueStore<RoutingRecord>;
  completions: KeyValueStore<TaskCompletionRecord>;
  locks: KeyedLock;
  fanOut: ApprovalFanOut;
  background: BackgroundTasks;
  /** Null when Drive watching is disabled. */
  scanner: ScanTrigger | null;
  /** Shared token Drive echoes back on every notification; empty disables the check. */
  driveWebhookSecret: string;
}

export interface ButtonHandler {
  actionId: string;
  handle(press: ButtonPress, ctx: RouterContext): Promise<RouterResult>;
}

export interface ModalHandler {
  callbackId: string;
  handle(submit: ModalSubmit, ctx: RouterContext): Promise<RouterResult>;
}

export interface FileChangeHandler {
  handle(notice: FileChangeNotice, ctx: RouterContext): Promise<RouterResult>;
}

export async function loadDraft(ctx: RouterContext, draftId: string): Promise<Draft | null> {
  try {
    return await ctx.drafts.read(draftId);
  } catch (err) {
    if (err instanceof NotFoundError) return null;
    throw err;
  }
}

export function draftNotFound(draftId: string): RouterResult {
  console.warn(`[router] Draft not found: ${draftId}`);
  return { ok: false, reason: "not_found", message: `Draft not found: ${draftId}` };
}
