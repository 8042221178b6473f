import crypto from "crypto";
import { errorMessage } from "../../errors.js";
import { parseTasks } from "../../minutes/taskParser.js";
import { ACTION_TASK_COMPLETE, taskList } from "../../slack/views.js";
import type { ButtonHandler } from "./types.js";
import { draftNotFound, loadDraft } from "./types.js";

export function actionsDigest(actions: string): string {
  return crypto.createHash("sha256").update(actions).digest("hex");
}

/** `<draftId>:<index>` → parts, or null when malformed. */
export function decodeTaskRef(value: string): { draftId: string; index: number } | null {
  const sep = value.lastIndexOf(":");
  if (sep <= 0) return null;
  const rawIndex = value.slice(sep + 1);
  if (!/^\d+$/.test(rawIndex)) return null;
  return { draftId: value.slice(0, sep), index: Number(rawIndex) };
}

export const taskCompleteHandler: ButtonHandler = {
  actionId: ACTION_TASK_COMPLETE,

  async handle(press, ctx) {
    const ref = decodeTaskRef(press.draftRef);
    if (!ref) {
      console.warn(`[router] Malformed task reference "${press.draftRef}", ignoring`);
      return { ok: true };
    }

    const draft = await loadDraft(ctx, ref.draftId);
    if (!draft) return draftNotFound(ref.draftId);

    // Indices are only meaningful against the current actions text
    const tasks = parseTasks(draft.actions);
    if (ref.index >= tasks.length) {
      console.warn(`[router] Task ${ref.index} out of range for ${ref.draftId} (${tasks.length} tasks), ignoring`);
      return { ok: true };
    }

    const digest = actionsDigest(draft.actions);
    const completed = await ctx.locks.run(`tasks:${ref.draftId}`, async () => {
      const record = await ctx.completions.get(ref.draftId);
      const done = new Set(record && record.actionsDigest === digest ? record.completed : []);
      done.add(ref.index);
      await ctx.completions.set(ref.draftId, {
        actionsDigest: digest,
        completed: [...done].sort((a, b) => a - b),
      });
      return done;
    });
    console.log(`[router] Task ${ref.index} of ${ref.draftId} completed: "${tasks[ref.index].title}"`);

    if (!press.channel || !press.messageRef) {
      console.warn(`[router] No message coordinates for task list of ${ref.draftId}; completion recorded only`);
      return { ok: true };
    }
    try {
      await ctx.messenger.updateMessage(
        { channel: press.channel, ts: press.messageRef },
        { text: "Action items", blocks: taskList(ref.draftId, tasks, completed) }
      );
    } catch (err) {
      console.error(`[router] Could not update task list for ${ref.draftId}:`, errorMessage(err));
    }
    return { ok: true };
  },
};
