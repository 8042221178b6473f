import { errorMessage } from "../../errors.js";
import { EDITABLE_FIELDS, emptyDraft, type Draft, type RoutingRecord } from "../../minutes/types.js";
import { CALLBACK_EDIT_SUBMIT, minutesPreview } from "../../slack/views.js";
import { draftLockKey } from "../postDraft.js";
import type { ModalHandler } from "./types.js";

export function draftFromFieldValues(fieldValues: Record<string, string>): Draft {
  const draft = emptyDraft();
  for (const field of EDITABLE_FIELDS) {
    draft[field] = fieldValues[field] ?? "";
  }
  return draft;
}

/**
 * Full replacement of the draft from the modal. The preview is re-rendered
 * only when we know where it lives and it has not been approved yet.
 */
export const editSubmitHandler: ModalHandler = {
  callbackId: CALLBACK_EDIT_SUBMIT,

  async handle(submit, ctx) {
    const draftId = submit.draftRef;
    if (!(await ctx.drafts.exists(draftId))) {
      console.warn(`[router] Edit submitted for unknown draft ${draftId}`);
      return {
        ok: false,
        reason: "not_found",
        message: `Draft not found: ${draftId}`,
        response: {
          response_action: "errors",
          errors: { [EDITABLE_FIELDS[0]]: "This draft no longer exists." },
        },
      };
    }

    const draft = draftFromFieldValues(submit.fieldValues);

    await ctx.locks.run(draftLockKey(draftId), async () => {
      await ctx.drafts.update(draftId, draft);

      const record = await ctx.routing.get(draftId);
      if (!record) {
        console.log(`[router] Draft ${draftId} has no posted message; saved only`);
        return;
      }
      if (record.state === "approved") {
        console.log(`[router] Draft ${draftId} already approved; saved without re-rendering`);
        return;
      }

      try {
        await ctx.messenger.updateMessage(
          { channel: record.channel, ts: record.ts },
          { text: `Minutes draft (edited): ${draft.meetingName || draftId}`, blocks: minutesPreview(draftId, draft) }
        );
      } catch (err) {
        console.error(`[router] Could not re-render draft ${draftId}:`, errorMessage(err));
        return;
      }
      const next: RoutingRecord = { ...record, state: "edited", updatedAt: new Date().toISOString() };
      await ctx.routing.compareAndSet(draftId, (r) => r.state !== "approved", next);
    });

    console.log(`[router] Draft ${draftId} updated from modal`);
    return { ok: true, response: { response_action: "clear" } };
  },
};
