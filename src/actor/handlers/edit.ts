import { ACTION_EDIT, editModal } from "../../slack/views.js";
import type { ButtonHandler } from "./types.js";
import { draftNotFound, loadDraft } from "./types.js";

export const editHandler: ButtonHandler = {
  actionId: ACTION_EDIT,

  async handle(press, ctx) {
    const draft = await loadDraft(ctx, press.draftRef);
    if (!draft) return draftNotFound(press.draftRef);
    if (!press.triggerRef) {
      return { ok: false, reason: "unsupported", message: "Edit needs a trigger id to open the modal" };
    }

    await ctx.messenger.openModal(press.triggerRef, editModal(press.draftRef, draft));
    console.log(`[router] Opened edit modal for ${press.draftRef}`);
    return { ok: true };
  },
};
