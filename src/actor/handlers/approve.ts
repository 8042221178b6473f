import { errorMessage, StaleReferenceError } from "../../errors.js";
import type { RoutingRecord } from "../../minutes/types.js";
import type { MessageRef } from "../../slack/messenger.js";
import { ACTION_APPROVE, approvedMinutes } from "../../slack/views.js";
import { draftLockKey } from "../postDraft.js";
import type { ButtonHandler } from "./types.js";
import { draftNotFound, loadDraft } from "./types.js";

/**
 * posted|edited → approved, at most once per draft. The message is switched
 * to its approved form before the fan-out starts; the fan-out itself runs in
 * the background so the callback is acknowledged right away.
 */
export const approveHandler: ButtonHandler = {
  actionId: ACTION_APPROVE,

  async handle(press, ctx) {
    const draftId = press.draftRef;
    const draft = await loadDraft(ctx, draftId);
    if (!draft) return draftNotFound(draftId);

    const ref = await ctx.locks.run(draftLockKey(draftId), async (): Promise<MessageRef | null> => {
      const now = new Date().toISOString();
      const existing = await ctx.routing.get(draftId);

      if (existing) {
        const next: RoutingRecord = { ...existing, state: "approved", updatedAt: now };
        const won = await ctx.routing.compareAndSet(draftId, (r) => r.state !== "approved", next);
        return won ? { channel: existing.channel, ts: existing.ts } : null;
      }

      // No record (e.g. after a restart): trust the coordinates in the callback
      if (!press.channel || !press.messageRef) return null;
      const created = await ctx.routing.createIfAbsent(draftId, {
        channel: press.channel,
        ts: press.messageRef,
        state: "approved",
        updatedAt: now,
      });
      return created ? { channel: press.channel, ts: press.messageRef } : null;
    });

    if (!ref) {
      const existing = await ctx.routing.get(draftId);
      if (existing?.state === "approved") {
        console.log(`[router] Draft ${draftId} already approved, ignoring`);
        return { ok: true };
      }
      throw new StaleReferenceError(`No message coordinates for draft ${draftId}`);
    }

    try {
      await ctx.messenger.updateMessage(ref, { text: "Minutes approved", blocks: approvedMinutes(draft) });
    } catch (err) {
      console.error(`[router] Could not update approved message for ${draftId}:`, errorMessage(err));
    }

    console.log(`[router] Draft ${draftId} approved, starting fan-out`);
    ctx.background.run(`fan-out ${draftId}`, () => ctx.fanOut.run(draftId, draft, ref));
    return { ok: true };
  },
};
