import type { Draft, RoutingRecord } from "../minutes/types.js";
import type { Messenger, MessageRef } from "../slack/messenger.js";
import { minutesPreview } from "../slack/views.js";
import type { KeyValueStore } from "../store/keyValueStore.js";
import type { KeyedLock } from "../store/keyedLock.js";

/** Lock key shared by everything that reads-then-writes a draft's routing record. */
export function draftLockKey(draftId: string): string {
  return `draft:${draftId}`;
}

export class DraftPoster {
  constructor(
    private readonly messenger: Messenger,
    private readonly routing: KeyValueStore<RoutingRecord>,
    private readonly locks: KeyedLock
  ) {}

  /**
   * Post the preview with Edit / Approve buttons and record where it went.
   * A draft that already has a message is not posted again.
   */
  async postDraft(channel: string, draftId: string, draft: Draft): Promise<MessageRef> {
    return this.locks.run(draftLockKey(draftId), async () => {
      const existing = await this.routing.get(draftId);
      if (existing?.channel && existing.ts) {
        console.log(`[router] Draft ${draftId} already posted at ${existing.channel}/${existing.ts}`);
        return { channel: existing.channel, ts: existing.ts };
      }

      const ref = await this.messenger.postMessage({
        channel,
        text: `Minutes draft: ${draft.title || draft.meetingName || draftId}`,
        blocks: minutesPreview(draftId, draft),
      });
      const record: RoutingRecord = {
        channel: ref.channel,
        ts: ref.ts,
        state: "posted",
        updatedAt: new Date().toISOString(),
      };
      if (existing) await this.routing.set(draftId, record);
      else await this.routing.createIfAbsent(draftId, record);
      console.log(`[router] Posted draft ${draftId} to ${ref.channel} (ts ${ref.ts})`);
      return ref;
    });
  }
}
