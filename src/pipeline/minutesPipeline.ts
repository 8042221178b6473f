import type { DraftPoster } from "../actor/postDraft.js";
import { errorMessage } from "../errors.js";
import type { FileDraftStore } from "../minutes/draftStore.js";
import type { PipelineMeta } from "../minutes/types.js";
import type { AudioInput, Summarizer, Transcriber } from "../providers/types.js";
import type { Messenger, MessageRef } from "../slack/messenger.js";

export const MAX_TITLE_LENGTH = 200;

export interface PipelineDeps {
  drafts: FileDraftStore;
  transcriber: Transcriber;
  summarizer: Summarizer;
  poster: DraftPoster;
  messenger: Messenger;
}

export function cleanTitle(title: string): string {
  return title.trim().slice(0, MAX_TITLE_LENGTH);
}

/**
 * Audio or text in, a posted draft out. Nothing is posted unless every
 * step before it succeeded; on failure a short note goes to the channel
 * (best effort) and the error is rethrown to the caller.
 */
export class MinutesPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async runFromAudio(
    draftId: string,
    audio: AudioInput,
    title: string,
    channel: string,
    meta: PipelineMeta
  ): Promise<MessageRef> {
    return this.guard(draftId, title, channel, async () => {
      console.log(`[pipeline] Transcribing ${audio.filename} for ${draftId}`);
      const transcript = await this.deps.transcriber.transcribe(audio);
      return this.fromTranscript(draftId, transcript, title, channel, meta);
    });
  }

  async runFromText(
    draftId: string,
    text: string,
    title: string,
    channel: string,
    meta: PipelineMeta
  ): Promise<MessageRef> {
    return this.guard(draftId, title, channel, () => this.fromTranscript(draftId, text, title, channel, meta));
  }

  private async fromTranscript(
    draftId: string,
    transcript: string,
    title: string,
    channel: string,
    meta: PipelineMeta
  ): Promise<MessageRef> {
    const { drafts } = this.deps;
    await drafts.saveTranscript(draftId, transcript);

    const summary = await this.deps.summarizer.summarize(transcript);
    console.log(`[pipeline] Summary: ${summary.summary.slice(0, 100)}...`);
    const draft = { ...summary, title: cleanTitle(title), datetimeLabel: meta.datetimeLabel };

    // A retried run finds the draft from the first attempt
    if (await drafts.exists(draftId)) await drafts.update(draftId, draft);
    else await drafts.create(draftId, draft);

    return this.deps.poster.postDraft(channel, draftId, draft);
  }

  private async guard(
    draftId: string,
    title: string,
    channel: string,
    run: () => Promise<MessageRef>
  ): Promise<MessageRef> {
    console.log(`[pipeline] Processing ${draftId}: ${title}`);
    try {
      return await run();
    } catch (err) {
      console.error(`[pipeline] ${draftId} failed:`, err);
      try {
        await this.deps.messenger.postMessage({
          channel,
          text: `❌ Could not create minutes for "${cleanTitle(title) || draftId}": ${errorMessage(err)}`,
        });
      } catch (noteErr) {
        console.error("[pipeline] Could not post failure note:", errorMessage(noteErr));
      }
      throw err;
    }
  }
}
