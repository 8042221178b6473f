import { WebClient } from "@slack/web-api";
import fs from "fs/promises";
import { ExternalServiceError } from "../errors.js";
import { renderPlainText, renderSlackBlocks, renderSlackModal, type BlockNode, type ModalNode } from "./blocks.js";

export interface MessageRef {
  channel: string;
  ts: string;
}

export interface OutgoingMessage {
  channel: string;
  /** Notification fallback; derived from `blocks` when omitted. */
  text?: string;
  blocks?: BlockNode[];
  threadTs?: string;
}

export interface ScheduledMessage {
  channel: string;
  text: string;
  /** Epoch seconds, UTC. */
  postAt: number;
  threadTs?: string;
}

export interface FileAttachment {
  channel: string;
  threadTs?: string;
  filePath: string;
  filename: string;
  title: string;
  initialComment?: string;
}

/** The slice of the messaging platform the core talks to. */
export interface Messenger {
  postMessage(msg: OutgoingMessage): Promise<MessageRef>;
  updateMessage(ref: MessageRef, msg: { text?: string; blocks: BlockNode[] }): Promise<void>;
  openModal(triggerId: string, modal: ModalNode): Promise<void>;
  scheduleMessage(msg: ScheduledMessage): Promise<void>;
  uploadFile(file: FileAttachment): Promise<void>;
}

function fallbackText(text: string | undefined, blocks: BlockNode[] | undefined): string {
  if (text) return text;
  return blocks ? renderPlainText(blocks).slice(0, 3000) : "";
}

export class SlackMessenger implements Messenger {
  constructor(private readonly client: WebClient) {}

  async postMessage(msg: OutgoingMessage): Promise<MessageRef> {
    const resp = await this.client.chat.postMessage({
      channel: msg.channel,
      text: fallbackText(msg.text, msg.blocks),
      blocks: msg.blocks ? renderSlackBlocks(msg.blocks) : undefined,
      thread_ts: msg.threadTs,
      unfurl_links: false,
    });
    if (!resp.ts) {
      throw new ExternalServiceError("chat.postMessage", new Error("response carried no ts"));
    }
    return { channel: resp.channel || msg.channel, ts: resp.ts };
  }

  async updateMessage(ref: MessageRef, msg: { text?: string; blocks: BlockNode[] }): Promise<void> {
    await this.client.chat.update({
      channel: ref.channel,
      ts: ref.ts,
      text: fallbackText(msg.text, msg.blocks),
      blocks: renderSlackBlocks(msg.blocks),
    });
  }

  async openModal(triggerId: string, modal: ModalNode): Promise<void> {
    await this.client.views.open({ trigger_id: triggerId, view: renderSlackModal(modal) });
  }

  async scheduleMessage(msg: ScheduledMessage): Promise<void> {
    await this.client.chat.scheduleMessage({
      channel: msg.channel,
      text: msg.text,
      post_at: msg.postAt,
      thread_ts: msg.threadTs,
    });
  }

  async uploadFile(file: FileAttachment): Promise<void> {
    const contents = await fs.readFile(file.filePath);
    const upload = {
      file: contents,
      filename: file.filename,
      title: file.title,
      initial_comment: file.initialComment,
    };
    if (file.threadTs) {
      await this.client.files.uploadV2({ ...upload, channel_id: file.channel, thread_ts: file.threadTs });
    } else {
      await this.client.files.uploadV2({ ...upload, channel_id: file.channel });
    }
  }
}
