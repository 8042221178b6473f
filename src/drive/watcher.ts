import path from "path";
import { randomUUID } from "crypto";
import { setTimeout as delay } from "timers/promises";
import type { ScanTrigger } from "../actor/handlers/types.js";
import { errorMessage } from "../errors.js";
import type { FileDraftStore } from "../minutes/draftStore.js";
import type { WatchChannelRecord } from "../minutes/types.js";
import type { MinutesPipeline } from "../pipeline/minutesPipeline.js";
import { formatLocalDateTime } from "../reminders/dueDate.js";
import type { KeyValueStore } from "../store/keyValueStore.js";
import type { KeyedLock } from "../store/keyedLock.js";
import type { FileStore, RemoteFile } from "./fileStore.js";
import { ScanQueue } from "./scanQueue.js";

/** Prefix written onto a file once its draft has been posted. */
export const PROCESSED_MARKER = "[processed] ";
export const SCAN_PAGE_SIZE = 20;
export const WEBHOOK_PATH = "/webhooks/drive";
/** A file that fails this many times is left alone until the process restarts. */
export const MAX_FILE_ATTEMPTS = 3;
// renew a push channel this long before Drive expires it
const RENEW_MARGIN_MS = 60 * 60 * 1000;

export type WatchState = "unwatched" | "subscribing" | "watching";

export interface DriveWatcherOptions {
  folderId: string;
  /** Public base URL for push notifications; empty means polling only. */
  webhookBaseUrl: string;
  webhookSecret: string;
  pollIntervalMs: number;
  /** Slack channel new drafts are posted to. */
  channel: string;
  timeZone: string;
  now?: () => number;
}

export interface DriveWatcherDeps {
  files: FileStore;
  pipeline: Pick<MinutesPipeline, "runFromAudio" | "runFromText">;
  drafts: FileDraftStore;
  channels: KeyValueStore<WatchChannelRecord>;
  locks: KeyedLock;
}

export interface ScanResult {
  listed: number;
  processed: number;
  failed: number;
  /** Unmarked files skipped after too many failed attempts. */
  skipped: number;
}

/** One draft per Drive file, so a retried file reuses its draft and upload. */
export function draftIdForFile(fileId: string): string {
  return `drive-${fileId.replace(/[^A-Za-z0-9_-]/g, "_")}`;
}

/**
 * Watches one Drive folder for new transcripts and recordings.
 *
 * Push notifications and the poll timer both funnel into one coalescing
 * scan queue. Renaming a file with the processed marker is the commit
 * point: a file is only marked after its draft has been posted.
 */
export class DriveWatcher implements ScanTrigger {
  private state: WatchState = "unwatched";
  private readonly queue: ScanQueue;
  private readonly now: () => number;
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private stopped = false;
  private readonly failures = new Map<string, number>();
  private lastScan: ScanResult = { listed: 0, processed: 0, failed: 0, skipped: 0 };

  constructor(
    private readonly deps: DriveWatcherDeps,
    private readonly opts: DriveWatcherOptions
  ) {
    this.queue = new ScanQueue(async () => {
      this.lastScan = await this.scanOnce();
    });
    this.now = opts.now ?? Date.now;
  }

  get watchState(): WatchState {
    return this.state;
  }

  get lastScanResult(): ScanResult {
    return this.lastScan;
  }

  private get lockKey(): string {
    return `watch:${this.opts.folderId}`;
  }

  async start(): Promise<void> {
    if (this.abort) return;
    this.stopped = false;
    console.log(`[watcher] Starting on folder ${this.opts.folderId} (every ${this.opts.pollIntervalMs / 1000}s)`);
    this.abort = new AbortController();
    await this.ensureSubscribed();
    const signal = this.abort.signal;
    this.loop = this.pollLoop(signal).catch((err: unknown) => {
      console.error("[watcher] Poll loop stopped:", err);
    });
  }

  /** No-op once stop() has begun. */
  requestScan(): Promise<void> {
    if (this.stopped) return Promise.resolve();
    return this.queue.request();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (!this.abort) return;
    this.abort.abort();
    await this.loop;
    await this.queue.idle();
    await this.deps.locks.run(this.lockKey, async () => {
      const record = await this.deps.channels.get(this.opts.folderId);
      if (record) {
        await this.stopChannel(record);
        await this.deps.channels.delete(this.opts.folderId);
      }
      this.state = "unwatched";
    });
    this.abort = null;
    this.loop = null;
    console.log("[watcher] Stopped");
  }

  private async pollLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.requestScan();
      if (!(await this.sleep(signal))) return;
      // renews a channel close to expiry
      await this.ensureSubscribed();
    }
  }

  private async sleep(signal: AbortSignal): Promise<boolean> {
    try {
      await delay(this.opts.pollIntervalMs, undefined, { signal });
      return true;
    } catch (err) {
      if (signal.aborted) return false;
      throw err;
    }
  }

  /** At most one channel per folder; an expiring one is replaced. Failure leaves the folder on polling. */
  async ensureSubscribed(): Promise<void> {
    const base = this.opts.webhookBaseUrl;
    if (!base) return;

    await this.deps.locks.run(this.lockKey, async () => {
      const { channels, files } = this.deps;
      const folderId = this.opts.folderId;
      const existing = await channels.get(folderId);
      if (existing && existing.expiration - this.now() > RENEW_MARGIN_MS) {
        this.state = "watching";
        return;
      }
      if (existing) {
        console.log(`[watcher] Channel ${existing.channelId} expiring, renewing`);
        await this.stopChannel(existing);
        await channels.delete(folderId);
      }

      this.state = "subscribing";
      try {
        const reg = await files.watch(folderId, {
          channelId: randomUUID(),
          address: `${base}${WEBHOOK_PATH}`,
          token: this.opts.webhookSecret,
        });
        const record: WatchChannelRecord = { folderId, ...reg };
        if (!(await channels.createIfAbsent(folderId, record))) {
          await this.stopChannel(record);
        }
        this.state = "watching";
        console.log(`[watcher] Watching ${folderId} via channel ${reg.channelId}`);
      } catch (err) {
        this.state = "unwatched";
        console.warn(`[watcher] Could not subscribe to ${folderId}, polling only:`, errorMessage(err));
      }
    });
  }

  private async stopChannel(record: WatchChannelRecord): Promise<void> {
    try {
      await this.deps.files.stopWatch(record.channelId, record.resourceId);
    } catch (err) {
      console.warn(`[watcher] Could not stop channel ${record.channelId}:`, errorMessage(err));
    }
  }

  private async scanOnce(): Promise<ScanResult> {
    const listed = await this.deps.files.listCandidates(this.opts.folderId, SCAN_PAGE_SIZE);
    const fresh = listed.filter((f) => !f.name.startsWith(PROCESSED_MARKER));
    const result: ScanResult = { listed: listed.length, processed: 0, failed: 0, skipped: 0 };
    if (fresh.length > 0) console.log(`[watcher] ${fresh.length} new file(s) in ${this.opts.folderId}`);

    for (const file of fresh) {
      const attempts = this.failures.get(file.id) ?? 0;
      if (attempts >= MAX_FILE_ATTEMPTS) {
        result.skipped++;
        continue;
      }
      try {
        await this.processFile(file);
        this.failures.delete(file.id);
        result.processed++;
      } catch (err) {
        result.failed++;
        this.failures.set(file.id, attempts + 1);
        console.error(`[watcher] ${file.name} failed (attempt ${attempts + 1}):`, errorMessage(err));
        if (attempts + 1 >= MAX_FILE_ATTEMPTS) {
          console.warn(`[watcher] Giving up on ${file.name} after ${MAX_FILE_ATTEMPTS} attempts`);
        }
      }
    }
    return result;
  }

  private async processFile(file: RemoteFile): Promise<void> {
    const { files, pipeline, drafts } = this.deps;
    const draftId = draftIdForFile(file.id);
    const title = path.parse(file.name).name || file.name;
    const meta = { datetimeLabel: formatLocalDateTime(this.createdAt(file), this.opts.timeZone) };
    console.log(`[watcher] Processing ${file.name} as ${draftId}`);

    const bytes = await files.download(file.id);
    if (file.mimeType.startsWith("text/")) {
      await pipeline.runFromText(draftId, bytes.toString("utf-8"), title, this.opts.channel, meta);
    } else {
      const filePath = await drafts.saveUpload(draftId, path.extname(file.name), bytes);
      await pipeline.runFromAudio(draftId, { filePath, filename: file.name }, title, this.opts.channel, meta);
    }

    await files.rename(file.id, PROCESSED_MARKER + file.name);
  }

  private createdAt(file: RemoteFile): Date {
    const created = file.createdTime ? new Date(file.createdTime) : null;
    return created && !Number.isNaN(created.getTime()) ? created : new Date(this.now());
  }
}
