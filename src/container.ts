import { WebClient } from "@slack/web-api";
import { ApprovalFanOut } from "./actor/approvalFanOut.js";
import { DraftPoster } from "./actor/postDraft.js";
import { NotificationRouter } from "./actor/router.js";
import { createOpenAIClient } from "./ai/models.js";
import { OpenAISummarizer } from "./ai/summarizer.js";
import { OpenAITranscriber } from "./ai/transcriber.js";
import type { AppConfig } from "./config.js";
import { GoogleDriveFileStore } from "./drive/fileStore.js";
import { createDriveClient, hasServiceAccount } from "./drive/googleAuth.js";
import { DriveWatcher } from "./drive/watcher.js";
import { ConfigError } from "./errors.js";
import { FileDraftStore } from "./minutes/draftStore.js";
import type { RoutingRecord, TaskCompletionRecord, WatchChannelRecord } from "./minutes/types.js";
import { BackgroundTasks } from "./pipeline/backgroundTasks.js";
import { MinutesPipeline } from "./pipeline/minutesPipeline.js";
import { DriveStorage } from "./providers/driveStorage.js";
import { GmailMailer } from "./providers/gmailMailer.js";
import { PdfDocumentRenderer } from "./providers/pdfRenderer.js";
import { dueDatePolicy, fixedDelayPolicy, type ReminderPolicy } from "./reminders/policy.js";
import { ReminderScheduler } from "./reminders/scheduler.js";
import { createApp } from "./server.js";
import { SlackMessenger } from "./slack/messenger.js";
import { InMemoryKeyValueStore } from "./store/keyValueStore.js";
import { KeyedLock } from "./store/keyedLock.js";

export interface Container {
  app: ReturnType<typeof createApp>;
  drafts: FileDraftStore;
  background: BackgroundTasks;
  watcher: DriveWatcher | null;
}

function reminderPolicy(config: AppConfig): ReminderPolicy {
  const { reminders } = config;
  return reminders.policy === "delay"
    ? fixedDelayPolicy(reminders.delayMinutes)
    : dueDatePolicy({ defaultHour: reminders.defaultHour, timeZone: reminders.timeZone });
}

/** Wires every collaborator from config. Nothing else reads the environment. */
export async function buildContainer(config: AppConfig): Promise<Container> {
  if (config.watch.enabled && !config.watch.folderId) {
    throw new ConfigError("GOOGLE_DRIVE_WATCH_ENABLED needs NOTTA_DRIVE_FOLDER_ID");
  }
  if (config.watch.enabled && !config.slack.defaultChannelId) {
    throw new ConfigError("GOOGLE_DRIVE_WATCH_ENABLED needs SLACK_CHANNEL_ID for new drafts");
  }

  const drafts = new FileDraftStore(config.dataDir);
  await drafts.init();

  const openai = createOpenAIClient(config.openai);
  const messenger = new SlackMessenger(new WebClient(config.slack.botToken));
  const routing = new InMemoryKeyValueStore<RoutingRecord>();
  const completions = new InMemoryKeyValueStore<TaskCompletionRecord>();
  const channels = new InMemoryKeyValueStore<WatchChannelRecord>();
  const locks = new KeyedLock();
  const background = new BackgroundTasks();

  const googleReady = hasServiceAccount(config.google);
  const drive = googleReady ? createDriveClient(config.google) : null;
  if (!drive) console.warn("[container] No Google service account; Drive upload and watching disabled");

  const mailReady = Boolean(config.mail.user && config.mail.pass && config.mail.to);
  if (!mailReady) console.warn("[container] GMAIL_USER / GMAIL_PASS not set; mail step will be skipped");

  const fanOut = new ApprovalFanOut({
    drafts,
    messenger,
    renderer: new PdfDocumentRenderer(config.pdf.fontPath || undefined),
    reminders: new ReminderScheduler(messenger, {
      policy: reminderPolicy(config),
      userMap: config.slack.userMap,
      defaultHour: config.reminders.defaultHour,
      timeZone: config.reminders.timeZone,
    }),
    mailer: mailReady ? new GmailMailer(config.mail) : null,
    storage: drive ? new DriveStorage(drive, config.google.uploadFolderId) : null,
  });

  const pipeline = new MinutesPipeline({
    drafts,
    transcriber: new OpenAITranscriber(openai, config.openai.transcribeModel),
    summarizer: new OpenAISummarizer(openai, config.openai.model),
    poster: new DraftPoster(messenger, routing, locks),
    messenger,
  });

  let watcher: DriveWatcher | null = null;
  if (config.watch.enabled) {
    if (!drive) throw new ConfigError("GOOGLE_DRIVE_WATCH_ENABLED needs a Google service account");
    if (!config.watch.webhookBaseUrl) {
      console.warn("[container] No WEBHOOK_BASE_URL / WEBSITE_HOSTNAME; Drive folder will be polled only");
    }
    watcher = new DriveWatcher(
      { files: new GoogleDriveFileStore(drive), pipeline, drafts, channels, locks },
      {
        folderId: config.watch.folderId,
        webhookBaseUrl: config.watch.webhookBaseUrl,
        webhookSecret: config.watch.webhookSecret,
        pollIntervalMs: config.watch.pollIntervalSeconds * 1000,
        channel: config.slack.defaultChannelId,
        timeZone: config.reminders.timeZone,
      }
    );
  }

  const router = new NotificationRouter({
    drafts,
    messenger,
    routing,
    completions,
    locks,
    fanOut,
    background,
    scanner: watcher,
    driveWebhookSecret: config.watch.webhookSecret,
  });

  const app = createApp({
    router,
    pipeline,
    drafts,
    background,
    signingSecret: config.slack.signingSecret,
    defaultChannelId: config.slack.defaultChannelId,
    timeZone: config.reminders.timeZone,
  });

  return { app, drafts, background, watcher };
}
