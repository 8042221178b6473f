import type { IncomingMessage } from "http";
import path from "path";
import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import type { NotificationRouter } from "./actor/router.js";
import { createDriveWebhookRouter } from "./drive/webhook.js";
import { AuthError, NotFoundError } from "./errors.js";
import { newDraftId, type FileDraftStore } from "./minutes/draftStore.js";
import { parseTasks } from "./minutes/taskParser.js";
import type { BackgroundTasks } from "./pipeline/backgroundTasks.js";
import { cleanTitle, type MinutesPipeline } from "./pipeline/minutesPipeline.js";
import { formatLocalDateTime } from "./reminders/dueDate.js";
import { parseInteractionPayload } from "./slack/interactions.js";
import { verifySlackSignature } from "./slack/signature.js";

export interface AppDeps {
  router: NotificationRouter;
  pipeline: Pick<MinutesPipeline, "runFromAudio" | "runFromText">;
  drafts: FileDraftStore;
  background: BackgroundTasks;
  signingSecret: string;
  defaultChannelId: string;
  timeZone: string;
  now?: () => Date;
}

const MAX_UPLOAD_BYTES = 200 * 1024 * 1024;

const textIngestSchema = z.object({
  text: z.string().trim().min(1),
  title: z.string().optional(),
  channel_id: z.string().optional(),
});

// Raw bytes of signed requests, captured before urlencoded parsing
const rawBodies = new WeakMap<IncomingMessage, string>();

function asyncRoute(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function bodyString(body: unknown, key: string): string {
  if (typeof body !== "object" || body === null) return "";
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value.trim() : "";
}

export function createApp(deps: AppDeps) {
  const app = express();
  const now = deps.now ?? (() => new Date());
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES } });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  // POST /upload: multipart audio, the pipeline runs in the background
  app.post(
    "/upload",
    upload.single("audio"),
    asyncRoute(async (req, res) => {
      const file = req.file;
      if (!file) {
        res.status(400).json({ ok: false, error: "Missing audio file" });
        return;
      }
      const channel = bodyString(req.body, "channel_id") || deps.defaultChannelId;
      if (!channel) {
        res.status(400).json({ ok: false, error: "No channel_id given and SLACK_CHANNEL_ID not set" });
        return;
      }

      const draftId = newDraftId();
      const filePath = await deps.drafts.saveUpload(draftId, path.extname(file.originalname), file.buffer);
      const title = cleanTitle(bodyString(req.body, "title") || path.parse(file.originalname).name);
      const meta = { datetimeLabel: formatLocalDateTime(now(), deps.timeZone) };
      console.log(`[server] Accepted upload ${file.originalname} as ${draftId}`);

      deps.background.run(`pipeline ${draftId}`, () =>
        deps.pipeline.runFromAudio(draftId, { filePath, filename: file.originalname }, title, channel, meta)
      );
      res.json({ accepted: true, draft_id: draftId });
    })
  );

  app.post(
    "/ingest/text",
    express.json({ limit: "5mb" }),
    asyncRoute(async (req, res) => {
      const parsed = textIngestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ ok: false, error: "Body must be { text, title?, channel_id? }" });
        return;
      }
      const { text, channel_id } = parsed.data;
      const channel = channel_id || deps.defaultChannelId;
      if (!channel) {
        res.status(400).json({ ok: false, error: "No channel_id given and SLACK_CHANNEL_ID not set" });
        return;
      }

      const draftId = newDraftId();
      const title = cleanTitle(parsed.data.title || "Meeting minutes");
      const meta = { datetimeLabel: formatLocalDateTime(now(), deps.timeZone) };
      console.log(`[server] Accepted text ingest as ${draftId}`);

      deps.background.run(`pipeline ${draftId}`, () =>
        deps.pipeline.runFromText(draftId, text, title, channel, meta)
      );
      res.json({ accepted: true, draft_id: draftId });
    })
  );

  app.get(
    "/drafts/:id",
    asyncRoute(async (req, res) => {
      const draft = await deps.drafts.read(req.params.id);
      res.json({ id: req.params.id, draft, tasks: parseTasks(draft.actions) });
    })
  );

  // POST /slack/actions: Block Kit buttons and modal submissions
  app.post(
    "/slack/actions",
    express.urlencoded({
      extended: false,
      verify: (req, _res, buf) => {
        rawBodies.set(req, buf.toString("utf-8"));
      },
    }),
    asyncRoute(async (req, res) => {
      verifySlackSignature(
        deps.signingSecret,
        rawBodies.get(req) ?? "",
        req.header("x-slack-request-timestamp"),
        req.header("x-slack-signature")
      );

      const event = parseInteractionPayload(bodyString(req.body, "payload"));
      if (!event) {
        console.log("[server] Ignoring unsupported Slack payload");
        res.json({ ok: true });
        return;
      }

      const result = await deps.router.handle(event);
      if (result.response) {
        res.json(result.response);
        return;
      }
      res.json(result.ok ? { ok: true } : { ok: false, error: result.message });
    })
  );

  app.use("/webhooks", createDriveWebhookRouter(deps.router));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AuthError) {
      console.warn(`[server] Unauthorized: ${err.message}`);
      res.status(401).json({ ok: false, error: err.message });
      return;
    }
    if (err instanceof NotFoundError) {
      res.status(404).json({ ok: false, error: err.message });
      return;
    }
    if (err instanceof multer.MulterError) {
      res.status(400).json({ ok: false, error: err.message });
      return;
    }
    console.error("[server] Error:", err);
    res.status(500).json({ ok: false, error: "Internal error" });
  });

  return app;
}
