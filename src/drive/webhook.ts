import express, { Router } from "express";
import type { NotificationRouter } from "../actor/router.js";
import { parseDriveNotification } from "./notification.js";

export function createDriveWebhookRouter(router: NotificationRouter): Router {
  const drive = Router();

  drive.post("/drive", express.json(), async (req, res, next) => {
    try {
      const notice = parseDriveNotification(req.headers, req.body);
      if (!notice) {
        console.log("[webhook] Rejected: unrecognized Drive notification");
        res.status(400).json({ ok: false, error: "Unrecognized notification" });
        return;
      }

      if (notice.kind === "sync") {
        console.log("[webhook] Drive sync handshake");
        res.type("text/plain").send(notice.challenge);
        return;
      }

      const result = await router.handle({
        type: "file_change",
        resourceId: notice.resourceId,
        channelId: notice.channelId,
        token: notice.token,
      });
      if (!result.ok && result.reason === "unauthorized") {
        res.status(401).json({ ok: false, error: result.message });
        return;
      }
      res.json(result.ok ? { ok: true } : { ok: false, reason: result.reason });
    } catch (err) {
      next(err);
    }
  });

  return drive;
}
