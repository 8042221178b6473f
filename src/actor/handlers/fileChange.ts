import { safeEqual } from "../../slack/signature.js";
import type { FileChangeHandler } from "./types.js";

export const fileChangeHandler: FileChangeHandler = {
  async handle(notice, ctx) {
    if (ctx.driveWebhookSecret && !safeEqual(ctx.driveWebhookSecret, notice.token ?? "")) {
      console.warn(`[router] Drive notification with bad token (channel ${notice.channelId})`);
      return { ok: false, reason: "unauthorized", message: "Invalid channel token" };
    }

    const scanner = ctx.scanner;
    if (!scanner) {
      console.log("[router] Drive notification received but watching is disabled");
      return { ok: false, reason: "unsupported", message: "Drive watching is disabled" };
    }

    console.log(`[router] Drive change on ${notice.resourceId || "?"}, requesting scan`);
    ctx.background.run("drive scan", () => scanner.requestScan());
    return { ok: true };
  },
};
