import { NotFoundError, StaleReferenceError } from "../errors.js";
import type { NotificationEvent, RouterResult } from "./events.js";
import { approveHandler } from "./handlers/approve.js";
import { editHandler } from "./handlers/edit.js";
import { editSubmitHandler } from "./handlers/editSubmit.js";
import { fileChangeHandler } from "./handlers/fileChange.js";
import { taskCompleteHandler } from "./handlers/taskComplete.js";
import type { ButtonHandler, ModalHandler, RouterContext } from "./handlers/types.js";

const buttonHandlers: Record<string, ButtonHandler> = Object.fromEntries(
  [editHandler, approveHandler, taskCompleteHandler].map((h) => [h.actionId, h])
);

const modalHandlers: Record<string, ModalHandler> = {
  [editSubmitHandler.callbackId]: editSubmitHandler,
};

export function getButtonHandler(actionId: string): ButtonHandler | undefined {
  return buttonHandlers[actionId];
}

export function getModalHandler(callbackId: string): ModalHandler | undefined {
  return modalHandlers[callbackId];
}

/**
 * Single entry point for every asynchronous callback: button presses,
 * modal submissions and Drive change notifications.
 */
export class NotificationRouter {
  constructor(readonly ctx: RouterContext) {}

  async handle(event: NotificationEvent): Promise<RouterResult> {
    try {
      return await this.dispatch(event);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return { ok: false, reason: "not_found", message: err.message };
      }
      if (err instanceof StaleReferenceError) {
        console.warn(`[router] ${err.message}`);
        return { ok: false, reason: "stale", message: err.message };
      }
      throw err;
    }
  }

  private async dispatch(event: NotificationEvent): Promise<RouterResult> {
    switch (event.type) {
      case "button_press": {
        const handler = getButtonHandler(event.actionId);
        if (!handler) return unsupported(`action ${event.actionId}`);
        console.log(`[router] ${event.actionId} → ${event.draftRef}`);
        return handler.handle(event, this.ctx);
      }
      case "modal_submit": {
        const handler = getModalHandler(event.callbackId);
        if (!handler) return unsupported(`modal ${event.callbackId}`);
        console.log(`[router] ${event.callbackId} → ${event.draftRef}`);
        return handler.handle(event, this.ctx);
      }
      case "file_change":
        return fileChangeHandler.handle(event, this.ctx);
    }
  }
}

function unsupported(what: string): RouterResult {
  console.warn(`[router] Unsupported ${what}`);
  return { ok: false, reason: "unsupported", message: `Unsupported ${what}` };
}
