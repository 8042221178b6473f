export interface ButtonPress {
  type: "button_press";
  actionId: string;
  /** Button value: a draft id, or `<draftId>:<taskIndex>` for task completion. */
  draftRef: string;
  channel: string | null;
  messageRef: string | null;
  triggerRef: string | null;
}

export interface ModalSubmit {
  type: "modal_submit";
  callbackId: string;
  draftRef: string;
  fieldValues: Record<string, string>;
}

export interface FileChangeNotice {
  type: "file_change";
  resourceId: string;
  channelId: string;
  token: string | null;
}

export type NotificationEvent = ButtonPress | ModalSubmit | FileChangeNotice;

export type RouterFailure = "not_found" | "stale" | "unauthorized" | "unsupported";

/** Immediate response for the interactive surface (e.g. `{ response_action: "clear" }`). */
export type AckBody = Record<string, unknown>;

export type RouterResult =
  | { ok: true; response?: AckBody }
  | { ok: false; reason: RouterFailure; message: string; response?: AckBody };
