import { describe, expect, it } from "vitest";
import { parseInteractionPayload } from "./interactions.js";

describe("parseInteractionPayload", () => {
  it("maps block_actions to a button press", () => {
    const raw = JSON.stringify({
      type: "block_actions",
      trigger_id: "trigger-1",
      channel: { id: "C1" },
      message: { ts: "111.222" },
      actions: [{ action_id: "approve", value: "d1" }],
    });
    expect(parseInteractionPayload(raw)).toEqual({
      type: "button_press",
      actionId: "approve",
      draftRef: "d1",
      channel: "C1",
      messageRef: "111.222",
      triggerRef: "trigger-1",
    });
  });

  it("falls back to the container for coordinates", () => {
    const raw = JSON.stringify({
      type: "block_actions",
      container: { channel_id: "C2", message_ts: "9.9" },
      actions: [{ action_id: "task_complete", value: "d1:0" }],
    });
    expect(parseInteractionPayload(raw)).toEqual({
      type: "button_press",
      actionId: "task_complete",
      draftRef: "d1:0",
      channel: "C2",
      messageRef: "9.9",
      triggerRef: null,
    });
  });

  it("maps view_submission to a modal submit keyed by block id", () => {
    const raw = JSON.stringify({
      type: "view_submission",
      view: {
        callback_id: "edit_submit",
        private_metadata: "d1",
        state: {
          values: {
            summary: { inp: { type: "plain_text_input", value: "New summary" } },
            risks: { inp: { type: "plain_text_input", value: null } },
          },
        },
      },
    });
    expect(parseInteractionPayload(raw)).toEqual({
      type: "modal_submit",
      callbackId: "edit_submit",
      draftRef: "d1",
      fieldValues: { summary: "New summary", risks: "" },
    });
  });

  it("returns null for unknown types, empty actions and bad JSON", () => {
    expect(parseInteractionPayload(JSON.stringify({ type: "view_closed" }))).toBeNull();
    expect(parseInteractionPayload(JSON.stringify({ type: "block_actions", actions: [] }))).toBeNull();
    expect(parseInteractionPayload("{not json")).toBeNull();
    expect(parseInteractionPayload("")).toBeNull();
  });
});
