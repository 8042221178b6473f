import { z } from "zod";
import type { ButtonPress, ModalSubmit } from "../actor/events.js";

const blockActionsSchema = z.object({
  type: z.literal("block_actions"),
  trigger_id: z.string().optional(),
  channel: z.object({ id: z.string() }).optional(),
  container: z.object({ channel_id: z.string().optional(), message_ts: z.string().optional() }).optional(),
  message: z.object({ ts: z.string() }).optional(),
  actions: z
    .array(
      z.object({
        action_id: z.string(),
        value: z.string().optional(),
      })
    )
    .min(1),
});

const inputValueSchema = z.object({ value: z.string().nullable().optional() });

const viewSubmissionSchema = z.object({
  type: z.literal("view_submission"),
  view: z.object({
    callback_id: z.string(),
    private_metadata: z.string().default(""),
    state: z.object({
      values: z.record(z.record(inputValueSchema)),
    }),
  }),
});

const payloadSchema = z.discriminatedUnion("type", [blockActionsSchema, viewSubmissionSchema]);

export type InteractionEvent = ButtonPress | ModalSubmit;

/**
 * Turn the JSON `payload` field of a Slack interactivity request into a
 * router event. Returns null for payload types the router does not handle.
 */
export function parseInteractionPayload(raw: string): InteractionEvent | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = payloadSchema.safeParse(json);
  if (!parsed.success) return null;

  const payload = parsed.data;
  if (payload.type === "block_actions") {
    const action = payload.actions[0];
    return {
      type: "button_press",
      actionId: action.action_id,
      draftRef: action.value ?? "",
      channel: payload.channel?.id ?? payload.container?.channel_id ?? null,
      messageRef: payload.message?.ts ?? payload.container?.message_ts ?? null,
      triggerRef: payload.trigger_id ?? null,
    };
  }

  // Modal inputs are keyed block_id → action_id → { value }
  const fieldValues: Record<string, string> = {};
  for (const [blockId, actions] of Object.entries(payload.view.state.values)) {
    const first = Object.values(actions)[0];
    fieldValues[blockId] = first?.value ?? "";
  }
  return {
    type: "modal_submit",
    callbackId: payload.view.callback_id,
    draftRef: payload.view.private_metadata,
    fieldValues,
  };
}
