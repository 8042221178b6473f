import { z } from "zod";

export type DriveNotification =
  | { kind: "sync"; challenge: string }
  | { kind: "change"; resourceId: string; channelId: string; token: string | null };

type Headers = Record<string, string | string[] | undefined>;

// X-Goog-Resource-State values that mean "something changed"
const CHANGE_STATES = new Set(["change", "add", "update", "remove", "trash", "untrash", "changed"]);

const bodySchema = z.object({
  type: z.enum(["sync", "change"]),
  challenge: z.string().optional(),
  resourceId: z.string().optional(),
  channelId: z.string().optional(),
  token: z.string().optional(),
});

function header(headers: Headers, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Read a Drive push notification. Google sends everything in
 * `X-Goog-*` headers; a JSON body `{ type, challenge?, resourceId?, token? }`
 * is accepted as well. Returns null when neither form is recognizable.
 */
export function parseDriveNotification(headers: Headers, body: unknown): DriveNotification | null {
  const state = header(headers, "x-goog-resource-state");
  if (state) {
    if (state === "sync") return { kind: "sync", challenge: "" };
    if (!CHANGE_STATES.has(state)) return null;
    return {
      kind: "change",
      resourceId: header(headers, "x-goog-resource-id") ?? "",
      channelId: header(headers, "x-goog-channel-id") ?? "",
      token: header(headers, "x-goog-channel-token") ?? null,
    };
  }

  const parsed = bodySchema.safeParse(body);
  if (!parsed.success) return null;
  const data = parsed.data;
  if (data.type === "sync") return { kind: "sync", challenge: data.challenge ?? "" };
  return {
    kind: "change",
    resourceId: data.resourceId ?? "",
    channelId: data.channelId ?? "",
    token: data.token ?? null,
  };
}
