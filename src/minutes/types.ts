export interface Draft {
  title: string;
  meetingName: string;
  datetimeLabel: string;
  participants: string;
  purpose: string;
  summary: string;
  decisions: string;
  issues: string;
  actions: string;
  risks: string;
}

export const DRAFT_FIELDS = [
  "title",
  "meetingName",
  "datetimeLabel",
  "participants",
  "purpose",
  "summary",
  "decisions",
  "issues",
  "actions",
  "risks",
] as const satisfies ReadonlyArray<keyof Draft>;

export type DraftField = (typeof DRAFT_FIELDS)[number];

/** Fields the edit modal owns. `title` comes from ingestion only. */
export const EDITABLE_FIELDS = DRAFT_FIELDS.filter(
  (f): f is Exclude<DraftField, "title"> => f !== "title"
);

export type EditableField = (typeof EDITABLE_FIELDS)[number];

export function emptyDraft(): Draft {
  return {
    title: "",
    meetingName: "",
    datetimeLabel: "",
    participants: "",
    purpose: "",
    summary: "",
    decisions: "",
    issues: "",
    actions: "",
    risks: "",
  };
}

/** Coerce anything read from disk or a model into a Draft with no null fields. */
export function normalizeDraft(input: unknown): Draft {
  const draft = emptyDraft();
  if (typeof input !== "object" || input === null) return draft;
  for (const field of DRAFT_FIELDS) {
    const value: unknown = Reflect.get(input, field);
    if (typeof value === "string") draft[field] = value;
    else if (typeof value === "number" || typeof value === "boolean") draft[field] = String(value);
  }
  return draft;
}

export interface Task {
  title: string;
  assignee: string | null;
  due: string | null;
}

export type RoutingState = "posted" | "edited" | "approved";

/** Where a draft's preview message currently lives in Slack. */
export interface RoutingRecord {
  channel: string;
  ts: string;
  state: RoutingState;
  updatedAt: string;
}

export interface WatchChannelRecord {
  folderId: string;
  channelId: string;
  resourceId: string;
  /** Epoch milliseconds. */
  expiration: number;
}

export interface TaskCompletionRecord {
  actionsDigest: string;
  completed: number[];
}

export interface PipelineMeta {
  datetimeLabel: string;
}
