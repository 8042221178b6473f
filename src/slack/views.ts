import type { Draft, EditableField, Task } from "../minutes/types.js";
import { EDITABLE_FIELDS } from "../minutes/types.js";
import type { BlockNode, ButtonNode, ModalNode, SectionNode } from "./blocks.js";

export const ACTION_EDIT = "edit";
export const ACTION_APPROVE = "approve";
export const ACTION_TASK_COMPLETE = "task_complete";
export const CALLBACK_EDIT_SUBMIT = "edit_submit";

export const FIELD_LABELS: Record<EditableField, string> = {
  meetingName: "Meeting",
  datetimeLabel: "Date",
  participants: "Participants",
  purpose: "Purpose",
  summary: "Summary",
  decisions: "Decisions",
  issues: "Open issues",
  actions: "Actions",
  risks: "Risks",
};

const SINGLE_LINE_FIELDS = new Set<EditableField>(["meetingName", "datetimeLabel", "participants"]);

/** Slack treats &, < and > as control characters in mrkdwn. */
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function labelled(label: string, text: string): SectionNode {
  return { type: "section", text: `*${label}*\n${escapeMrkdwn(text) || "-"}` };
}

function headerFields(draft: Draft): SectionNode {
  const meeting = draft.meetingName || draft.title || "(untitled)";
  return {
    type: "section",
    fields: [
      `*${FIELD_LABELS.meetingName}:*\n${escapeMrkdwn(meeting)}`,
      `*${FIELD_LABELS.datetimeLabel}:*\n${escapeMrkdwn(draft.datetimeLabel) || "-"}`,
      `*${FIELD_LABELS.participants}:*\n${escapeMrkdwn(draft.participants) || "-"}`,
      `*${FIELD_LABELS.purpose}:*\n${escapeMrkdwn(draft.purpose) || "-"}`,
    ],
  };
}

function minutesBody(draft: Draft): BlockNode[] {
  const body: BlockNode[] = [
    { type: "header", text: "Meeting minutes" },
    headerFields(draft),
    { type: "divider" },
    labelled(FIELD_LABELS.summary, draft.summary),
    labelled(FIELD_LABELS.decisions, draft.decisions),
    labelled(FIELD_LABELS.issues, draft.issues),
  ];
  if (draft.actions.trim()) body.push(labelled(FIELD_LABELS.actions, draft.actions));
  if (draft.risks.trim()) body.push(labelled(FIELD_LABELS.risks, draft.risks));
  return body;
}

/** The draft as first posted: full minutes plus Edit / Approve. */
export function minutesPreview(draftId: string, draft: Draft): BlockNode[] {
  return [
    ...minutesBody(draft),
    {
      type: "actions",
      buttons: [
        { type: "button", label: "Edit", actionId: ACTION_EDIT, value: draftId },
        { type: "button", label: "Approve", actionId: ACTION_APPROVE, value: draftId, style: "primary" },
      ],
    },
  ];
}

/** Replaces the preview once approved; no buttons left to press. */
export function approvedMinutes(draft: Draft): BlockNode[] {
  return [{ type: "section", text: "*✅ Approved minutes*" }, ...minutesBody(draft)];
}

export function taskButtonValue(draftId: string, index: number): string {
  return `${draftId}:${index}`;
}

export function taskList(draftId: string, tasks: Task[], completed: ReadonlySet<number> = new Set()): BlockNode[] {
  if (tasks.length === 0) {
    return [{ type: "section", text: "No action items registered." }];
  }

  const blocks: BlockNode[] = [{ type: "header", text: "✅ Action items & tasks" }];
  tasks.forEach((task, i) => {
    const done = completed.has(i);
    const fields: string[] = [];
    if (task.assignee) fields.push(`*Assignee:*\n${escapeMrkdwn(task.assignee)}`);
    if (task.due) fields.push(`*Due:*\n${escapeMrkdwn(task.due)}`);

    const button: ButtonNode = {
      type: "button",
      label: done ? "Completed" : "Done",
      actionId: ACTION_TASK_COMPLETE,
      value: taskButtonValue(draftId, i),
      ...(done ? { disabled: true, style: "primary" as const } : {}),
    };
    const title = escapeMrkdwn(task.title);
    blocks.push({
      type: "section",
      text: done ? `☑ ~${title}~` : `☐ ${title}`,
      ...(fields.length > 0 ? { fields } : {}),
      accessory: button,
    });
  });
  return blocks;
}

export function editModal(draftId: string, draft: Draft): ModalNode {
  return {
    callbackId: CALLBACK_EDIT_SUBMIT,
    privateMetadata: draftId,
    title: "Edit minutes",
    submitLabel: "Save",
    closeLabel: "Cancel",
    inputs: EDITABLE_FIELDS.map((field) => ({
      type: "input" as const,
      blockId: field,
      label: FIELD_LABELS[field],
      initialValue: draft[field],
      multiline: !SINGLE_LINE_FIELDS.has(field),
    })),
  };
}
