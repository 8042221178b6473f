import type OpenAI from "openai";
import { ExternalServiceError } from "../errors.js";
import { emptyDraft, type Draft } from "../minutes/types.js";
import type { Summarizer } from "../providers/types.js";
import { extractJSONObject } from "./models.js";

const SYSTEM_PROMPT = `You are a meeting minutes assistant. Analyze the transcript and return JSON with this exact shape:
{
  "meeting_name": "meeting title or topic (extract if mentioned, otherwise infer from the opening)",
  "datetime_str": "date and time if mentioned, otherwise empty",
  "participants": "comma separated names of the participants mentioned",
  "purpose": "purpose or agenda of the meeting",
  "summary": "a comprehensive paragraph summarizing the meeting",
  "decisions": "decisions made, one per line prefixed with ・",
  "actions": "action items, one per line formatted as ・task（担当：name、期限：date）",
  "issues": "open issues that remain unresolved, one per line prefixed with ・",
  "risks": "risks, challenges or potential problems, one per line prefixed with ・"
}

Rules:
- Extract actions even when they are not called action items: look for "next steps", "we should", "need to", "will do".
- When an action has no assignee write 担当：未定; when it has no date estimate one or write 期限：未定.
- Dates in actions use M/D or YYYY-MM-DD.
- Return ALL fields as strings. Use newline characters for multi-line content.`;

const NO_RISKS = "None noted";

/** Lists become ・ bullets, {action, responsible} objects become one bracketed line. */
function asBullets(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (Array.isArray(value)) {
    return value.map((item) => `・${asBullets(item).replace(/^・/, "")}`).join("\n");
  }
  if (typeof value === "object") {
    const record = Object.fromEntries(Object.entries(value));
    if (typeof record.action === "string") {
      const assignee = typeof record.responsible === "string" ? `（担当：${record.responsible}）` : "";
      return `・${record.action}${assignee}`;
    }
    return Object.entries(record)
      .map(([k, v]) => `・${k}: ${asBullets(v)}`)
      .join("\n");
  }
  return String(value);
}

function asInline(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (Array.isArray(value)) return value.map((v) => String(v)).join(", ");
  return String(value);
}

/** Map a model reply onto a Draft. Unparseable replies land in `summary` verbatim. */
export function draftFromModelReply(content: string): Draft {
  let data: unknown;
  try {
    data = extractJSONObject(content);
  } catch {
    return { ...emptyDraft(), summary: content.trim() };
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return { ...emptyDraft(), summary: content.trim() };
  }
  const fields = Object.fromEntries(Object.entries(data));

  return {
    title: "",
    meetingName: asInline(fields.meeting_name),
    datetimeLabel: asInline(fields.datetime_str),
    participants: asInline(fields.participants),
    purpose: asInline(fields.purpose),
    summary: asBullets(fields.summary),
    decisions: asBullets(fields.decisions),
    issues: asBullets(fields.issues),
    actions: asBullets(fields.actions),
    risks: asBullets(fields.risks).trim() || NO_RISKS,
  };
}

export class OpenAISummarizer implements Summarizer {
  constructor(
    private readonly openai: OpenAI,
    private readonly model: string
  ) {}

  async summarize(transcript: string): Promise<Draft> {
    let raw: string;
    try {
      const resp = await this.openai.chat.completions.create({
        model: this.model,
        temperature: 0.2,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: `Summarize the following meeting transcript.\n---\n${transcript}` },
        ],
      });
      raw = resp.choices[0]?.message?.content || "{}";
    } catch (err) {
      throw new ExternalServiceError("summarize", err);
    }
    return draftFromModelReply(raw);
  }
}
