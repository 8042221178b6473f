import { describe, expect, it } from "vitest";
import { draftFromModelReply } from "./summarizer.js";

describe("draftFromModelReply", () => {
  it("maps the JSON fields onto a draft", () => {
    const reply = JSON.stringify({
      meeting_name: "Sync",
      datetime_str: "10/19",
      participants: ["Aoki", "Baba"],
      purpose: "Plan",
      summary: "Done",
      decisions: ["Ship"],
      actions: ["Write notes（担当：Aoki、期限：10/20）"],
      issues: [],
      risks: "",
    });
    expect(draftFromModelReply(reply)).toEqual({
      title: "",
      meetingName: "Sync",
      datetimeLabel: "10/19",
      participants: "Aoki, Baba",
      purpose: "Plan",
      summary: "Done",
      decisions: "・Ship",
      issues: "",
      actions: "・Write notes（担当：Aoki、期限：10/20）",
      risks: "None noted",
    });
  });

  it("reads replies wrapped in a json fence", () => {
    const draft = draftFromModelReply('```json\n{"summary": "Fenced"}\n```');
    expect(draft.summary).toBe("Fenced");
    expect(draft.actions).toBe("");
    expect(draft.risks).toBe("None noted");
  });

  it("turns action objects into bracketed lines", () => {
    const draft = draftFromModelReply(JSON.stringify({ actions: [{ action: "Call", responsible: "Baba" }] }));
    expect(draft.actions).toBe("・Call（担当：Baba）");
  });

  it("keeps an unparseable reply as the summary", () => {
    const draft = draftFromModelReply("  plain words  ");
    expect(draft.summary).toBe("plain words");
    expect(draft.meetingName).toBe("");
  });

  it("keeps a non-object JSON reply as the summary", () => {
    expect(draftFromModelReply("[1,2]").summary).toBe("[1,2]");
  });
});
