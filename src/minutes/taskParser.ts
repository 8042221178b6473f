import type { Task } from "./types.js";

const BULLET = /^\s*(?:[・•\-*＊]\s*)+/;
// （…） may hold ASCII parentheses, e.g. （担当：田中(PM)）
const BRACKET_GROUP = /（([^（）]*)）|\(([^()]*)\)/g;
const SEGMENT_SEPARATOR = /[、,，;；]/;
const LABELLED = /^\s*([^：:]+?)\s*[：:]\s*(.*?)\s*$/;

const ASSIGNEE_LABELS = new Set(["担当", "担当者", "assignee", "owner"]);
const DUE_LABELS = new Set(["期限", "due", "deadline"]);

interface Markers {
  assignee: string | null;
  due: string | null;
  recognized: boolean;
}

function readMarkers(groupBody: string): Markers {
  const markers: Markers = { assignee: null, due: null, recognized: false };
  for (const segment of groupBody.split(SEGMENT_SEPARATOR)) {
    const m = segment.match(LABELLED);
    if (!m) continue;
    const label = m[1].toLowerCase();
    const value = m[2];
    if (ASSIGNEE_LABELS.has(label)) {
      markers.recognized = true;
      if (markers.assignee === null && value) markers.assignee = value;
    } else if (DUE_LABELS.has(label)) {
      markers.recognized = true;
      if (markers.due === null && value) markers.due = value;
    }
  }
  return markers;
}

function parseLine(raw: string): Task | null {
  const line = raw.replace(BULLET, "").trim();
  if (!line) return null;

  let assignee: string | null = null;
  let due: string | null = null;

  const title = line
    .replace(BRACKET_GROUP, (whole: string, wide: string | undefined, ascii: string | undefined) => {
      const markers = readMarkers(wide ?? ascii ?? "");
      if (!markers.recognized) return whole;
      assignee ??= markers.assignee;
      due ??= markers.due;
      return " ";
    })
    .replace(/\s+/g, " ")
    .trim();

  if (!title) return null;
  return { title, assignee, due };
}

/**
 * Parse an actions block into tasks.
 *
 * One task per non-empty line. `（担当：Tanaka、期限：10/25）` style groups
 * (full-width or ASCII parentheses, `担当`/`assignee`/`owner` and
 * `期限`/`due`/`deadline` labels) are lifted out of the title. Anything
 * else, including unbalanced brackets, stays in the title as written.
 */
export function parseTasks(actionsText: string): Task[] {
  const tasks: Task[] = [];
  for (const raw of (actionsText || "").split(/\r?\n/)) {
    const task = parseLine(raw);
    if (task) tasks.push(task);
  }
  return tasks;
}
