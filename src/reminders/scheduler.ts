import { errorMessage } from "../errors.js";
import { parseTasks } from "../minutes/taskParser.js";
import type { Draft, Task } from "../minutes/types.js";
import type { Messenger } from "../slack/messenger.js";
import { parseDueDate } from "./dueDate.js";
import type { ReminderPolicy } from "./policy.js";

export interface ReminderSchedulerOptions {
  policy: ReminderPolicy;
  /** Display name → Slack user id. */
  userMap: Record<string, string>;
  defaultHour: number;
  timeZone: string;
  now?: () => Date;
}

export interface ScheduleReport {
  scheduled: number;
  skipped: number;
  failed: number;
}

/** "Tanaka(PM)" and "Tanaka（PM）" both resolve as "Tanaka". */
export function stripRoleSuffix(name: string): string {
  return name.replace(/[（(][^（）()]*[)）]/g, "").trim();
}

export function resolveSlackUser(name: string | null, userMap: Record<string, string>): string | null {
  if (!name) return null;
  const key = stripRoleSuffix(name);
  if (!key) return null;
  if (userMap[key]) return userMap[key];
  const lower = key.toLowerCase();
  for (const [candidate, id] of Object.entries(userMap)) {
    if (candidate.toLowerCase() === lower) return id;
  }
  return null;
}

export function reminderText(task: Task, userId: string | null): string {
  const mention = userId ? `<@${userId}> ` : "";
  const assignee = task.assignee || "TBD";
  const due = task.due || "TBD";
  return `${mention}⏰ Reminder: *${task.title}* (assignee: ${assignee} / due: ${due})`;
}

/**
 * Schedules platform-side reminders for every action item of an approved
 * draft. Each scheduling call stands alone; one failure never stops the rest.
 */
export class ReminderScheduler {
  private readonly now: () => Date;

  constructor(
    private readonly messenger: Messenger,
    private readonly opts: ReminderSchedulerOptions
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  async schedule(channel: string, threadTs: string | undefined, draft: Draft): Promise<ScheduleReport> {
    const report: ScheduleReport = { scheduled: 0, skipped: 0, failed: 0 };
    const now = this.now();
    const nowSeconds = Math.floor(now.getTime() / 1000);

    for (const task of parseTasks(draft.actions)) {
      const due = parseDueDate(task.due, {
        defaultHour: this.opts.defaultHour,
        timeZone: this.opts.timeZone,
        now,
      });
      const fireTimes = this.opts.policy.fireTimes(due, now.getTime());
      if (fireTimes.length === 0) {
        console.log(`[reminders] No reminder for "${task.title}" (due: ${task.due ?? "none"})`);
        report.skipped++;
        continue;
      }

      const text = reminderText(task, resolveSlackUser(task.assignee, this.opts.userMap));
      for (const fireAt of fireTimes) {
        const postAt = Math.floor(fireAt / 1000);
        if (postAt <= nowSeconds) {
          report.skipped++;
          continue;
        }
        try {
          await this.messenger.scheduleMessage({ channel, text, postAt, threadTs });
          report.scheduled++;
        } catch (err) {
          console.error(`[reminders] Failed to schedule "${task.title}" at ${postAt}:`, errorMessage(err));
          report.failed++;
        }
      }
    }

    console.log(
      `[reminders] ${this.opts.policy.name}: ${report.scheduled} scheduled, ${report.skipped} skipped, ${report.failed} failed`
    );
    return report;
  }
}
