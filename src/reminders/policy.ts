import { localParts, zonedTimeToEpoch } from "./dueDate.js";

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

/**
 * Decides when a task's reminders fire. All times are epoch milliseconds.
 * Tasks without a parsable due date get no reminders under either policy.
 */
export interface ReminderPolicy {
  readonly name: string;
  fireTimes(due: number | null, now: number): number[];
}

/** Day before the due date at `defaultHour`, then one hour before the due time. */
export function dueDatePolicy(opts: { defaultHour: number; timeZone: string }): ReminderPolicy {
  return {
    name: "due",
    fireTimes(due) {
      if (due === null) return [];
      const local = localParts(due, opts.timeZone);
      const dayBefore = zonedTimeToEpoch(
        { year: local.year, month: local.month, day: local.day - 1, hour: opts.defaultHour, minute: 0 },
        opts.timeZone
      );
      return [...new Set([dayBefore, due - HOUR_MS])].sort((a, b) => a - b);
    },
  };
}

/** A single reminder a fixed number of minutes from now. */
export function fixedDelayPolicy(minutes: number): ReminderPolicy {
  return {
    name: "delay",
    fireTimes(due, now) {
      if (due === null) return [];
      return [now + minutes * MINUTE_MS];
    },
  };
}
