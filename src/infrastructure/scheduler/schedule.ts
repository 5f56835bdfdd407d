import type { WeeklySchedule } from '../config/app-config.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DailySchedule {
  hour: number;
  minute: number;
}

function atTimeOfDay(from: Date, hour: number, minute: number): Date {
  return new Date(Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate(), hour, minute, 0, 0));
}

/** Next occurrence of `schedule` strictly after `from`, in UTC. */
export function nextWeeklyRun(from: Date, schedule: WeeklySchedule): Date {
  const daysAhead = (schedule.dayOfWeek - from.getUTCDay() + 7) % 7;
  const candidate = new Date(atTimeOfDay(from, schedule.hour, schedule.minute).getTime() + daysAhead * DAY_MS);
  return candidate.getTime() > from.getTime() ? candidate : new Date(candidate.getTime() + 7 * DAY_MS);
}

/** Next occurrence of `schedule` strictly after `from`, in UTC. */
export function nextDailyRun(from: Date, schedule: DailySchedule): Date {
  const candidate = atTimeOfDay(from, schedule.hour, schedule.minute);
  return candidate.getTime() > from.getTime() ? candidate : new Date(candidate.getTime() + DAY_MS);
}
