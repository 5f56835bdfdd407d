export { nextWeeklyRun, nextDailyRun } from './schedule.js';
export type { DailySchedule } from './schedule.js';
export { runJobLoop, sleepUntilAborted } from './job-loop.js';
export type { ScheduledJob, JobLoopOptions } from './job-loop.js';
