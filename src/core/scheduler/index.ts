/**
 * Scheduler module exports
 */

export { type ParsedCron, type ParseCronOptions, getNextRun, normalizeCron, parseCron } from "./cron-parser";
export {
  dayOfWeekOptions,
  describeSchedule,
  fromCron,
  isScheduleKind,
  SCHEDULE_KINDS,
  type ScheduleIntent,
  type ScheduleKind,
  toCron,
} from "./cron-translator";
export { Daemon, type DaemonOptions } from "./daemon";
export { type JobStatus, TaskScheduler, type TaskDumper, type TaskSchedulerOptions } from "./task-scheduler";
