export { QUEUE_NAMES, createQueues, closeQueues, parseRedisConnection } from "./queues.js";
export type { QueueConfig, Queues } from "./queues.js";
export {
  SCHEDULER_IDS,
  SENT_EMAIL_SWEEP_CRON,
  REVOKED_KEY_SWEEP_CRON,
  scheduleRecurringJobs,
} from "./schedules.js";
export type { ScheduleOptions } from "./schedules.js";
export { BullMqSetupDispatcher } from "./setup-dispatcher.js";
