/**
 * Collection package
 *
 * Rate-limited, paged and concurrent collection of Guru transactions.
 */

export { RateGate } from './RateGate.js';
export type { RateGateConfig, RateGateStats } from './RateGate.js';
export { GuruClient } from './GuruClient.js';
export type { GuruClientConfig, HttpGetter, FetchOptions, FetchOutcome } from './GuruClient.js';
export { runTasks } from './TaskScheduler.js';
export type { Task, ProgressCallback, RunTasksOptions, RunTasksResult } from './TaskScheduler.js';
export {
  bimesterOfMonth,
  bimesterEnd,
  bimesterStart,
  firstDayOfNextMonth,
  monthEnd,
  monthStart,
  multiYearWindow,
  periodOfDate,
  splitIntoQuarterBlocks,
  subscriptionPeriod,
} from './periods.js';
export type { DateBlock, SubscriptionPeriod } from './periods.js';
