/**
 * Report module exports
 */

export { type CadenceFields, computeNextSend, shouldFire } from "./cadence";
export { generateReport, type ReportSelection } from "./generator";
export { floorToMinute, ReportScheduler, type ReportSchedulerOptions } from "./scheduler";
