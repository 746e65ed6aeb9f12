/**
 * Cleanup module exports
 */

export { type RetentionOptions, type RetentionTask, runRetention } from "./orchestrator";
export {
  type RetentionCandidate,
  type RetentionSelection,
  retentionCutoff,
  selectExpired,
} from "./retention";
