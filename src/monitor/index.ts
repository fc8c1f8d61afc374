export { createMonitor, processRelease } from "./orchestrator";
export type {
  Monitor,
  MonitorDeps,
  MonitorSettings,
  RunOptions,
  RunReport,
  DetectedChange,
  SentNotification,
  ProcessResult,
} from "./orchestrator";
