export { ExitReason, evaluateExit, exitThresholds } from "./exit-policy.js";
export type { ExitDecision, ExitThresholds } from "./exit-policy.js";
export { ExitMonitor } from "./exit-monitor.js";
export type { ExitEvent, ExitMonitorConfig, ExitMonitorDeps, ExitMonitorEvents, ExitSeller } from "./exit-monitor.js";
