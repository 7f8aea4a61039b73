export {
	ConnectivityWatchdog,
	WatchdogStatus,
	silenceStatus,
	type WatchdogConfig,
	type WatchdogSnapshot,
} from "./watchdog.js";

export {
	WorkerSupervisor,
	TaskState,
	type RestartEvent,
	type ShutdownSignal,
	type StopReport,
	type SupervisedTask,
	type SupervisorConfig,
	type SupervisorLifecycle,
	type SupervisorStatus,
	type TaskStatus,
	type WorkerSupervisorDeps,
} from "./worker-supervisor.js";
