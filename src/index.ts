import ppLogger from "./logging_config";
export const logger = ppLogger;

export { Agent } from "./agent/service";
export type { AgentOptions } from "./agent/service";
export { ApprovalGate, autoApprove, autoReject } from "./agent/approval";
export type { ApprovalHandler } from "./agent/approval";
export { MAX_ITERATIONS_LIMIT, createTask, isTerminalStatus } from "./agent/views";
export type {
	AgentRunResult,
	AgentStatus,
	AgentStep,
	PendingApproval,
	StepOutcome,
	Task,
	TaskInput,
} from "./agent/views";

export { Controller } from "./controller/service";
export { ActionResult, AgentActionSchema, describeAction } from "./controller/views";
export type { AgentAction, ActionName } from "./controller/views";
export { Registry } from "./controller/registry/service";

export { ActionSafetyClassifier, approvalMessage } from "./safety/service";
export type { SafetyVerdict } from "./safety/service";

export * from "./browser";
export * from "./decision";

export * from "./llm";

export {
	CONFIG,
	loadSettings,
	settingsFromEnv,
} from "./config";
export type { Settings, SettingsInput } from "./config";
export * from "./exceptions";

export { TaskManager, createApp, startServer } from "./server";
export type { RunningServer, StartServerOptions, TaskSnapshot } from "./server";
