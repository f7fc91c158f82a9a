import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { PageState } from "../browser/views";
import type { AgentAction } from "../controller/views";
import { ValidationError } from "../exceptions";

export const MAX_ITERATIONS_LIMIT = 20;

export const TaskInputSchema = z.object({
	description: z.string().trim().min(1, "Task description must not be empty"),
	maxIterations: z
		.number()
		.int("maxIterations must be an integer")
		.min(1)
		.max(MAX_ITERATIONS_LIMIT),
	useRealBrowser: z.boolean(),
	id: z.string().min(1).optional(),
});

export type TaskInput = z.input<typeof TaskInputSchema>;

/**
 * An immutable unit of work: one natural-language goal and its budget.
 */
export interface Task {
	readonly id: string;
	readonly description: string;
	readonly maxIterations: number;
	readonly useRealBrowser: boolean;
}

export function createTask(input: TaskInput): Task {
	const parsed = TaskInputSchema.safeParse(input);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ValidationError(`Invalid task: ${details}`);
	}
	return Object.freeze({
		id: parsed.data.id ?? uuidv4(),
		description: parsed.data.description,
		maxIterations: parsed.data.maxIterations,
		useRealBrowser: parsed.data.useRealBrowser,
	});
}

export type StepOutcome = "ok" | "failed" | "skipped";

export type DecisionSource = "ai" | "rules";

/**
 * One executed (or skipped) action. `approved` is `null` when the action
 * needed no approval.
 */
export interface AgentStep {
	readonly index: number;
	readonly action: AgentAction;
	readonly approved: boolean | null;
	readonly outcome: StepOutcome;
	readonly pageState: PageState;
	readonly error: string | null;
	readonly extractedContent: string | null;
	readonly reasoning: string | null;
	readonly provider: DecisionSource;
	readonly timestamp: string;
}

export type AgentStatus =
	| "running"
	| "awaiting_approval"
	| "done"
	| "failed"
	| "iteration_limit_reached";

export type TerminalStatus = Exclude<AgentStatus, "running" | "awaiting_approval">;

export function isTerminalStatus(status: AgentStatus): status is TerminalStatus {
	return (
		status === "done" || status === "failed" || status === "iteration_limit_reached"
	);
}

/**
 * A destructive action waiting for a human decision.
 */
export interface PendingApproval {
	readonly taskId: string;
	readonly stepIndex: number;
	readonly action: AgentAction;
	readonly message: string;
	readonly requestedAt: string;
}

export interface AgentRunResult {
	readonly taskId: string;
	readonly status: TerminalStatus;
	/** Why the loop stopped, e.g. the provider error or "Cancelled" */
	readonly reason: string | null;
	/** Name of the error class behind a failure */
	readonly error: string | null;
	readonly history: readonly AgentStep[];
	readonly finalPage: PageState | null;
	/** Text of the done verdict */
	readonly finalText: string | null;
	readonly success: boolean;
	readonly startedAt: string;
	readonly finishedAt: string;
}
