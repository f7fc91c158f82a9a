import { z } from "zod";
import type { AgentStep, Task } from "../agent/views";
import type { PageState } from "../browser/views";
import { type AgentAction, AgentActionSchema } from "../controller/views";

export type Decision =
	| { type: "action"; action: AgentAction; reasoning?: string }
	| { type: "done"; text: string; success: boolean };

export interface DecisionContext {
	task: Task;
	history: readonly AgentStep[];
	pageState: PageState;
	signal?: AbortSignal;
}

export interface DecisionProvider {
	readonly kind: "ai" | "rules";
	/** Shown in logs, e.g. the model name */
	readonly name: string;
	decide(context: DecisionContext): Promise<Decision>;
}

/**
 * Chosen once per task. With `ai`, a failing decision is retried once through
 * `fallback`.
 */
export type DecisionStrategy =
	| { kind: "ai"; primary: DecisionProvider; fallback: DecisionProvider }
	| { kind: "rules"; primary: DecisionProvider };

/**
 * What the model must answer with: either the next action or a done verdict.
 */
export const AgentDecisionSchema = z.object({
	thinking: z
		.string()
		.describe("Short reasoning about the page and what to do next"),
	action: AgentActionSchema.nullable().describe(
		"The next browser action, or null when the task is finished",
	),
	done: z
		.object({
			text: z.string().describe("Final answer or summary for the user"),
			success: z.boolean(),
		})
		.nullable()
		.describe("Set when the task is finished (or cannot be finished)"),
});

export type AgentDecision = z.output<typeof AgentDecisionSchema>;
