import type { Logger } from "winston";
import {
	CancelledError,
	ProviderUnavailableError,
	UnparseableResponseError,
	toError,
} from "../exceptions";
import type { BaseChatModel, OutputFormat } from "../llm/base";
import { ModelOutputParseError } from "../llm/exceptions";
import ppLogger from "../logging_config";
import { raceWithAbort, timeExecutionAsync } from "../utils";
import { SystemPrompt, buildDecisionMessages } from "./prompts";
import {
	type AgentDecision,
	AgentDecisionSchema,
	type Decision,
	type DecisionContext,
	type DecisionProvider,
} from "./views";

const DECISION_OUTPUT: OutputFormat<AgentDecision> = {
	name: "agent_decision",
	description: "Choose the next browser action or finish the task",
	schema: AgentDecisionSchema,
};

export interface AIDecisionProviderOptions {
	/** Catalogue of actions, rendered into the system prompt */
	actionDescriptions: string;
	historyWindow?: number;
	excerptChars?: number;
}

/**
 * Asks a chat model for the next step.
 */
export class AIDecisionProvider implements DecisionProvider {
	readonly kind = "ai" as const;
	readonly logger: Logger;
	private readonly historyWindow: number;
	private readonly excerptChars: number;

	constructor(
		private readonly llm: BaseChatModel,
		private readonly options: AIDecisionProviderOptions,
	) {
		this.historyWindow = options.historyWindow ?? 10;
		this.excerptChars = options.excerptChars ?? 2000;
		this.logger = ppLogger.child({ module: "pagepilot/decision/ai" });
	}

	get name(): string {
		return `${this.llm.provider}:${this.llm.name}`;
	}

	@timeExecutionAsync("--decide")
	async decide(context: DecisionContext): Promise<Decision> {
		const { task, history, pageState, signal } = context;
		const systemPrompt = new SystemPrompt({
			actionDescriptions: this.options.actionDescriptions,
			maxIterations: task.maxIterations,
		});
		const messages = buildDecisionMessages({
			systemPrompt,
			task,
			history,
			pageState,
			historyWindow: this.historyWindow,
			excerptChars: this.excerptChars,
		});

		let output: AgentDecision;
		try {
			const response = await raceWithAbort(
				this.llm.ainvoke(messages, DECISION_OUTPUT, { signal }),
				signal,
			);
			output = response.completion;
			if (response.usage) {
				this.logger.debug(
					`📊 ${this.name} used ${response.usage.promptTokens} prompt + ${response.usage.completionTokens} completion tokens`,
				);
			}
		} catch (error) {
			if (error instanceof CancelledError || signal?.aborted) {
				throw new CancelledError();
			}
			if (error instanceof ModelOutputParseError) {
				throw new UnparseableResponseError(
					`Model output is not a valid decision: ${error.message}`,
					error.rawOutput,
					{ cause: error },
				);
			}
			throw new ProviderUnavailableError(
				`LLM provider ${this.name} unavailable: ${toError(error).message}`,
				{ cause: error },
			);
		}

		return this.toDecision(output);
	}

	private toDecision(output: AgentDecision): Decision {
		if (output.done) {
			this.logger.debug(`🏁 Model finished the task: ${output.done.text}`);
			return {
				type: "done",
				text: output.done.text,
				success: output.done.success,
			};
		}
		if (output.action) {
			this.logger.debug(`🧠 ${output.thinking}`);
			return {
				type: "action",
				action: output.action,
				reasoning: output.thinking || undefined,
			};
		}
		throw new UnparseableResponseError(
			"Model output has neither an action nor a done verdict",
			JSON.stringify(output),
		);
	}
}
