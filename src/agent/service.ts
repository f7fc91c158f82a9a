import type { Logger } from "winston";
import { openBrowserSession } from "../browser/factory";
import type { BrowserSession } from "../browser/types";
import { PageState } from "../browser/views";
import type { Settings } from "../config";
import { Controller } from "../controller/service";
import { type AgentAction, describeAction } from "../controller/views";
import { decideNext, selectDecisionStrategy } from "../decision/service";
import type { DecisionStrategy } from "../decision/views";
import {
	CancelledError,
	DecisionFailedError,
	toError,
} from "../exceptions";
import type { BaseChatModel } from "../llm/base";
import { createChatModel } from "../llm/factory";
import ppLogger from "../logging_config";
import { ActionSafetyClassifier, approvalMessage } from "../safety/service";
import { raceWithAbort, throwIfAborted } from "../utils";
import type { ApprovalHandler } from "./approval";
import type {
	AgentRunResult,
	AgentStatus,
	AgentStep,
	DecisionSource,
	PendingApproval,
	Task,
	TerminalStatus,
} from "./views";

type Callback<T extends unknown[]> = (...args: T) => void | Promise<void>;

export interface AgentOptions {
	settings: Settings;
	approvalHandler: ApprovalHandler;
	/** Defaults to the model the LLM settings describe; `null` forces rules */
	llm?: BaseChatModel | null;
	/** Replaces strategy selection entirely */
	strategy?: DecisionStrategy;
	controller?: Controller;
	classifier?: ActionSafetyClassifier;
	openSession?: (task: Task, signal?: AbortSignal) => Promise<BrowserSession>;
	signal?: AbortSignal;

	registerNewStepCallback?: Callback<[step: AgentStep, agent: Agent]>;
	registerStatusCallback?: Callback<[status: AgentStatus, agent: Agent]>;
	registerApprovalCallback?: Callback<[request: PendingApproval, agent: Agent]>;
	registerDoneCallback?: Callback<[result: AgentRunResult]>;
}

interface Outcome {
	status: TerminalStatus;
	reason: string | null;
	error: string | null;
	finalText: string | null;
	success: boolean;
}

/**
 * Runs one task: decide, classify, wait for approval when the action is
 * destructive, act, observe; until done, failure, cancellation or the
 * iteration limit.
 */
export class Agent {
	readonly task: Task;
	readonly logger: Logger;

	private readonly settings: Settings;
	private readonly approvalHandler: ApprovalHandler;
	private readonly controller: Controller;
	private readonly classifier: ActionSafetyClassifier;
	private readonly strategy: DecisionStrategy;
	private readonly openSession: (
		task: Task,
		signal?: AbortSignal,
	) => Promise<BrowserSession>;
	private readonly signal?: AbortSignal;
	private readonly options: AgentOptions;

	private _status: AgentStatus = "running";
	private _history: AgentStep[] = [];
	private _pendingApproval: PendingApproval | null = null;
	private _iteration = 0;
	private pageState: PageState = PageState.empty();
	private started = false;

	constructor(task: Task, options: AgentOptions) {
		this.task = task;
		this.options = options;
		this.settings = options.settings;
		this.approvalHandler = options.approvalHandler;
		this.signal = options.signal;
		this.logger = ppLogger.child({
			module: `pagepilot/agent/${task.id.slice(-4)}`,
		});

		this.controller =
			options.controller ??
			new Controller({ excerptChars: this.settings.agent.pageExcerptChars });
		this.classifier =
			options.classifier ??
			new ActionSafetyClassifier({
				enabled: this.settings.agent.enableSecurityChecks,
			});
		this.strategy =
			options.strategy ??
			selectDecisionStrategy({
				agent: this.settings.agent,
				llm:
					options.llm === undefined
						? createChatModel(this.settings.llm)
						: options.llm,
				actionDescriptions: this.controller.getPromptDescription(),
			});
		this.openSession =
			options.openSession ??
			((_task, signal) =>
				openBrowserSession({
					useRealBrowser: task.useRealBrowser,
					browser: this.settings.browser,
					signal,
				}));
	}

	get status(): AgentStatus {
		return this._status;
	}

	get history(): readonly AgentStep[] {
		return this._history;
	}

	get pendingApproval(): PendingApproval | null {
		return this._pendingApproval;
	}

	get iteration(): number {
		return this._iteration;
	}

	get strategyKind(): DecisionStrategy["kind"] {
		return this.strategy.kind;
	}

	/**
	 * Run the loop to a terminal state. Never rejects: failures and
	 * cancellation are reported in the result.
	 */
	async run(): Promise<AgentRunResult> {
		if (this.started) {
			throw new Error(`Task ${this.task.id} has already been run`);
		}
		this.started = true;

		const startedAt = new Date().toISOString();
		this.logger.info(`🚀 Starting task: ${this.task.description}`);

		let session: BrowserSession | null = null;
		let outcome: Outcome;
		try {
			throwIfAborted(this.signal);
			session = await this.openSession(this.task, this.signal);
			throwIfAborted(this.signal);
			this.pageState = await session.getPageState({
				excerptChars: this.settings.agent.pageExcerptChars,
			});
			outcome = await this.loop(session);
		} catch (error) {
			outcome = this.failureOutcome(error);
		} finally {
			await this.closeSession(session);
		}

		await this.setStatus(outcome.status);
		const result: AgentRunResult = {
			taskId: this.task.id,
			status: outcome.status,
			reason: outcome.reason,
			error: outcome.error,
			history: [...this._history],
			finalPage: this._history.length > 0 || session ? this.pageState : null,
			finalText: outcome.finalText,
			success: outcome.success,
			startedAt,
			finishedAt: new Date().toISOString(),
		};
		this.logResult(result);
		await this.emit("registerDoneCallback", result);
		return result;
	}

	private async loop(session: BrowserSession): Promise<Outcome> {
		const maxIterations = this.task.maxIterations;

		while (true) {
			throwIfAborted(this.signal);
			const { decision, source } = await decideNext(this.strategy, {
				task: this.task,
				history: this._history,
				pageState: this.pageState,
				signal: this.signal,
			});
			throwIfAborted(this.signal);

			if (decision.type === "done") {
				return {
					status: "done",
					reason: null,
					error: null,
					finalText: decision.text,
					success: decision.success,
				};
			}

			const step = await this.executeStep(
				session,
				decision.action,
				source,
				decision.reasoning ?? null,
			);
			this._history.push(step);
			await this.emit("registerNewStepCallback", step, this);

			this._iteration += 1;
			if (this._iteration >= maxIterations) {
				this.logger.warn(`⚠️ Reached the limit of ${maxIterations} iterations`);
				return {
					status: "iteration_limit_reached",
					reason: `Reached the iteration limit of ${maxIterations}`,
					error: null,
					finalText: null,
					success: false,
				};
			}
		}
	}

	private async executeStep(
		session: BrowserSession,
		action: AgentAction,
		provider: DecisionSource,
		reasoning: string | null,
	): Promise<AgentStep> {
		const index = this._history.length;
		this.logger.info(`📍 Step ${index + 1}: ${describeAction(action)} (${provider})`);

		let approved: boolean | null = null;
		if (this.classifier.isDestructive(action)) {
			approved = await this.requestApproval(index, action);
		}

		const base = {
			index,
			action,
			approved,
			reasoning,
			provider,
		};

		if (approved === false) {
			this.logger.info(`⏭️ Step ${index + 1} skipped: approval rejected`);
			return {
				...base,
				outcome: "skipped",
				pageState: this.pageState,
				error: null,
				extractedContent: null,
				timestamp: new Date().toISOString(),
			};
		}

		const result = await this.controller.act(action, session, {
			signal: this.signal,
			previousState: this.pageState,
		});
		this.pageState = result.pageState;
		return {
			...base,
			outcome: result.ok ? "ok" : "failed",
			pageState: result.pageState,
			error: result.error,
			extractedContent: result.extractedContent,
			timestamp: new Date().toISOString(),
		};
	}

	/**
	 * Suspend until the approval handler answers. A handler that fails counts
	 * as a reject; cancellation propagates.
	 */
	private async requestApproval(
		stepIndex: number,
		action: AgentAction,
	): Promise<boolean> {
		const request: PendingApproval = {
			taskId: this.task.id,
			stepIndex,
			action,
			message: approvalMessage(action),
			requestedAt: new Date().toISOString(),
		};
		this._pendingApproval = request;
		await this.setStatus("awaiting_approval");
		await this.emit("registerApprovalCallback", request, this);
		this.logger.info(`✋ Approval required: ${request.message}`);

		try {
			return await raceWithAbort(
				this.approvalHandler(request, this.signal),
				this.signal,
			);
		} catch (error) {
			if (error instanceof CancelledError || this.signal?.aborted) {
				throw new CancelledError();
			}
			this.logger.warn(
				`⚠️ Approval handler failed, treating as reject: ${toError(error).message}`,
			);
			return false;
		} finally {
			this._pendingApproval = null;
			if (!this.signal?.aborted) {
				await this.setStatus("running");
			}
		}
	}

	private failureOutcome(error: unknown): Outcome {
		if (error instanceof CancelledError || this.signal?.aborted) {
			this.logger.warn("🛑 Task cancelled");
			return {
				status: "failed",
				reason: "Cancelled",
				error: "CancelledError",
				finalText: null,
				success: false,
			};
		}
		if (error instanceof DecisionFailedError) {
			this.logger.error(
				`❌ No decision possible: ${error.providerError.message}` +
					(error.fallbackError ? ` (fallback: ${error.fallbackError.message})` : ""),
			);
			return {
				status: "failed",
				reason: error.providerError.message,
				error: error.providerError.name,
				finalText: null,
				success: false,
			};
		}
		const failure = toError(error);
		this.logger.error(`❌ Task failed: ${failure.message}`);
		return {
			status: "failed",
			reason: failure.message,
			error: failure.name,
			finalText: null,
			success: false,
		};
	}

	private async closeSession(session: BrowserSession | null): Promise<void> {
		if (!session) {
			return;
		}
		try {
			await session.close();
		} catch (error) {
			this.logger.warn(
				`⚠️ Failed to close browser session: ${toError(error).message}`,
			);
		}
	}

	private async setStatus(status: AgentStatus): Promise<void> {
		if (this._status === status) {
			return;
		}
		this._status = status;
		await this.emit("registerStatusCallback", status, this);
	}

	private async emit<
		K extends
			| "registerNewStepCallback"
			| "registerStatusCallback"
			| "registerApprovalCallback"
			| "registerDoneCallback",
	>(name: K, ...args: Parameters<NonNullable<AgentOptions[K]>>): Promise<void> {
		const callback = this.options[name];
		if (!callback) {
			return;
		}
		try {
			await Reflect.apply(callback, undefined, args);
		} catch (error) {
			this.logger.warn(`⚠️ ${name} threw: ${toError(error).message}`);
		}
	}

	private logResult(result: AgentRunResult): void {
		const steps = `${result.history.length} step(s)`;
		switch (result.status) {
			case "done":
				this.logger.info(
					`${result.success ? "✅" : "⚠️"} Task done after ${steps}: ${result.finalText ?? ""}`,
				);
				break;
			case "iteration_limit_reached":
				this.logger.info(`⏹️ Stopped at the iteration limit after ${steps}`);
				break;
			case "failed":
				this.logger.info(`❌ Task failed after ${steps}: ${result.reason ?? ""}`);
				break;
		}
	}
}
