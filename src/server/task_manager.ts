import { ApprovalGate } from "../agent/approval";
import { Agent, type AgentOptions } from "../agent/service";
import {
	type AgentRunResult,
	type Task,
	createTask,
	isTerminalStatus,
} from "../agent/views";
import type { Settings } from "../config";
import { ActionSafetyClassifier } from "../safety/service";
import { TaskNotFoundError, TaskStateError, toError } from "../exceptions";
import ppLogger from "../logging_config";
import {
	type CreateTaskRequest,
	type ListTasksQuery,
	ListTasksQuerySchema,
	type TaskPage,
	type TaskSnapshot,
	parseRequest,
} from "./views";

const logger = ppLogger.child({ module: "pagepilot/server/task_manager" });

/** Agent collaborators shared by every task the manager starts */
export type AgentDefaults = Pick<
	AgentOptions,
	"llm" | "strategy" | "controller" | "classifier" | "openSession"
>;

export interface TaskManagerOptions {
	settings: Settings;
	agentDefaults?: AgentDefaults;
}

interface TaskRecord {
	task: Task;
	agent: Agent;
	abort: AbortController;
	enableSecurity: boolean;
	createdAt: string;
	result: AgentRunResult | null;
	finished: Promise<AgentRunResult>;
}

/**
 * Hosts one agent loop per submitted task. Loops run concurrently and share
 * nothing but the approval gate, which is keyed by task id.
 */
export class TaskManager {
	readonly gate: ApprovalGate;
	private readonly records = new Map<string, TaskRecord>();
	private readonly settings: Settings;
	private readonly agentDefaults: AgentDefaults;

	constructor(options: TaskManagerOptions) {
		this.settings = options.settings;
		this.agentDefaults = options.agentDefaults ?? {};
		this.gate = new ApprovalGate({
			timeoutMs: this.settings.server.approvalTimeoutMs,
		});
	}

	/** Start a task in the background and return its first snapshot. */
	submit(request: CreateTaskRequest): TaskSnapshot {
		const task = createTask({
			description: request.task,
			maxIterations: request.maxIterations ?? this.settings.agent.maxIterations,
			useRealBrowser: request.useRealBrowser ?? this.settings.agent.useRealBrowser,
		});
		const classifier =
			request.enableSecurity === undefined
				? this.agentDefaults.classifier ??
					new ActionSafetyClassifier({
						enabled: this.settings.agent.enableSecurityChecks,
					})
				: new ActionSafetyClassifier({ enabled: request.enableSecurity });
		const abort = new AbortController();
		const agent = new Agent(task, {
			...this.agentDefaults,
			classifier,
			settings: this.settings,
			approvalHandler: this.gate.handler,
			signal: abort.signal,
		});

		const record: TaskRecord = {
			task,
			agent,
			abort,
			enableSecurity: classifier.enabled,
			createdAt: new Date().toISOString(),
			result: null,
			finished: agent.run(),
		};
		record.finished = record.finished.then(
			(result) => {
				record.result = result;
				this.evictFinished();
				return result;
			},
			(error: unknown) => {
				const failure = toError(error);
				logger.error(`❌ Task ${task.id} crashed: ${failure.message}`);
				const result: AgentRunResult = {
					taskId: task.id,
					status: "failed",
					reason: failure.message,
					error: failure.name,
					history: agent.history,
					finalPage: null,
					finalText: null,
					success: false,
					startedAt: record.createdAt,
					finishedAt: new Date().toISOString(),
				};
				record.result = result;
				return result;
			},
		);
		this.records.set(task.id, record);
		logger.info(`📥 Accepted task ${task.id}: ${task.description}`);
		return this.snapshot(record);
	}

	get(taskId: string): TaskSnapshot {
		return this.snapshot(this.require(taskId));
	}

	/** Newest first. */
	list(query: ListTasksQuery = {}): TaskPage {
		const { status, limit, offset } = parseRequest(
			ListTasksQuerySchema,
			query,
			"query",
		);
		const matching = [...this.records.values()]
			.map((record) => this.snapshot(record))
			.filter((snapshot) => status === undefined || snapshot.status === status)
			.reverse();
		return {
			total: matching.length,
			limit,
			offset,
			tasks: matching.slice(offset, offset + limit),
		};
	}

	/** Resolves once the task has reached a terminal state. */
	async wait(taskId: string): Promise<AgentRunResult> {
		return await this.require(taskId).finished;
	}

	/**
	 * Cancel a running task and wait for its loop to release the browser.
	 */
	async cancel(taskId: string): Promise<TaskSnapshot> {
		const record = this.require(taskId);
		if (record.result || isTerminalStatus(record.agent.status)) {
			throw new TaskStateError(
				`Task ${taskId} has already finished with status ${this.snapshot(record).status}`,
			);
		}
		logger.info(`🛑 Cancelling task ${taskId}`);
		record.abort.abort();
		await record.finished;
		return this.snapshot(record);
	}

	/**
	 * Answer the approval request of step `stepIndex`.
	 */
	approve(taskId: string, stepIndex: number, approved: boolean): TaskSnapshot {
		const record = this.require(taskId);
		if (!this.gate.resolve(taskId, stepIndex, approved)) {
			throw new TaskStateError(
				`Task ${taskId} has no pending approval for step ${stepIndex}`,
			);
		}
		return this.snapshot(record);
	}

	/** Cancel everything still running and wait for the loops to end. */
	async shutdown(): Promise<void> {
		const running = [...this.records.values()].filter((record) => !record.result);
		if (running.length > 0) {
			logger.info(`🛑 Cancelling ${running.length} running task(s)`);
		}
		for (const record of running) {
			record.abort.abort();
		}
		await Promise.all(running.map((record) => record.finished));
	}

	private require(taskId: string): TaskRecord {
		const record = this.records.get(taskId);
		if (!record) {
			throw new TaskNotFoundError(taskId);
		}
		return record;
	}

	/** Drop the oldest finished tasks beyond `maxStoredTasks`. */
	private evictFinished(): void {
		const excess = this.records.size - this.settings.server.maxStoredTasks;
		if (excess <= 0) {
			return;
		}
		const finished = [...this.records.values()]
			.filter((record) => record.result)
			.slice(0, excess);
		for (const record of finished) {
			this.records.delete(record.task.id);
		}
		logger.debug(`Evicted ${finished.length} finished task(s)`);
	}

	private snapshot(record: TaskRecord): TaskSnapshot {
		const { task, agent, result } = record;
		return {
			taskId: task.id,
			task: task.description,
			status: result?.status ?? agent.status,
			maxIterations: task.maxIterations,
			useRealBrowser: task.useRealBrowser,
			enableSecurity: record.enableSecurity,
			iteration: agent.iteration,
			createdAt: record.createdAt,
			finishedAt: result?.finishedAt ?? null,
			history: result?.history ?? [...agent.history],
			pendingApproval: agent.pendingApproval,
			finalPage: result?.finalPage ?? null,
			finalText: result?.finalText ?? null,
			success: result ? result.success : null,
			reason: result?.reason ?? null,
			error: result?.error ?? null,
		};
	}
}
