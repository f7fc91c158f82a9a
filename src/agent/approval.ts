import { CancelledError } from "../exceptions";
import ppLogger from "../logging_config";
import type { PendingApproval } from "./views";

const logger = ppLogger.child({ module: "pagepilot/agent/approval" });

/**
 * Resolves `true` to execute the destructive action, `false` to skip it.
 * Rejects with `CancelledError` when `signal` aborts.
 */
export type ApprovalHandler = (
	request: PendingApproval,
	signal?: AbortSignal,
) => Promise<boolean>;

export const autoApprove: ApprovalHandler = async () => true;

export const autoReject: ApprovalHandler = async () => false;

interface Waiter {
	request: PendingApproval;
	settle: (approved: boolean) => void;
}

function keyOf(taskId: string, stepIndex: number): string {
	return `${taskId}:${stepIndex}`;
}

/**
 * Parks approval requests until someone answers them by task id and step
 * index. With a timeout, an unanswered request resolves as a reject.
 */
export class ApprovalGate {
	private readonly waiting = new Map<string, Waiter>();

	constructor(private readonly options: { timeoutMs?: number } = {}) {}

	readonly handler: ApprovalHandler = (request, signal) =>
		this.wait(request, signal);

	private wait(request: PendingApproval, signal?: AbortSignal): Promise<boolean> {
		if (signal?.aborted) {
			return Promise.reject(new CancelledError());
		}
		const key = keyOf(request.taskId, request.stepIndex);
		const timeoutMs = this.options.timeoutMs ?? 0;

		return new Promise<boolean>((resolve, reject) => {
			let timer: NodeJS.Timeout | undefined;
			const cleanup = () => {
				if (timer) {
					clearTimeout(timer);
				}
				signal?.removeEventListener("abort", onAbort);
				this.waiting.delete(key);
			};
			const onAbort = () => {
				cleanup();
				reject(new CancelledError());
			};

			if (timeoutMs > 0) {
				timer = setTimeout(() => {
					logger.warn(
						`⏰ No answer for step ${request.stepIndex} of task ${request.taskId} after ${timeoutMs}ms, rejecting`,
					);
					cleanup();
					resolve(false);
				}, timeoutMs);
			}
			signal?.addEventListener("abort", onAbort, { once: true });
			this.waiting.set(key, {
				request,
				settle: (approved) => {
					cleanup();
					resolve(approved);
				},
			});
		});
	}

	/**
	 * Answer a pending request. Returns false when nothing is waiting under
	 * that task id and step index.
	 */
	resolve(taskId: string, stepIndex: number, approved: boolean): boolean {
		const waiter = this.waiting.get(keyOf(taskId, stepIndex));
		if (!waiter) {
			return false;
		}
		logger.info(
			`${approved ? "✅ Approved" : "🚫 Rejected"} step ${stepIndex} of task ${taskId}`,
		);
		waiter.settle(approved);
		return true;
	}

	pending(taskId?: string): PendingApproval[] {
		return [...this.waiting.values()]
			.map((waiter) => waiter.request)
			.filter((request) => taskId === undefined || request.taskId === taskId);
	}

	/** Reject everything still waiting. */
	rejectAll(): void {
		for (const waiter of [...this.waiting.values()]) {
			waiter.settle(false);
		}
	}
}
