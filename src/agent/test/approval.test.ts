import { afterEach, describe, expect, test, vi } from "vitest";
import { CancelledError } from "../../exceptions";
import { ApprovalGate } from "../approval";
import type { PendingApproval } from "../views";

function request(taskId: string, stepIndex: number): PendingApproval {
	return {
		taskId,
		stepIndex,
		action: { name: "click", selector: "button#submit" },
		message: "Click on element: button#submit",
		requestedAt: "2024-01-01T00:00:00.000Z",
	};
}

describe("ApprovalGate", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	test("should resolve the waiting request with the answer", async () => {
		const gate = new ApprovalGate();
		const approved = gate.handler(request("task-1", 0));
		expect(gate.pending("task-1")).toHaveLength(1);

		expect(gate.resolve("task-1", 0, true)).toBe(true);
		await expect(approved).resolves.toBe(true);
		expect(gate.pending()).toEqual([]);
	});

	test("should key requests by task and step", async () => {
		const gate = new ApprovalGate();
		const first = gate.handler(request("task-1", 0));
		const second = gate.handler(request("task-2", 0));

		expect(gate.resolve("task-1", 1, true)).toBe(false);
		expect(gate.pending("task-2").map((pending) => pending.taskId)).toEqual(["task-2"]);

		gate.resolve("task-2", 0, false);
		gate.resolve("task-1", 0, true);
		await expect(first).resolves.toBe(true);
		await expect(second).resolves.toBe(false);
	});

	test("should reject after the timeout", async () => {
		vi.useFakeTimers();
		const gate = new ApprovalGate({ timeoutMs: 1000 });
		const approved = gate.handler(request("task-1", 0));

		await vi.advanceTimersByTimeAsync(1000);

		await expect(approved).resolves.toBe(false);
		expect(gate.resolve("task-1", 0, true)).toBe(false);
	});

	test("should fail with CancelledError when aborted", async () => {
		const gate = new ApprovalGate();
		const abort = new AbortController();
		const approved = gate.handler(request("task-1", 0), abort.signal);

		abort.abort();

		await expect(approved).rejects.toThrow(CancelledError);
		expect(gate.pending()).toEqual([]);
	});

	test("should reject everything on rejectAll", async () => {
		const gate = new ApprovalGate();
		const first = gate.handler(request("task-1", 0));
		const second = gate.handler(request("task-2", 3));

		gate.rejectAll();

		await expect(first).resolves.toBe(false);
		await expect(second).resolves.toBe(false);
	});
});
