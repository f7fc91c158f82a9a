import { afterEach, describe, expect, test, vi } from "vitest";
import { TaskNotFoundError, TaskStateError, ValidationError } from "../../exceptions";
import type { TaskManager } from "../task_manager";
import { DESTRUCTIVE_TASK, createTestManager } from "./helpers";

describe("TaskManager", () => {
	let manager: TaskManager;

	afterEach(async () => {
		await manager.shutdown();
	});

	test("should run a submitted task to completion", async () => {
		manager = createTestManager();
		const submitted = manager.submit({ task: "read the page title" });
		expect(submitted.status).toBe("running");
		expect(submitted.maxIterations).toBe(5);
		expect(submitted.useRealBrowser).toBe(false);

		const result = await manager.wait(submitted.taskId);
		expect(result.status).toBe("done");

		const snapshot = manager.get(submitted.taskId);
		expect(snapshot.status).toBe("done");
		expect(snapshot.finalText).toBe("Submit");
		expect(snapshot.success).toBe(true);
		expect(snapshot.history).toHaveLength(2);
		expect(snapshot.finishedAt).not.toBeNull();
	});

	test("should validate the task", () => {
		manager = createTestManager();
		expect(() => manager.submit({ task: "   " })).toThrow(ValidationError);
	});

	test("should report unknown tasks", () => {
		manager = createTestManager();
		expect(() => manager.get("nope")).toThrow(TaskNotFoundError);
	});

	test("should list tasks newest first", async () => {
		manager = createTestManager();
		const ids = ["read one", "read two", "read three"].map(
			(task) => manager.submit({ task }).taskId,
		);
		await Promise.all(ids.map((id) => manager.wait(id)));

		const page = manager.list({ limit: 2 });
		expect(page.total).toBe(3);
		expect(page.tasks.map((task) => task.task)).toEqual(["read three", "read two"]);

		const rest = manager.list({ limit: 2, offset: 2 });
		expect(rest.tasks.map((task) => task.task)).toEqual(["read one"]);

		expect(manager.list({ status: "failed" }).total).toBe(0);
	});

	test("should wait for approval and run the approved step", async () => {
		manager = createTestManager();
		const { taskId } = manager.submit({ task: DESTRUCTIVE_TASK });

		await vi.waitFor(() => expect(manager.gate.pending(taskId)).toHaveLength(1));
		const waiting = manager.get(taskId);
		expect(waiting.status).toBe("awaiting_approval");
		expect(waiting.pendingApproval?.stepIndex).toBe(1);
		expect(waiting.pendingApproval?.message).toBe(
			"Click on element: button[type='submit'], button#submit",
		);

		manager.approve(taskId, 1, true);
		const result = await manager.wait(taskId);
		expect(result.status).toBe("done");
		expect(result.success).toBe(true);
		expect(result.history[1]?.approved).toBe(true);
		expect(result.history[1]?.outcome).toBe("ok");
	});

	test("should refuse an approval nobody waits for", async () => {
		manager = createTestManager();
		const { taskId } = manager.submit({ task: DESTRUCTIVE_TASK });
		await vi.waitFor(() => expect(manager.gate.pending(taskId)).toHaveLength(1));

		expect(() => manager.approve(taskId, 0, true)).toThrow(TaskStateError);
	});

	test("should reject on approval timeout", async () => {
		manager = createTestManager({ approvalTimeoutMs: 20 });
		const { taskId } = manager.submit({ task: DESTRUCTIVE_TASK });

		const result = await manager.wait(taskId);
		expect(result.history[1]?.outcome).toBe("skipped");
		expect(result.success).toBe(false);
	});

	test("should cancel a waiting task", async () => {
		manager = createTestManager();
		const { taskId } = manager.submit({ task: DESTRUCTIVE_TASK });
		await vi.waitFor(() => expect(manager.gate.pending(taskId)).toHaveLength(1));

		const cancelled = await manager.cancel(taskId);
		expect(cancelled.status).toBe("failed");
		expect(cancelled.reason).toBe("Cancelled");
		expect(cancelled.error).toBe("CancelledError");
		expect(manager.gate.pending(taskId)).toEqual([]);

		await expect(manager.cancel(taskId)).rejects.toThrow(TaskStateError);
	});

	test("should evict the oldest finished tasks", async () => {
		manager = createTestManager({ maxStoredTasks: 1 });
		const first = manager.submit({ task: "read one" }).taskId;
		await manager.wait(first);
		const second = manager.submit({ task: "read two" }).taskId;
		await manager.wait(second);

		expect(() => manager.get(first)).toThrow(TaskNotFoundError);
		expect(manager.get(second).status).toBe("done");
	});

	test("should cancel running tasks on shutdown", async () => {
		manager = createTestManager();
		const { taskId } = manager.submit({ task: DESTRUCTIVE_TASK });
		await vi.waitFor(() => expect(manager.gate.pending(taskId)).toHaveLength(1));

		await manager.shutdown();
		expect(manager.get(taskId).reason).toBe("Cancelled");
	});
});
