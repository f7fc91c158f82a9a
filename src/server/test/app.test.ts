import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { z } from "zod";
import type { BrowserHealth } from "../../browser/health";
import { createApp } from "../app";
import type { TaskManager } from "../task_manager";
import { DESTRUCTIVE_TASK, createTestManager } from "./helpers";

const SubmittedSchema = z.object({ taskId: z.string() });

const HEALTHY: BrowserHealth = {
	service: "pagepilot browser executor",
	status: "healthy",
	timestamp: "2024-01-01T00:00:00.000Z",
	sessionKind: "simulated",
	checks: { browserCreation: "pass", navigation: "pass", browserCleanup: "pass" },
	responseTimeMs: 5,
};

describe("REST server", () => {
	let manager: TaskManager;
	let server: Server;
	let baseUrl: string;
	let health: BrowserHealth;

	beforeEach(async () => {
		manager = createTestManager();
		health = HEALTHY;
		const app = createApp({ manager, checkHealth: async () => health });
		server = await new Promise<Server>((resolve) => {
			const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
		});
		const address = server.address();
		const port = typeof address === "object" && address !== null ? address.port : 0;
		baseUrl = `http://127.0.0.1:${port}`;
	});

	afterEach(async () => {
		await manager.shutdown();
		await new Promise<void>((resolve, reject) => {
			server.close((error) => (error ? reject(error) : resolve()));
		});
	});

	function post(path: string, body: unknown): Promise<Response> {
		return fetch(`${baseUrl}${path}`, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: JSON.stringify(body),
		});
	}

	async function submit(task: string): Promise<string> {
		const response = await post("/tasks", { task });
		return SubmittedSchema.parse(await response.json()).taskId;
	}

	test("should report browser health", async () => {
		const response = await fetch(`${baseUrl}/health`);
		expect(response.status).toBe(200);
		expect(await response.json()).toEqual(HEALTHY);
	});

	test("should answer 503 when unhealthy", async () => {
		health = {
			...HEALTHY,
			status: "unhealthy",
			checks: { browserCreation: "fail: no browser" },
			error: "no browser",
		};
		const response = await fetch(`${baseUrl}/health`);
		expect(response.status).toBe(503);
	});

	test("should accept a task and report it", async () => {
		const response = await post("/tasks", { task: "read the page title", maxIterations: 3 });
		expect(response.status).toBe(202);
		const body: unknown = await response.json();
		expect(body).toMatchObject({ status: "running" });

		const taskId = manager.list().tasks[0]?.taskId ?? "";
		await manager.wait(taskId);

		const status = await fetch(`${baseUrl}/tasks/${taskId}`);
		expect(status.status).toBe(200);
		expect(await status.json()).toMatchObject({
			taskId,
			task: "read the page title",
			status: "done",
			maxIterations: 3,
			finalText: "Submit",
			success: true,
			finalPage: {
				url: "https://example.com",
				title: "Simulated page for example.com",
				textExcerpt: "Submit",
				screenshot: null,
			},
		});
	});

	test("should reject an invalid task", async () => {
		const response = await post("/tasks", {});
		expect(response.status).toBe(400);
		expect(await response.json()).toEqual({
			error: "ValidationError",
			message: "Invalid task request: task: Required",
		});
	});

	test("should reject malformed JSON", async () => {
		const response = await fetch(`${baseUrl}/tasks`, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: "{not json",
		});
		expect(response.status).toBe(400);
		expect(await response.json()).toEqual({
			error: "ValidationError",
			message: "Malformed JSON body",
		});
	});

	test("should answer 404 for unknown tasks", async () => {
		const response = await fetch(`${baseUrl}/tasks/nope`);
		expect(response.status).toBe(404);
		expect(await response.json()).toEqual({
			error: "TaskNotFoundError",
			message: "Task nope not found",
		});
	});

	test("should page through tasks", async () => {
		const first = await submit("read one");
		const second = await submit("read two");
		await Promise.all([manager.wait(first), manager.wait(second)]);

		const response = await fetch(`${baseUrl}/tasks?status=done&limit=1`);
		expect(response.status).toBe(200);
		const page: unknown = await response.json();
		expect(page).toMatchObject({ total: 2, limit: 1, offset: 0 });
		expect(page).toHaveProperty(["tasks", 0, "taskId"], second);
	});

	test("should reject a bad query", async () => {
		const response = await fetch(`${baseUrl}/tasks?limit=abc`);
		expect(response.status).toBe(400);
	});

	test("should resolve a pending approval", async () => {
		const taskId = await submit(DESTRUCTIVE_TASK);
		await vi.waitFor(() => expect(manager.gate.pending(taskId)).toHaveLength(1));

		const status = await fetch(`${baseUrl}/tasks/${taskId}`);
		expect(await status.json()).toMatchObject({
			status: "awaiting_approval",
			pendingApproval: { stepIndex: 1 },
		});

		const response = await post(`/tasks/${taskId}/approvals/1`, { approved: false });
		expect(response.status).toBe(200);

		const result = await manager.wait(taskId);
		expect(result.history[1]?.outcome).toBe("skipped");
	});

	test("should skip approvals when the task turns security checks off", async () => {
		const response = await post("/tasks", { task: DESTRUCTIVE_TASK, enableSecurity: false });
		expect(response.status).toBe(202);
		const { taskId } = SubmittedSchema.parse(await response.json());

		const result = await manager.wait(taskId);
		expect(result.status).toBe("done");
		expect(result.history.map((step) => step.approved)).toEqual([null, null]);
		expect(result.history[1]?.outcome).toBe("ok");
		expect(manager.get(taskId).enableSecurity).toBe(false);
	});

	test("should reject a non-boolean security override", async () => {
		const response = await post("/tasks", { task: "read one", enableSecurity: "no" });
		expect(response.status).toBe(400);
		expect(await response.json()).toEqual({
			error: "ValidationError",
			message: "Invalid task request: enableSecurity: Expected boolean, received string",
		});
	});

	test("should map approval errors", async () => {
		const taskId = await submit(DESTRUCTIVE_TASK);
		await vi.waitFor(() => expect(manager.gate.pending(taskId)).toHaveLength(1));

		const wrongStep = await post(`/tasks/${taskId}/approvals/0`, { approved: true });
		expect(wrongStep.status).toBe(409);

		const badBody = await post(`/tasks/${taskId}/approvals/1`, { approved: "yes" });
		expect(badBody.status).toBe(400);
		expect(await badBody.json()).toEqual({
			error: "ValidationError",
			message: "Invalid approval: approved: Expected boolean, received string",
		});

		const badStep = await post(`/tasks/${taskId}/approvals/x`, { approved: true });
		expect(badStep.status).toBe(400);
		expect(await badStep.json()).toEqual({
			error: "ValidationError",
			message: "Invalid step index: x",
		});
	});

	test("should cancel a task once", async () => {
		const taskId = await submit(DESTRUCTIVE_TASK);
		await vi.waitFor(() => expect(manager.gate.pending(taskId)).toHaveLength(1));

		const response = await fetch(`${baseUrl}/tasks/${taskId}`, { method: "DELETE" });
		expect(response.status).toBe(200);
		expect(await response.json()).toMatchObject({ status: "failed", reason: "Cancelled" });

		const again = await fetch(`${baseUrl}/tasks/${taskId}`, { method: "DELETE" });
		expect(again.status).toBe(409);
	});

	test("should answer 404 for unknown routes", async () => {
		const response = await fetch(`${baseUrl}/nowhere`);
		expect(response.status).toBe(404);
	});
});
