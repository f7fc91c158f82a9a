import { describe, expect, test } from "vitest";
import { ValidationError } from "../../exceptions";
import { createTask, isTerminalStatus } from "../views";

describe("createTask", () => {
	test("should trim the description and keep the given id", () => {
		const task = createTask({
			id: "task-1",
			description: "  read the page title  ",
			maxIterations: 3,
			useRealBrowser: true,
		});
		expect(task).toEqual({
			id: "task-1",
			description: "read the page title",
			maxIterations: 3,
			useRealBrowser: true,
		});
		expect(Object.isFrozen(task)).toBe(true);
	});

	test("should generate an id", () => {
		const task = createTask({ description: "x", maxIterations: 1, useRealBrowser: false });
		expect(task.id).toMatch(/^[0-9a-f-]{36}$/);
	});

	test("should reject an empty description", () => {
		expect(() =>
			createTask({ description: "   ", maxIterations: 5, useRealBrowser: false }),
		).toThrow("Invalid task: description: Task description must not be empty");
	});

	test.each([0, 21, 2.5])("should reject %d iterations", (maxIterations) => {
		expect(() =>
			createTask({ description: "read", maxIterations, useRealBrowser: false }),
		).toThrow(ValidationError);
	});
});

describe("isTerminalStatus", () => {
	test("should only accept final statuses", () => {
		expect(isTerminalStatus("done")).toBe(true);
		expect(isTerminalStatus("failed")).toBe(true);
		expect(isTerminalStatus("iteration_limit_reached")).toBe(true);
		expect(isTerminalStatus("running")).toBe(false);
		expect(isTerminalStatus("awaiting_approval")).toBe(false);
	});
});
