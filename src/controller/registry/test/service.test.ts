import { describe, expect, test } from "vitest";
import { z } from "zod";
import { SimulatedBrowserSession } from "../../../browser/simulated";
import { ValidationError } from "../../../exceptions";
import { Registry } from "../service";

const GreetParams = z.object({ who: z.string() });

function registryWithGreet(): Registry {
	const registry = new Registry();
	registry.action("Say hello", { name: "greet", paramModel: GreetParams })(
		async (params) => ({ extractedContent: `Hello, ${params.who}` }),
	);
	return registry;
}

describe("Registry", () => {
	const context = { session: new SimulatedBrowserSession() };

	test("should run a registered action with validated params", async () => {
		const registry = registryWithGreet();
		expect(registry.has("greet")).toBe(true);
		await expect(
			registry.executeAction("greet", { who: "Ada" }, context),
		).resolves.toEqual({ extractedContent: "Hello, Ada" });
	});

	test("should reject invalid params", async () => {
		const registry = registryWithGreet();
		const error = await registry
			.executeAction("greet", { who: 42 }, context)
			.catch((reason: unknown) => reason);
		expect(error).toBeInstanceOf(ValidationError);
		expect(error).toHaveProperty(
			"message",
			"Invalid parameters for action greet: who: Expected string, received number",
		);
	});

	test("should reject unknown actions", async () => {
		await expect(
			registryWithGreet().executeAction("wave", {}, context),
		).rejects.toThrow("Action wave not found");
	});

	test("should let a later registration replace an action", async () => {
		const registry = registryWithGreet();
		registry.action("Say hi", { name: "greet", paramModel: GreetParams })(
			async (params) => ({ extractedContent: `Hi, ${params.who}` }),
		);
		await expect(
			registry.executeAction("greet", { who: "Ada" }, context),
		).resolves.toEqual({ extractedContent: "Hi, Ada" });
	});

	test("should describe actions for the prompt", () => {
		expect(registryWithGreet().getPromptDescription()).toBe(
			'Say hello: \n{greet: {"who":{"type":"string"}}}',
		);
	});
});
