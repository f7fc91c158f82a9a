import { describe, expect, test } from "vitest";
import { loadSettings } from "../../config";
import { ChatAnthropic } from "../anthropic/chat";
import { createChatModel } from "../factory";
import { ChatOpenAI } from "../openai/chat";

describe("createChatModel", () => {
	test("should return null without an API key", () => {
		expect(createChatModel(loadSettings({}, {}).llm)).toBeNull();
	});

	test("should build the default Anthropic model", () => {
		const llm = createChatModel(loadSettings({ llm: { apiKey: "test-secret" } }, {}).llm);
		expect(llm).toBeInstanceOf(ChatAnthropic);
		expect(llm?.name).toBe("claude-3-5-sonnet-20240620");
	});

	test("should honour the provider and model", () => {
		const llm = createChatModel(
			loadSettings(
				{ llm: { provider: "openai", apiKey: "test-secret", model: "gpt-4o-mini" } },
				{},
			).llm,
		);
		expect(llm).toBeInstanceOf(ChatOpenAI);
		expect(llm?.provider).toBe("openai");
		expect(llm?.name).toBe("gpt-4o-mini");
	});
});
