import { describe, expect, test } from "vitest";
import { AnthropicMessageSerializer } from "../anthropic/serializer";
import {
	type AssistantMessage,
	createAssistantMessage,
	createSystemMessage,
	createUserMessage,
	getMessageText,
} from "../messages";
import { OpenAIMessageSerializer } from "../openai/serializer";

describe("AnthropicMessageSerializer", () => {
	test("should split the system prompt and keep only the last cache mark", () => {
		const [messages, system] = AnthropicMessageSerializer.serializeMessages([
			createSystemMessage("You drive a browser.", true),
			createUserMessage("first", true),
			createAssistantMessage("ok"),
			createUserMessage("second", true),
		]);

		expect(system).toEqual([
			{ text: "You drive a browser.", type: "text", cache_control: { type: "ephemeral" } },
		]);
		expect(messages).toEqual([
			{ role: "user", content: "first" },
			{ role: "assistant", content: "ok" },
			{
				role: "user",
				content: [{ text: "second", type: "text", cache_control: { type: "ephemeral" } }],
			},
		]);
	});

	test("should join several system messages", () => {
		const [messages, system] = AnthropicMessageSerializer.serializeMessages([
			createSystemMessage("one"),
			createSystemMessage("two"),
			createUserMessage("hi"),
		]);
		expect(system).toBe("one\n\ntwo");
		expect(messages).toEqual([{ role: "user", content: "hi" }]);
	});

	test("should leave the system prompt out when there is none", () => {
		const [, system] = AnthropicMessageSerializer.serializeMessages([
			createUserMessage("hi"),
		]);
		expect(system).toBeUndefined();
	});

	test("should send empty text for null content", () => {
		expect(AnthropicMessageSerializer.serializeContent(null)).toEqual([
			{ text: "", type: "text" },
		]);
	});
});

describe("OpenAIMessageSerializer", () => {
	test("should keep roles and text parts", () => {
		const silent: AssistantMessage = { role: "assistant", content: null };
		expect(
			OpenAIMessageSerializer.serializeMessages([
				createSystemMessage("rules"),
				{ role: "user", content: [{ type: "text", text: "a" }, { type: "text", text: "b" }] },
				silent,
			]),
		).toEqual([
			{ role: "system", content: "rules" },
			{
				role: "user",
				content: [
					{ type: "text", text: "a" },
					{ type: "text", text: "b" },
				],
			},
			{ role: "assistant", content: null },
		]);
	});
});

describe("getMessageText", () => {
	test("should flatten content parts", () => {
		expect(
			getMessageText({
				role: "user",
				content: [
					{ type: "text", text: "a" },
					{ type: "text", text: "b" },
				],
			}),
		).toBe("a\nb");
		expect(getMessageText({ role: "assistant", content: null })).toBe("");
	});
});
