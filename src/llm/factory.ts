import { type LlmSettings, hasLlmCredentials, resolveModelName } from "../config";
import ppLogger from "../logging_config";
import { ChatAnthropic } from "./anthropic/chat";
import type { BaseChatModel } from "./base";
import { ChatOpenAI } from "./openai/chat";

const logger = ppLogger.child({ module: "pagepilot/llm/factory" });

/**
 * Build the chat model the settings describe, or `null` when no API key is
 * configured for the chosen provider.
 */
export function createChatModel(llm: LlmSettings): BaseChatModel | null {
	if (!hasLlmCredentials(llm)) {
		logger.debug(`No API key configured for ${llm.provider}`);
		return null;
	}

	const model = resolveModelName(llm);
	switch (llm.provider) {
		case "anthropic":
			return new ChatAnthropic({
				model,
				apiKey: llm.apiKey,
				maxTokens: llm.maxTokens,
				temperature: llm.temperature,
				timeout: llm.timeoutMs,
			});
		case "openai":
			return new ChatOpenAI({
				model,
				apiKey: llm.apiKey,
				maxTokens: llm.maxTokens,
				temperature: llm.temperature,
				timeout: llm.timeoutMs,
			});
	}
}
