import type { Anthropic } from "@anthropic-ai/sdk";
import type {
	AssistantMessage,
	BaseMessage,
	ContentPartTextParam,
	SystemMessage,
	UserMessage,
} from "../messages";

type CacheControlEphemeral = Anthropic.CacheControlEphemeral;
type MessageParam = Anthropic.MessageParam;
type TextBlockParam = Anthropic.TextBlockParam;

type NonSystemMessage = UserMessage | AssistantMessage;

/** Serializer for converting between our message types and Anthropic message params. */
export class AnthropicMessageSerializer {
	static serializeCacheControl(
		useCache: boolean,
	): CacheControlEphemeral | null {
		return useCache ? { type: "ephemeral" } : null;
	}

	static serializeContent(
		content: string | ContentPartTextParam[] | null,
		useCache = false,
	): string | TextBlockParam[] {
		const cacheControl =
			AnthropicMessageSerializer.serializeCacheControl(useCache);

		if (content === null) {
			return [{ text: "", type: "text" }];
		}
		if (typeof content === "string") {
			return cacheControl
				? [{ text: content, type: "text", cache_control: cacheControl }]
				: content;
		}
		return content.map(
			(part): TextBlockParam => ({
				text: part.text,
				type: "text",
				cache_control: cacheControl,
			}),
		);
	}

	static serialize(message: NonSystemMessage): MessageParam {
		return {
			role: message.role,
			content: AnthropicMessageSerializer.serializeContent(
				message.content,
				message.cache ?? false,
			),
		};
	}

	/**
	 * Only the last cache-marked message matters to Claude, so clear the flag
	 * everywhere else.
	 */
	static cleanCacheMessages(messages: NonSystemMessage[]): NonSystemMessage[] {
		let lastCacheIndex = -1;
		messages.forEach((message, index) => {
			if (message.cache) {
				lastCacheIndex = index;
			}
		});
		return messages.map((message, index) =>
			message.cache && index !== lastCacheIndex
				? { ...message, cache: false }
				: message,
		);
	}

	/**
	 * Split the system prompt from the conversation. Anthropic takes the
	 * system prompt as its own parameter; several system messages are joined.
	 */
	static serializeMessages(
		messages: BaseMessage[],
	): [MessageParam[], string | TextBlockParam[] | undefined] {
		const systemMessages: SystemMessage[] = [];
		const conversation: NonSystemMessage[] = [];
		for (const message of messages) {
			if (message.role === "system") {
				systemMessages.push(message);
			} else {
				conversation.push(message);
			}
		}

		const serialized = AnthropicMessageSerializer.cleanCacheMessages(
			conversation,
		).map((message) => AnthropicMessageSerializer.serialize(message));

		if (systemMessages.length === 0) {
			return [serialized, undefined];
		}
		const systemText = systemMessages
			.map((message) =>
				typeof message.content === "string"
					? message.content
					: message.content.map((part) => part.text).join("\n"),
			)
			.join("\n\n");
		const cacheSystem = systemMessages.some((message) => message.cache);
		return [
			serialized,
			AnthropicMessageSerializer.serializeContent(systemText, cacheSystem),
		];
	}
}
