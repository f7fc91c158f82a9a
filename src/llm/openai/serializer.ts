import type {
	ChatCompletionContentPartText,
	ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import type { BaseMessage, ContentPartTextParam } from "../messages";

/**
 * Serializer for converting between our message types and OpenAI message params.
 */
export class OpenAIMessageSerializer {
	private static serializeContent(
		content: string | ContentPartTextParam[],
	): string | ChatCompletionContentPartText[] {
		if (typeof content === "string") {
			return content;
		}
		return content.map(
			(part): ChatCompletionContentPartText => ({
				type: "text",
				text: part.text,
			}),
		);
	}

	static serialize(message: BaseMessage): ChatCompletionMessageParam {
		switch (message.role) {
			case "system":
				return {
					role: "system",
					content: OpenAIMessageSerializer.serializeContent(message.content),
				};
			case "user":
				return {
					role: "user",
					content: OpenAIMessageSerializer.serializeContent(message.content),
				};
			case "assistant":
				return {
					role: "assistant",
					content:
						message.content === null
							? null
							: OpenAIMessageSerializer.serializeContent(message.content),
				};
		}
	}

	static serializeMessages(
		messages: BaseMessage[],
	): ChatCompletionMessageParam[] {
		return messages.map((message) => OpenAIMessageSerializer.serialize(message));
	}
}
