/**
 * Chat message types shared by every provider serializer.
 */

export interface ContentPartTextParam {
	type: "text";
	text: string;
}

interface MessageBase {
	/** Mark the message as cacheable where the provider supports it. */
	cache?: boolean;
}

export interface SystemMessage extends MessageBase {
	role: "system";
	content: string | ContentPartTextParam[];
}

export interface UserMessage extends MessageBase {
	role: "user";
	content: string | ContentPartTextParam[];
}

export interface AssistantMessage extends MessageBase {
	role: "assistant";
	content: string | ContentPartTextParam[] | null;
}

export type BaseMessage = SystemMessage | UserMessage | AssistantMessage;

export function createSystemMessage(
	content: string,
	cache = false,
): SystemMessage {
	return { role: "system", content, cache };
}

export function createUserMessage(content: string, cache = false): UserMessage {
	return { role: "user", content, cache };
}

export function createAssistantMessage(content: string): AssistantMessage {
	return { role: "assistant", content };
}

/** Flatten a message's content into plain text. */
export function getMessageText(message: BaseMessage): string {
	const { content } = message;
	if (content === null) {
		return "";
	}
	if (typeof content === "string") {
		return content;
	}
	return content.map((part) => part.text).join("\n");
}
