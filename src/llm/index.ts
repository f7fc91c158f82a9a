// Chat models
export { ChatAnthropic } from "./anthropic/chat";
export { ChatOpenAI } from "./openai/chat";
export { createChatModel } from "./factory";

// Core types and interfaces
export type { BaseChatModel, InvokeOptions, OutputFormat } from "./base";

export type {
	AssistantMessage,
	BaseMessage,
	ContentPartTextParam as ContentText,
	SystemMessage,
	UserMessage,
} from "./messages";
export {
	createAssistantMessage,
	createSystemMessage,
	createUserMessage,
	getMessageText,
} from "./messages";

export type { ChatInvokeCompletion, ChatInvokeUsage } from "./views";
export {
	ModelError,
	ModelOutputParseError,
	ModelProviderError,
	ModelRateLimitError,
} from "./exceptions";
export { SchemaOptimizer } from "./schema";
