import type { z } from "zod";
import type { BaseMessage } from "./messages";
import type { ChatInvokeCompletion } from "./views";

/**
 * Structured output request: the model must answer with a value matching
 * `schema`, which is also what the answer is validated against.
 */
export interface OutputFormat<T> {
	name: string;
	description?: string;
	schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface InvokeOptions {
	signal?: AbortSignal;
}

/**
 * Base interface for chat models
 */
export interface BaseChatModel {
	/** Model identifier/name */
	model: string;

	/** Provider name (e.g., 'openai', 'anthropic') */
	readonly provider: string;

	readonly name: string;

	/**
	 * Invoke the model with messages - overload for no output format
	 */
	ainvoke(
		messages: BaseMessage[],
		outputFormat?: undefined,
		options?: InvokeOptions,
	): Promise<ChatInvokeCompletion<string>>;

	/**
	 * Invoke the model with messages - overload with output format
	 */
	ainvoke<T>(
		messages: BaseMessage[],
		outputFormat: OutputFormat<T>,
		options?: InvokeOptions,
	): Promise<ChatInvokeCompletion<T>>;
}
