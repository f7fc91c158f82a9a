import {
	APIConnectionError,
	APIError,
	Anthropic,
	RateLimitError,
} from "@anthropic-ai/sdk";

import type { BaseChatModel, InvokeOptions, OutputFormat } from "../base";
import {
	ModelError,
	ModelOutputParseError,
	ModelProviderError,
	ModelRateLimitError,
} from "../exceptions";
import type { BaseMessage } from "../messages";
import { SchemaOptimizer } from "../schema";
import type { ChatInvokeCompletion, ChatInvokeUsage } from "../views";
import { AnthropicMessageSerializer } from "./serializer";

type Tool = Anthropic.Tool;
type ToolChoiceToolParam = Anthropic.ToolChoiceTool;

export interface ChatAnthropicConfig {
	model: string;
	maxTokens?: number;
	temperature?: number | null;

	// Client initialization parameters
	apiKey?: string | null;
	baseUrl?: string | null;
	timeout?: number | null;
	maxRetries?: number;
}

/**
 * A wrapper around Anthropic's chat model. Structured output is produced by
 * forcing a single tool call whose input schema is the requested format.
 */
export class ChatAnthropic implements BaseChatModel {
	model: string;
	maxTokens: number;
	temperature: number | null;

	apiKey: string | null;
	baseUrl: string | null;
	timeout: number | null;
	maxRetries: number;

	private client: Anthropic | null = null;

	constructor(config: ChatAnthropicConfig) {
		this.model = config.model;
		this.maxTokens = config.maxTokens ?? 8192;
		this.temperature = config.temperature ?? null;
		this.apiKey = config.apiKey ?? null;
		this.baseUrl = config.baseUrl ?? null;
		this.timeout = config.timeout ?? null;
		this.maxRetries = config.maxRetries ?? 2;
	}

	get provider(): string {
		return "anthropic";
	}

	get name(): string {
		return this.model;
	}

	getClient(): Anthropic {
		if (!this.client) {
			this.client = new Anthropic({
				apiKey: this.apiKey ?? undefined,
				baseURL: this.baseUrl ?? undefined,
				timeout: this.timeout ?? undefined,
				maxRetries: this.maxRetries,
			});
		}
		return this.client;
	}

	private getUsage(response: Anthropic.Message): ChatInvokeUsage {
		const cached = response.usage.cache_read_input_tokens ?? 0;
		return {
			// Anthropic reports cached tokens separately from input tokens
			promptTokens: response.usage.input_tokens + cached,
			completionTokens: response.usage.output_tokens,
			totalTokens: response.usage.input_tokens + response.usage.output_tokens,
			promptCachedTokens: response.usage.cache_read_input_tokens,
			promptCacheCreationTokens: response.usage.cache_creation_input_tokens,
		};
	}

	async ainvoke(
		messages: BaseMessage[],
		outputFormat?: undefined,
		options?: InvokeOptions,
	): Promise<ChatInvokeCompletion<string>>;
	async ainvoke<T>(
		messages: BaseMessage[],
		outputFormat: OutputFormat<T>,
		options?: InvokeOptions,
	): Promise<ChatInvokeCompletion<T>>;
	async ainvoke<T>(
		messages: BaseMessage[],
		outputFormat?: OutputFormat<T>,
		options: InvokeOptions = {},
	): Promise<ChatInvokeCompletion<T> | ChatInvokeCompletion<string>> {
		const [anthropicMessages, systemPrompt] =
			AnthropicMessageSerializer.serializeMessages(messages);
		const requestOptions = { signal: options.signal };
		const sampling =
			this.temperature === null ? {} : { temperature: this.temperature };

		try {
			if (outputFormat === undefined) {
				const response = await this.getClient().messages.create(
					{
						model: this.model,
						messages: anthropicMessages,
						system: systemPrompt,
						max_tokens: this.maxTokens,
						...sampling,
					},
					requestOptions,
				);

				const text = response.content
					.map((block) => (block.type === "text" ? block.text : ""))
					.join("");
				return { completion: text, usage: this.getUsage(response) };
			}

			const tool: Tool = {
				name: outputFormat.name,
				description:
					outputFormat.description ??
					`Extract information in the format of ${outputFormat.name}`,
				input_schema: {
					type: "object",
					...SchemaOptimizer.createOptimizedJsonSchema(outputFormat.schema),
				},
			};
			const toolChoice: ToolChoiceToolParam = {
				type: "tool",
				name: outputFormat.name,
			};

			const response = await this.getClient().messages.create(
				{
					model: this.model,
					messages: anthropicMessages,
					tools: [tool],
					tool_choice: toolChoice,
					system: systemPrompt,
					max_tokens: this.maxTokens,
					...sampling,
				},
				requestOptions,
			);

			for (const block of response.content) {
				if (block.type !== "tool_use") {
					continue;
				}
				const parsed = outputFormat.schema.safeParse(block.input);
				if (!parsed.success) {
					throw new ModelOutputParseError(
						`Tool input does not match ${outputFormat.name}: ${parsed.error.message}`,
						JSON.stringify(block.input),
					);
				}
				return { completion: parsed.data, usage: this.getUsage(response) };
			}

			throw new ModelOutputParseError(
				"Expected tool use in response but none found",
			);
		} catch (error) {
			if (error instanceof ModelError) {
				throw error;
			}
			if (error instanceof RateLimitError) {
				throw new ModelRateLimitError(error.message, 429, this.name, {
					cause: error,
				});
			}
			if (error instanceof APIConnectionError) {
				throw new ModelProviderError(error.message, 502, this.name, {
					cause: error,
				});
			}
			if (error instanceof APIError) {
				throw new ModelProviderError(
					error.message,
					error.status ?? 502,
					this.name,
					{ cause: error },
				);
			}
			throw new ModelProviderError(String(error), 502, this.name, {
				cause: error,
			});
		}
	}
}
