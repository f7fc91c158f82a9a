import { APIConnectionError, APIError, OpenAI, RateLimitError } from "openai";
import type { ChatCompletion } from "openai/resources/chat/completions";

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
import { OpenAIMessageSerializer } from "./serializer";

export interface OpenAIBaseInput {
	model: string;
	temperature?: number | null;
	maxTokens?: number | null;
	apiKey?: string | null;
	organization?: string | null;
	baseUrl?: string | null;
	timeout?: number | null;
	maxRetries?: number;
}

/**
 * A wrapper around the OpenAI client that implements `BaseChatModel`.
 * Structured output goes through `response_format: json_schema`.
 */
export class ChatOpenAI implements BaseChatModel {
	model: string;
	temperature: number | null;
	maxTokens: number | null;

	apiKey: string | null;
	organization: string | null;
	baseUrl: string | null;
	timeout: number | null;
	maxRetries: number;

	private client: OpenAI | null = null;

	constructor(config: OpenAIBaseInput) {
		this.model = config.model;
		this.temperature = config.temperature ?? null;
		this.maxTokens = config.maxTokens ?? null;
		this.apiKey = config.apiKey ?? null;
		this.organization = config.organization ?? null;
		this.baseUrl = config.baseUrl ?? null;
		this.timeout = config.timeout ?? null;
		this.maxRetries = config.maxRetries ?? 2;
	}

	get provider(): string {
		return "openai";
	}

	get name(): string {
		return this.model;
	}

	getClient(): OpenAI {
		if (!this.client) {
			this.client = new OpenAI({
				apiKey: this.apiKey ?? undefined,
				organization: this.organization,
				baseURL: this.baseUrl ?? undefined,
				timeout: this.timeout ?? undefined,
				maxRetries: this.maxRetries,
			});
		}
		return this.client;
	}

	getUsage(response: ChatCompletion): ChatInvokeUsage | null {
		if (!response.usage) {
			return null;
		}
		return {
			promptTokens: response.usage.prompt_tokens,
			promptCachedTokens:
				response.usage.prompt_tokens_details?.cached_tokens ?? null,
			promptCacheCreationTokens: null,
			completionTokens: response.usage.completion_tokens,
			totalTokens: response.usage.total_tokens,
		};
	}

	private firstContent(response: ChatCompletion): string {
		const firstChoice = response.choices[0];
		if (!firstChoice) {
			throw new ModelProviderError(
				"No response choices received from model",
				500,
				this.name,
			);
		}
		return firstChoice.message.content ?? "";
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
		const openaiMessages = OpenAIMessageSerializer.serializeMessages(messages);
		const requestOptions = { signal: options.signal };

		try {
			if (!outputFormat) {
				const response = await this.getClient().chat.completions.create(
					{
						model: this.model,
						messages: openaiMessages,
						temperature: this.temperature,
						max_tokens: this.maxTokens,
					},
					requestOptions,
				);
				return {
					completion: this.firstContent(response),
					usage: this.getUsage(response),
				};
			}

			const response = await this.getClient().chat.completions.create(
				{
					model: this.model,
					messages: openaiMessages,
					temperature: this.temperature,
					max_tokens: this.maxTokens,
					response_format: {
						type: "json_schema",
						json_schema: {
							name: outputFormat.name,
							description: outputFormat.description,
							schema: SchemaOptimizer.createOptimizedJsonSchema(
								outputFormat.schema,
							),
						},
					},
				},
				requestOptions,
			);

			const content = this.firstContent(response);
			if (!content) {
				throw new ModelOutputParseError(
					"Failed to parse structured output from model response",
				);
			}

			let raw: unknown;
			try {
				raw = JSON.parse(content);
			} catch (error) {
				throw new ModelOutputParseError(
					"Model response is not valid JSON",
					content,
					{ cause: error },
				);
			}
			const parsed = outputFormat.schema.safeParse(raw);
			if (!parsed.success) {
				throw new ModelOutputParseError(
					`Model response does not match ${outputFormat.name}: ${parsed.error.message}`,
					content,
				);
			}
			return { completion: parsed.data, usage: this.getUsage(response) };
		} catch (error) {
			if (error instanceof ModelError) {
				throw error;
			}
			if (error instanceof RateLimitError) {
				throw new ModelRateLimitError(
					error.message || "Rate limit exceeded",
					429,
					this.name,
					{ cause: error },
				);
			}
			if (error instanceof APIConnectionError) {
				throw new ModelProviderError(
					error.message || "Connection error",
					502,
					this.name,
					{ cause: error },
				);
			}
			if (error instanceof APIError) {
				throw new ModelProviderError(
					error.message || "Unknown model error",
					error.status ?? 500,
					this.name,
					{ cause: error },
				);
			}
			throw new ModelProviderError(String(error), 500, this.name, {
				cause: error,
			});
		}
	}
}
