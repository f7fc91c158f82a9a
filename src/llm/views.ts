/**
 * Token accounting reported by the provider for one call.
 */
export interface ChatInvokeUsage {
	/** Cached tokens are counted here as well */
	promptTokens: number;
	promptCachedTokens?: number | null;
	/** Set by Anthropic when the call wrote a cache entry */
	promptCacheCreationTokens?: number | null;
	completionTokens: number;
	totalTokens: number;
}

/** What `BaseChatModel.ainvoke` resolves with. */
export interface ChatInvokeCompletion<T = string> {
	completion: T;
	usage?: ChatInvokeUsage | null;
}
