/**
 * Exception classes for LLM models
 */

export class ModelError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ModelError";
	}
}

export class ModelProviderError extends ModelError {
	/** Exception raised when a model provider returns an error. */
	public readonly statusCode: number;
	public readonly model?: string | null;

	constructor(
		message: string,
		statusCode: number = 502,
		model?: string | null,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ModelProviderError";
		this.statusCode = statusCode;
		this.model = model;
	}
}

export class ModelRateLimitError extends ModelProviderError {
	/** Exception raised when a model provider returns a rate limit error. */
	constructor(
		message: string,
		statusCode: number = 429,
		model?: string | null,
		options?: { cause?: unknown },
	) {
		super(message, statusCode, model, options);
		this.name = "ModelRateLimitError";
	}
}

/** The model answered, but the answer does not fit the requested output format. */
export class ModelOutputParseError extends ModelError {
	constructor(
		message: string,
		public readonly rawOutput?: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ModelOutputParseError";
	}
}
