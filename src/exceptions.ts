export class PagePilotError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "PagePilotError";
	}
}

export class ConfigurationError extends PagePilotError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ConfigurationError";
	}
}

export class ValidationError extends PagePilotError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ValidationError";
	}
}

/** The LLM could not be reached, timed out, or rejected the request. */
export class ProviderUnavailableError extends PagePilotError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ProviderUnavailableError";
	}
}

/** The LLM answered, but not with a known action or a done verdict. */
export class UnparseableResponseError extends PagePilotError {
	constructor(
		message: string,
		public readonly rawOutput?: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "UnparseableResponseError";
	}
}

export class NoApplicableRuleError extends PagePilotError {
	constructor(public readonly task: string) {
		super(`No rule applies to task: ${task}`);
		this.name = "NoApplicableRuleError";
	}
}

/**
 * Both the primary provider and its fallback failed for one decision.
 * `providerError` is the first failure, which is what gets reported.
 */
export class DecisionFailedError extends PagePilotError {
	constructor(
		public readonly providerError: Error,
		public readonly fallbackError?: Error,
	) {
		super(providerError.message, { cause: providerError });
		this.name = "DecisionFailedError";
	}
}

export class CancelledError extends PagePilotError {
	constructor() {
		super("Cancelled");
		this.name = "CancelledError";
	}
}

export class TaskNotFoundError extends PagePilotError {
	constructor(public readonly taskId: string) {
		super(`Task ${taskId} not found`);
		this.name = "TaskNotFoundError";
	}
}

/** The request does not fit the task's current state. */
export class TaskStateError extends PagePilotError {
	constructor(message: string) {
		super(message);
		this.name = "TaskStateError";
	}
}

export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
