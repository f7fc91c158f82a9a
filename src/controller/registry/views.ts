import type { z } from "zod";
import type { BrowserSession } from "../../browser/types";
import { ValidationError } from "../../exceptions";
import { SchemaOptimizer } from "../../llm/schema";

/**
 * What an action handler gets besides its own parameters
 */
export interface ActionContext {
	session: BrowserSession;
	signal?: AbortSignal;
}

export interface ActionHandlerResult {
	extractedContent?: string | null;
	/** Reference to a screenshot taken by the action */
	screenshot?: string | null;
}

export type ActionHandler<P> = (
	params: P,
	context: ActionContext,
) => Promise<ActionHandlerResult>;

type BoundHandler = (
	params: unknown,
	context: ActionContext,
) => Promise<ActionHandlerResult>;

/**
 * Model for a registered action
 */
class RegisteredAction {
	private constructor(
		readonly name: string,
		readonly description: string,
		readonly paramModel: z.ZodTypeAny,
		private readonly handler: BoundHandler,
	) {}

	/**
	 * Bind a handler to its parameter model; the parameters are validated
	 * before the handler runs.
	 */
	static create<P>(params: {
		name: string;
		description: string;
		paramModel: z.ZodType<P, z.ZodTypeDef, unknown>;
		handler: ActionHandler<P>;
	}): RegisteredAction {
		const { name, paramModel, handler } = params;
		return new RegisteredAction(
			name,
			params.description,
			paramModel,
			async (raw, context) => {
				const parsed = paramModel.safeParse(raw);
				if (!parsed.success) {
					const details = parsed.error.issues
						.map((issue) => `${issue.path.join(".") || name}: ${issue.message}`)
						.join("; ");
					throw new ValidationError(
						`Invalid parameters for action ${name}: ${details}`,
					);
				}
				return handler(parsed.data, context);
			},
		);
	}

	execute(params: unknown, context: ActionContext): Promise<ActionHandlerResult> {
		return this.handler(params, context);
	}

	/**
	 * Get a description of the action for the prompt
	 */
	promptDescription(): string {
		const schema = SchemaOptimizer.createOptimizedJsonSchema(this.paramModel);
		const properties = schema.properties ?? {};
		return `${this.description}: \n{${this.name}: ${JSON.stringify(properties)}}`;
	}
}

/**
 * Model representing the action registry
 */
class ActionRegistry {
	actions: Map<string, RegisteredAction> = new Map();

	/**
	 * Get a description of all actions for the prompt
	 */
	getPromptDescription(): string {
		return Array.from(this.actions.values())
			.map((action) => action.promptDescription())
			.join("\n");
	}
}

export { RegisteredAction, ActionRegistry };
