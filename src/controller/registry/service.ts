import type { z } from "zod";
import { ValidationError } from "../../exceptions";
import ppLogger from "../../logging_config";
import {
	type ActionContext,
	type ActionHandler,
	type ActionHandlerResult,
	ActionRegistry,
	RegisteredAction,
} from "./views";

const logger = ppLogger.child({
	module: "pagepilot/controller/registry/service",
});

/**
 * Service for registering and managing actions
 */
export class Registry {
	public registry: ActionRegistry = new ActionRegistry();

	/**
	 * Decorator-style registration:
	 *
	 * ```typescript
	 * registry.action("Scroll the page", { name: "scroll", paramModel: ScrollParams })(
	 * 	async (params, { session }) => { ... },
	 * );
	 * ```
	 */
	action<P>(
		description: string,
		options: { name: string; paramModel: z.ZodType<P, z.ZodTypeDef, unknown> },
	) {
		return (handler: ActionHandler<P>): ActionHandler<P> => {
			if (this.registry.actions.has(options.name)) {
				logger.debug(`Replacing action: ${options.name}`);
			}
			this.registry.actions.set(
				options.name,
				RegisteredAction.create({
					name: options.name,
					description,
					paramModel: options.paramModel,
					handler,
				}),
			);
			return handler;
		};
	}

	has(name: string): boolean {
		return this.registry.actions.has(name);
	}

	/**
	 * Execute a registered action
	 */
	async executeAction(
		actionName: string,
		params: unknown,
		context: ActionContext,
	): Promise<ActionHandlerResult> {
		const action = this.registry.actions.get(actionName);
		if (!action) {
			throw new ValidationError(`Action ${actionName} not found`);
		}
		logger.debug(`Executing action ${actionName}`);
		return action.execute(params, context);
	}

	getPromptDescription(): string {
		return this.registry.getPromptDescription();
	}
}
