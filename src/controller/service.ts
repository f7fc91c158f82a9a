import type { BrowserSession } from "../browser/types";
import { PageState } from "../browser/views";
import { CancelledError, toError } from "../exceptions";
import ppLogger from "../logging_config";
import { throwIfAborted, timeExecutionAsync, truncate } from "../utils";
import { Registry } from "./registry/service";
import {
	ActionResult,
	type AgentAction,
	ClickParams,
	ExtractTextParams,
	NavigateParams,
	ScreenshotParams,
	ScrollParams,
	TypeParams,
	describeAction,
} from "./views";

const logger = ppLogger.child({ module: "pagepilot/controller/service" });

/** Extracted text kept on a step */
const MAX_EXTRACTED_CHARS = 10000;

export interface ControllerOptions {
	/** Length of the page excerpt in the returned page state */
	excerptChars?: number;
}

export interface ActOptions {
	signal?: AbortSignal;
	/** Reported when the page state cannot be read after a failure */
	previousState?: PageState;
}

/**
 * Executes one `AgentAction` against a browser session through the action
 * registry.
 */
export class Controller {
	readonly registry: Registry;
	readonly logger = logger;
	private readonly excerptChars: number;

	constructor(options: ControllerOptions = {}) {
		this.registry = new Registry();
		this.excerptChars = options.excerptChars ?? 2000;

		this.registry.action(
			"Navigate the current tab to a URL, host or website name",
			{ name: "navigate", paramModel: NavigateParams },
		)(async (params, { session }) => {
			await session.navigate(params.url);
			logger.info(`🔗 Navigated to ${params.url}`);
			return {};
		});

		this.registry.action(
			"Click an element, located by CSS selector or by its visible text",
			{ name: "click", paramModel: ClickParams },
		)(async (params, { session }) => {
			await session.click(params);
			logger.info(
				`🖱️ Clicked ${params.selector ?? `"${params.description ?? ""}"`}`,
			);
			return {};
		});

		this.registry.action("Type text into an input field", {
			name: "type",
			paramModel: TypeParams,
		})(async (params, { session }) => {
			await session.type(params.selector, params.text);
			logger.info(`⌨️ Typed into ${params.selector}`);
			return {};
		});

		this.registry.action("Take a screenshot of the page", {
			name: "screenshot",
			paramModel: ScreenshotParams,
		})(async (params, { session }) => {
			const reference = await session.screenshot({
				fullPage: params.fullPage,
			});
			logger.info(`📸 Screenshot saved: ${reference}`);
			return {
				screenshot: reference,
				extractedContent: `Screenshot saved: ${reference}`,
			};
		});

		this.registry.action(
			"Read the visible text of the page, or of one element",
			{ name: "extract_text", paramModel: ExtractTextParams },
		)(async (params, { session }) => {
			const text = await session.extractText(params.selector);
			logger.info(`📄 Extracted ${text.length} characters`);
			return { extractedContent: truncate(text, MAX_EXTRACTED_CHARS) };
		});

		this.registry.action("Scroll the page", {
			name: "scroll",
			paramModel: ScrollParams,
		})(async (params, { session }) => {
			await session.scroll(params.direction, params.amount);
			logger.info(`🔍 Scrolled ${params.direction} by ${params.amount}px`);
			return {};
		});
	}

	/**
	 * Execute `action` and observe the page. Never throws for a failed action:
	 * the failure is returned as an `ActionResult`. Only cancellation escapes.
	 */
	@timeExecutionAsync("--act")
	async act(
		action: AgentAction,
		session: BrowserSession,
		options: ActOptions = {},
	): Promise<ActionResult> {
		const { name, ...params } = action;
		throwIfAborted(options.signal);
		try {
			const result = await this.registry.executeAction(name, params, {
				session,
				signal: options.signal,
			});
			throwIfAborted(options.signal);
			const pageState = await session.getPageState({
				excerptChars: this.excerptChars,
				screenshot: result.screenshot ?? null,
			});
			return ActionResult.success(pageState, result.extractedContent ?? null);
		} catch (error) {
			if (error instanceof CancelledError) {
				throw error;
			}
			const message = toError(error).message;
			logger.warn(`❌ ${describeAction(action)} failed: ${message}`);
			return ActionResult.failure(
				await this.observeAfterFailure(session, options.previousState),
				message,
			);
		}
	}

	private async observeAfterFailure(
		session: BrowserSession,
		previousState?: PageState,
	): Promise<PageState> {
		if (session.isClosed) {
			return previousState ?? PageState.empty();
		}
		try {
			return await session.getPageState({ excerptChars: this.excerptChars });
		} catch (error) {
			logger.debug(
				`Could not read page state after failure: ${toError(error).message}`,
			);
			return previousState ?? PageState.empty();
		}
	}

	getPromptDescription(): string {
		return this.registry.getPromptDescription();
	}
}
