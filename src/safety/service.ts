import type { AgentAction } from "../controller/views";
import { truncate } from "../utils";
import keywords from "./keywords.json";

export type SafetyVerdict = "safe" | "destructive";

export interface ActionSafetyClassifierOptions {
	/** When false every action is safe */
	enabled?: boolean;
	destructiveKeywords?: readonly string[];
	sensitiveKeywords?: readonly string[];
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Keywords match at the start of a word, so "pay" hits "payment" but not "display". */
function keywordPattern(words: readonly string[]): RegExp {
	const alternatives = words.map((word) => escapeRegExp(word.toLowerCase()));
	return new RegExp(`(?<![a-z])(?:${alternatives.join("|")})`, "i");
}

/**
 * Decides whether an action needs human approval. Pure: the verdict depends on
 * the action alone.
 *
 * - `click` is destructive when its selector or description names a
 *   destructive operation (pay, delete, submit, ...).
 * - `type` is destructive when it enters sensitive data (password, card, ...)
 *   or when its field or text names a destructive operation.
 * - Navigation, reading, scrolling and screenshots are safe, and so is
 *   anything unrecognised.
 */
export class ActionSafetyClassifier {
	readonly enabled: boolean;
	private readonly destructive: RegExp;
	private readonly sensitive: RegExp;

	constructor(options: ActionSafetyClassifierOptions = {}) {
		this.enabled = options.enabled ?? true;
		this.destructive = keywordPattern(
			options.destructiveKeywords ?? keywords.destructive,
		);
		this.sensitive = keywordPattern(
			options.sensitiveKeywords ?? keywords.sensitive,
		);
	}

	classify(action: AgentAction): SafetyVerdict {
		if (!this.enabled) {
			return "safe";
		}

		switch (action.name) {
			case "click":
				return this.mentionsDestructive(action.selector, action.description)
					? "destructive"
					: "safe";
			case "type":
				return this.mentionsSensitive(action.selector, action.text) ||
					this.mentionsDestructive(action.selector, action.text)
					? "destructive"
					: "safe";
			default:
				return "safe";
		}
	}

	isDestructive(action: AgentAction): boolean {
		return this.classify(action) === "destructive";
	}

	private mentionsDestructive(...texts: (string | undefined)[]): boolean {
		return texts.some((text) => text !== undefined && this.destructive.test(text));
	}

	private mentionsSensitive(...texts: (string | undefined)[]): boolean {
		return texts.some((text) => text !== undefined && this.sensitive.test(text));
	}
}

/**
 * Human-readable prompt for an approval request.
 */
export function approvalMessage(action: AgentAction): string {
	switch (action.name) {
		case "click":
			return `Click on element: ${action.selector ?? action.description ?? "unknown element"}`;
		case "type":
			return `Type text into ${action.selector}: '${truncate(action.text, 50)}'`;
		case "navigate":
			return `Navigate to website: ${action.url}`;
		case "screenshot":
			return "Take a screenshot";
		case "extract_text":
			return `Read text from ${action.selector ?? "the page"}`;
		case "scroll":
			return `Scroll ${action.direction} by ${action.amount}px`;
	}
}
