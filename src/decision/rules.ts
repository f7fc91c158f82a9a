import type { AgentStep } from "../agent/views";
import { normalizeUrl } from "../browser/utils";
import type { AgentAction } from "../controller/views";
import { NoApplicableRuleError } from "../exceptions";
import ppLogger from "../logging_config";
import type { Decision, DecisionContext, DecisionProvider } from "./views";

const logger = ppLogger.child({ module: "pagepilot/decision/rules" });

const KNOWN_WEBSITES = [
	"amazon",
	"google",
	"youtube",
	"facebook",
	"twitter",
	"netflix",
	"ebay",
	"reddit",
	"linkedin",
	"instagram",
	"wikipedia",
	"github",
	"stackoverflow",
	"microsoft",
	"apple",
];

const URL_PATTERN = /\bhttps?:\/\/[^\s"'<>]+/i;
const HOST_PATTERN = /\b(?:[a-z0-9-]+\.)+[a-z]{2,}(?::\d+)?(?:\/[^\s"'<>]*)?/i;
const WEBSITE_PATTERN = new RegExp(`\\b(${KNOWN_WEBSITES.join("|")})\\b`, "i");
/** A quoted phrase; apostrophes inside words do not open or close one */
const QUOTED_PATTERN = /(?<!\w)["'“‘][^"'”’]+["'”’](?!\w)/g;

const SUBMIT_SELECTOR = "button[type='submit'], button#submit";
const PAYMENT_SELECTOR = "button.pay-now, button.checkout, button#purchase";
const TEXT_INPUT_SELECTOR = "input[type='text'], input, textarea";

interface PlanContext {
	task: string;
	/** URL named in the task, if any */
	target: string | null;
	startUrl: string;
}

interface IntentRule {
	name: string;
	pattern: RegExp;
	plan(context: PlanContext): AgentAction[];
}

function openPage(context: PlanContext): AgentAction {
	return { name: "navigate", url: context.target ?? context.startUrl };
}

function quotedText(task: string): string | null {
	const match = /["'“‘]([^"'”’]+)["'”’]/.exec(task);
	return match?.[1] ?? null;
}

function scrollDirection(task: string): "up" | "down" | "left" | "right" {
	const match = /\b(up|down|left|right)\b/i.exec(task);
	const direction = match?.[1]?.toLowerCase();
	return direction === "up" || direction === "left" || direction === "right"
		? direction
		: "down";
}

function scrollAmount(task: string): number {
	const match = /\b(\d+)\s*(?:pixels?|px)\b/i.exec(task);
	return match?.[1] ? Number.parseInt(match[1], 10) : 500;
}

function clickTargetOf(task: string): string | null {
	const quoted = quotedText(task);
	if (quoted) {
		return quoted;
	}
	const match =
		/\b(?:click|press|tap)\s+(?:on\s+)?(?:the\s+)?(.+?)(?:\s+(?:button|link))?\s*$/i.exec(
			task,
		);
	return match?.[1]?.trim() || null;
}

/**
 * Intent rules in priority order; the first match decides the plan.
 */
const INTENT_RULES: IntentRule[] = [
	{
		name: "finish",
		pattern: /^\s*(finish|stop|end|done)\b/i,
		plan: () => [],
	},
	{
		name: "read",
		pattern:
			/\b(read|extract|scrape|summari[sz]e|get\s+(?:the\s+)?(?:text|title|content))\b/i,
		plan: (context) => [openPage(context), { name: "extract_text" }],
	},
	{
		name: "delete",
		pattern: /\b(delete|remove)\b/i,
		plan: (context) => [
			openPage(context),
			{ name: "click", description: "Delete" },
		],
	},
	{
		name: "submit_click",
		pattern: /\b(click|press|tap)\b.*\b(submit|send|confirm)\b/i,
		plan: (context) => [
			openPage(context),
			{ name: "click", selector: SUBMIT_SELECTOR },
		],
	},
	{
		name: "payment",
		pattern: /\b(pay|purchase|buy|checkout|complete.*order)\b/i,
		plan: (context) => [
			openPage(context),
			{ name: "click", selector: PAYMENT_SELECTOR },
		],
	},
	{
		name: "type_text",
		pattern: /\b(type|enter|fill\s+in|input|write)\b/i,
		plan: (context) => [
			openPage(context),
			{
				name: "type",
				selector: TEXT_INPUT_SELECTOR,
				text: quotedText(context.task) ?? "test data",
			},
		],
	},
	{
		name: "scroll",
		pattern: /\b(scroll|page\s+(?:down|up))\b/i,
		plan: (context) => [
			openPage(context),
			{
				name: "scroll",
				direction: scrollDirection(context.task),
				amount: scrollAmount(context.task),
			},
		],
	},
	{
		name: "click",
		pattern: /\b(click|press|tap)\b/i,
		plan: (context) => {
			const description = clickTargetOf(context.task);
			return description
				? [openPage(context), { name: "click", description }]
				: [openPage(context)];
		},
	},
	{
		name: "navigate",
		pattern: /\b(navigate|go\s+to|open|visit|browse|search|find|look\s+for)\b/i,
		plan: (context) => [openPage(context), { name: "extract_text" }],
	},
];

/** URL the task names explicitly, by full URL, host, or well-known site name. */
export function findTarget(task: string): string | null {
	const url = URL_PATTERN.exec(task);
	if (url) {
		return url[0].replace(/[.,;:!?)]+$/, "");
	}
	// Text the task asks to type is not a place to go
	const unquoted = task.replace(QUOTED_PATTERN, " ");
	const host = HOST_PATTERN.exec(unquoted);
	if (host) {
		return normalizeUrl(host[0].replace(/[.,;:!?)]+$/, ""));
	}
	const website = WEBSITE_PATTERN.exec(unquoted);
	if (website?.[1]) {
		return normalizeUrl(website[1]);
	}
	return null;
}

/**
 * The fixed sequence of actions the rule table proposes for `task`.
 * Throws `NoApplicableRuleError` when nothing in the table applies.
 */
export function planForTask(task: string, startUrl: string): AgentAction[] {
	const context: PlanContext = {
		task,
		target: findTarget(task),
		startUrl: normalizeUrl(startUrl),
	};
	const rule = INTENT_RULES.find((candidate) => candidate.pattern.test(task));
	if (rule) {
		logger.debug(`Rule "${rule.name}" matches task`);
		return rule.plan(context);
	}
	if (context.target) {
		logger.debug("No intent rule matches, navigating to the named website");
		return [openPage(context)];
	}
	throw new NoApplicableRuleError(task);
}

function canonical(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map(canonical);
	}
	if (typeof value === "object" && value !== null) {
		return Object.fromEntries(
			Object.entries(value)
				.filter(([, entry]) => entry !== undefined)
				.sort(([a], [b]) => a.localeCompare(b))
				.map(([key, entry]) => [key, canonical(entry)]),
		);
	}
	return value;
}

export function sameAction(a: AgentAction, b: AgentAction): boolean {
	return JSON.stringify(canonical(a)) === JSON.stringify(canonical(b));
}

/**
 * Match each planned action, in order, against the history. Returns the
 * matched steps and the first planned action with no step yet.
 */
function progress(
	plan: AgentAction[],
	history: readonly AgentStep[],
): { matched: AgentStep[]; next: AgentAction | null } {
	const matched: AgentStep[] = [];
	let cursor = 0;
	for (const planned of plan) {
		let found: AgentStep | null = null;
		for (; cursor < history.length; cursor++) {
			const step = history[cursor];
			if (step && sameAction(step.action, planned)) {
				found = step;
				cursor++;
				break;
			}
		}
		if (!found) {
			return { matched, next: planned };
		}
		matched.push(found);
	}
	return { matched, next: null };
}

export interface RuleBasedDecisionProviderOptions {
	/** Page opened when the task names none */
	startUrl: string;
}

/**
 * Deterministic fallback: maps keywords in the task to a short plan and
 * proposes its actions one by one.
 */
export class RuleBasedDecisionProvider implements DecisionProvider {
	readonly kind = "rules" as const;
	readonly name = "rule-table";

	constructor(private readonly options: RuleBasedDecisionProviderOptions) {}

	async decide(context: DecisionContext): Promise<Decision> {
		const plan = planForTask(context.task.description, this.options.startUrl);
		const { matched, next } = progress(plan, context.history);

		if (next) {
			return {
				type: "action",
				action: next,
				reasoning: `Planned step ${matched.length + 1} of ${plan.length}`,
			};
		}

		const success = matched.every((step) => step.outcome === "ok");
		const extracted = [...matched]
			.reverse()
			.find((step) => step.extractedContent)?.extractedContent;
		return {
			type: "done",
			success,
			text: extracted ?? `Completed ${plan.length} planned step(s)`,
		};
	}
}
