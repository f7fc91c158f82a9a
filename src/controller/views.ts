import { z } from "zod";
import type { PageState } from "../browser/views";

// Action parameter models

export const NavigateParams = z.object({
	url: z
		.string()
		.trim()
		.min(1)
		.describe(
			"Full URL, bare host (example.com) or website name (amazon); names resolve to https://www.<name>.com",
		),
});

export const ClickParams = z.object({
	selector: z.string().trim().min(1).optional().describe("CSS selector"),
	description: z
		.string()
		.trim()
		.min(1)
		.optional()
		.describe("Visible text of the element, used when no selector is known"),
});

export const TypeParams = z.object({
	selector: z.string().trim().min(1).describe("CSS selector of the input"),
	text: z.string(),
});

export const ScreenshotParams = z.object({
	fullPage: z.boolean().optional(),
});

export const ExtractTextParams = z.object({
	selector: z
		.string()
		.trim()
		.min(1)
		.optional()
		.describe("Limit extraction to this element; whole page when omitted"),
});

export const ScrollParams = z.object({
	direction: z.enum(["up", "down", "left", "right"]),
	amount: z.number().int().positive().default(500).describe("Pixels"),
});

export const ACTION_NAMES = [
	"navigate",
	"click",
	"type",
	"screenshot",
	"extract_text",
	"scroll",
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

/**
 * One browser action, discriminated on `name`.
 */
export const AgentActionSchema = z
	.discriminatedUnion("name", [
		NavigateParams.extend({ name: z.literal("navigate") }),
		ClickParams.extend({ name: z.literal("click") }),
		TypeParams.extend({ name: z.literal("type") }),
		ScreenshotParams.extend({ name: z.literal("screenshot") }),
		ExtractTextParams.extend({ name: z.literal("extract_text") }),
		ScrollParams.extend({ name: z.literal("scroll") }),
	])
	.superRefine((action, ctx) => {
		if (action.name === "click" && !action.selector && !action.description) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "click needs a selector or a description",
				path: ["selector"],
			});
		}
	});

export type AgentAction = z.output<typeof AgentActionSchema>;
export type AgentActionInput = z.input<typeof AgentActionSchema>;

/**
 * Outcome of executing one action. Failures are values, not exceptions.
 */
export class ActionResult {
	private constructor(
		public readonly ok: boolean,
		public readonly pageState: PageState,
		public readonly error: string | null,
		public readonly extractedContent: string | null,
	) {}

	static success(
		pageState: PageState,
		extractedContent: string | null = null,
	): ActionResult {
		return new ActionResult(true, pageState, null, extractedContent);
	}

	static failure(pageState: PageState, error: string): ActionResult {
		return new ActionResult(false, pageState, error, null);
	}
}

/** Short human-readable form of an action, used in logs and prompts. */
export function describeAction(action: AgentAction): string {
	switch (action.name) {
		case "navigate":
			return `navigate(${action.url})`;
		case "click":
			return `click(${action.selector ?? `"${action.description ?? ""}"`})`;
		case "type":
			return `type(${action.selector}, ${JSON.stringify(action.text)})`;
		case "screenshot":
			return action.fullPage ? "screenshot(full page)" : "screenshot()";
		case "extract_text":
			return `extract_text(${action.selector ?? "page"})`;
		case "scroll":
			return `scroll(${action.direction}, ${action.amount})`;
	}
}
