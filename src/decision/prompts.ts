import { readFileSync } from "node:fs";
import path from "node:path";
import type { AgentStep, Task } from "../agent/views";
import type { PageState } from "../browser/views";
import { describeAction } from "../controller/views";
import {
	type BaseMessage,
	type SystemMessage,
	createSystemMessage,
	createUserMessage,
} from "../llm/messages";
import { truncate } from "../utils";

let cachedTemplate: string | null = null;

function loadPromptTemplate(): string {
	if (cachedTemplate === null) {
		cachedTemplate = readFileSync(
			path.join(__dirname, "system_prompt.md"),
			"utf-8",
		);
	}
	return cachedTemplate;
}

export class SystemPrompt {
	readonly systemMessage: SystemMessage;

	constructor(params: {
		actionDescriptions: string;
		maxIterations: number;
	}) {
		const prompt = loadPromptTemplate()
			.replace("{action_descriptions}", params.actionDescriptions)
			.replace("{max_iterations}", String(params.maxIterations));
		this.systemMessage = createSystemMessage(prompt, true);
	}
}

export function formatStep(step: AgentStep): string {
	const approval =
		step.approved === null ? "" : step.approved ? " [approved]" : " [rejected]";
	let line = `${step.index}. ${describeAction(step.action)} -> ${step.outcome}${approval}`;
	if (step.error) {
		line += ` (error: ${step.error})`;
	}
	if (step.extractedContent) {
		line += `\n   extracted: ${truncate(step.extractedContent, 300)}`;
	}
	return line;
}

export function formatPageState(pageState: PageState, excerptChars: number): string {
	const lines = [`URL: ${pageState.url}`, `Title: ${pageState.title || "(none)"}`];
	lines.push(
		`Visible text: ${pageState.textExcerpt ? truncate(pageState.textExcerpt, excerptChars) : "(empty)"}`,
	);
	if (pageState.screenshot) {
		lines.push(`Screenshot: ${pageState.screenshot}`);
	}
	return lines.join("\n");
}

/**
 * The user turn: task, the most recent `historyWindow` steps, current page.
 */
export function buildUserMessage(params: {
	task: Task;
	history: readonly AgentStep[];
	pageState: PageState;
	historyWindow: number;
	excerptChars: number;
}): string {
	const { task, history, pageState, historyWindow, excerptChars } = params;
	const recent = history.slice(-historyWindow);
	const omitted = history.length - recent.length;

	const sections = [`<task>\n${task.description}\n</task>`];
	let historyText = recent.length ? recent.map(formatStep).join("\n") : "(no actions yet)";
	if (omitted > 0) {
		historyText = `(${omitted} earlier step(s) omitted)\n${historyText}`;
	}
	sections.push(`<history>\n${historyText}\n</history>`);
	sections.push(
		`<page_state>\n${formatPageState(pageState, excerptChars)}\n</page_state>`,
	);
	sections.push(
		`<budget>\nStep ${history.length + 1} of at most ${task.maxIterations}\n</budget>`,
	);
	return sections.join("\n\n");
}

export function buildDecisionMessages(params: {
	systemPrompt: SystemPrompt;
	task: Task;
	history: readonly AgentStep[];
	pageState: PageState;
	historyWindow: number;
	excerptChars: number;
}): BaseMessage[] {
	return [params.systemPrompt.systemMessage, createUserMessage(buildUserMessage(params))];
}
