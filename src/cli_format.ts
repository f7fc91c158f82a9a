import type { AgentRunResult, AgentStep } from "./agent/views";
import type { BrowserHealth } from "./browser/health";
import type { Settings } from "./config";
import { describeAction } from "./controller/views";

export function formatStep(step: AgentStep): string {
	let line = `${step.index + 1}. ${describeAction(step.action)} [${step.outcome}]`;
	if (step.approved !== null) {
		line += step.approved ? " (approved)" : " (rejected)";
	}
	if (step.error) {
		line += `: ${step.error}`;
	}
	return line;
}

const STATUS_LABELS: Record<AgentRunResult["status"], string> = {
	done: "Done",
	failed: "Failed",
	iteration_limit_reached: "Stopped at iteration limit",
};

/**
 * Multi-line summary of a finished run, as printed by `pagepilot run`.
 */
export function formatResult(result: AgentRunResult): string {
	const lines = [`Status: ${STATUS_LABELS[result.status]}`];
	if (result.status === "done") {
		lines.push(`Success: ${result.success ? "yes" : "no"}`);
	}
	if (result.reason) {
		lines.push(`Reason: ${result.reason}`);
	}
	if (result.finalPage) {
		lines.push(`Final page: ${result.finalPage.url}`);
	}
	lines.push(`Steps: ${result.history.length}`);
	for (const step of result.history) {
		lines.push(`  ${formatStep(step)}`);
	}
	if (result.finalText) {
		lines.push("", result.finalText);
	}
	return lines.join("\n");
}

export function formatHealth(health: BrowserHealth): string {
	const lines = [`${health.service}: ${health.status}`];
	for (const [name, check] of Object.entries(health.checks)) {
		lines.push(`  ${name}: ${check}`);
	}
	if (health.responseTimeMs !== undefined) {
		lines.push(`  responseTimeMs: ${health.responseTimeMs}`);
	}
	if (health.error) {
		lines.push(`  error: ${health.error}`);
	}
	return lines.join("\n");
}

/** Settings as JSON with the API key masked. */
export function formatSettings(settings: Settings): string {
	return JSON.stringify(
		{
			...settings,
			llm: {
				...settings.llm,
				apiKey: settings.llm.apiKey ? "***" : null,
			},
		},
		null,
		2,
	);
}
