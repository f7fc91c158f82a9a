import { SimulatedBrowserSession } from "../../browser/simulated";
import type { BrowserSession } from "../../browser/types";
import { type SettingsInput, loadSettings } from "../../config";
import { TaskManager } from "../task_manager";

export async function openSimulatedSession(): Promise<BrowserSession> {
	const session = new SimulatedBrowserSession();
	await session.start();
	return session;
}

/** Rule-driven manager on simulated browsers, with no approval timeout. */
export function createTestManager(server: SettingsInput["server"] = {}): TaskManager {
	return new TaskManager({
		settings: loadSettings({ server: { approvalTimeoutMs: 0, ...server } }, {}),
		agentDefaults: { llm: null, openSession: openSimulatedSession },
	});
}

/** Destructive on its second step: the rules click the submit button. */
export const DESTRUCTIVE_TASK = "Click the submit button on example.com";
