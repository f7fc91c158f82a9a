import type { Server } from "node:http";
import { checkBrowserHealth } from "../browser/health";
import type { Settings } from "../config";
import ppLogger from "../logging_config";
import { createApp } from "./app";
import { type AgentDefaults, TaskManager } from "./task_manager";

export { createApp } from "./app";
export { TaskManager } from "./task_manager";
export type { AgentDefaults, TaskManagerOptions } from "./task_manager";
export * from "./views";

const logger = ppLogger.child({ module: "pagepilot/server" });

export interface RunningServer {
	url: string;
	manager: TaskManager;
	server: Server;
	/** Cancel running tasks, then stop accepting connections. */
	close(): Promise<void>;
}

export interface StartServerOptions {
	settings: Settings;
	agentDefaults?: AgentDefaults;
}

export async function startServer(
	options: StartServerOptions,
): Promise<RunningServer> {
	const { settings } = options;
	const manager = new TaskManager({
		settings,
		agentDefaults: options.agentDefaults,
	});
	const app = createApp({
		manager,
		checkHealth: () =>
			checkBrowserHealth({
				useRealBrowser: settings.agent.useRealBrowser,
				browser: settings.browser,
			}),
	});

	const server = await new Promise<Server>((resolve, reject) => {
		const listening = app.listen(settings.server.port, settings.server.host, () =>
			resolve(listening),
		);
		listening.once("error", reject);
	});

	const address = server.address();
	const port =
		typeof address === "object" && address !== null
			? address.port
			: settings.server.port;
	const url = `http://${settings.server.host}:${port}`;
	logger.info(`🌐 pagepilot server listening on ${url}`);

	return {
		url,
		manager,
		server,
		async close() {
			await manager.shutdown();
			await new Promise<void>((resolve, reject) => {
				server.close((error) => (error ? reject(error) : resolve()));
			});
			logger.info("🛑 Server stopped");
		},
	};
}
