import type { BrowserSettings } from "../config";
import { toError } from "../exceptions";
import ppLogger from "../logging_config";
import { openBrowserSession } from "./factory";
import type { BrowserSession } from "./types";

const logger = ppLogger.child({ module: "pagepilot/browser/health" });

export type HealthCheckStatus = "pass" | `fail: ${string}`;

export interface BrowserHealth {
	service: string;
	status: "healthy" | "degraded" | "unhealthy";
	timestamp: string;
	sessionKind?: BrowserSession["kind"];
	checks: {
		browserCreation?: HealthCheckStatus;
		navigation?: HealthCheckStatus;
		browserCleanup?: HealthCheckStatus;
	};
	responseTimeMs?: number;
	error?: string;
}

export interface HealthCheckOptions {
	useRealBrowser: boolean;
	browser: BrowserSettings;
	openSession?: typeof openBrowserSession;
	now?: () => number;
}

function fail(error: unknown): HealthCheckStatus {
	return `fail: ${toError(error).message}`;
}

/**
 * Open a session, load a blank page and close it again. Any failed step marks
 * the result `degraded`; failing to open a session marks it `unhealthy`.
 */
export async function checkBrowserHealth(
	options: HealthCheckOptions,
): Promise<BrowserHealth> {
	const open = options.openSession ?? openBrowserSession;
	const now = options.now ?? Date.now;
	const health: BrowserHealth = {
		service: "pagepilot browser executor",
		status: "healthy",
		timestamp: new Date(now()).toISOString(),
		checks: {},
	};

	const startedAt = now();
	let session: BrowserSession;
	try {
		logger.debug("Performing browser health check");
		// A real browser that cannot start must not be masked by the simulated one
		session = await open({
			useRealBrowser: options.useRealBrowser,
			browser: options.browser,
			maxAttempts: 1,
			fallbackToSimulated: false,
		});
		health.sessionKind = session.kind;
		health.checks.browserCreation = "pass";
	} catch (error) {
		health.status = "unhealthy";
		health.checks.browserCreation = fail(error);
		health.error = toError(error).message;
		logger.error(`Health check failed: ${health.error}`);
		return health;
	}

	try {
		await session.navigate("about:blank");
		health.checks.navigation = "pass";
	} catch (error) {
		health.checks.navigation = fail(error);
	}

	try {
		await session.close();
		health.checks.browserCleanup = "pass";
	} catch (error) {
		health.checks.browserCleanup = fail(error);
	}

	health.responseTimeMs = now() - startedAt;
	if (Object.values(health.checks).some((check) => check !== "pass")) {
		health.status = "degraded";
	}
	return health;
}
