import type { BrowserSettings } from "../config";
import { toError } from "../exceptions";
import ppLogger from "../logging_config";
import { sleep } from "../utils";
import { BrowserProfile } from "./profile";
import { PlaywrightBrowserSession } from "./session";
import { SimulatedBrowserSession } from "./simulated";
import type { BrowserSession } from "./types";

const logger = ppLogger.child({ module: "pagepilot/browser/factory" });

export interface OpenBrowserSessionOptions {
	useRealBrowser: boolean;
	browser: BrowserSettings;
	/** Attempts at starting a real browser before falling back */
	maxAttempts?: number;
	/** Delay before attempt n+1 is `n * backoffMs` */
	backoffMs?: number;
	/** With `false`, the last launch error is thrown instead */
	fallbackToSimulated?: boolean;
	signal?: AbortSignal;
	createRealSession?: (profile: BrowserProfile) => BrowserSession;
	createSimulatedSession?: () => BrowserSession;
}

/**
 * Open and start the session a task runs in. A real browser that fails to
 * start after every attempt is replaced by a simulated session.
 */
export async function openBrowserSession(
	options: OpenBrowserSessionOptions,
): Promise<BrowserSession> {
	const createSimulated =
		options.createSimulatedSession ?? (() => new SimulatedBrowserSession());

	if (!options.useRealBrowser) {
		const session = createSimulated();
		await session.start();
		return session;
	}

	const createReal =
		options.createRealSession ??
		((profile: BrowserProfile) => new PlaywrightBrowserSession(profile));
	const profile = BrowserProfile.fromSettings(options.browser);
	const maxAttempts = options.maxAttempts ?? 3;
	const backoffMs = options.backoffMs ?? 1000;

	let lastError: unknown = new Error("No browser launch attempted");
	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		const session = createReal(profile);
		try {
			await session.start();
			return session;
		} catch (error) {
			lastError = error;
			await session.close();
			logger.warn(
				`⚠️ Browser launch attempt ${attempt}/${maxAttempts} failed: ${toError(error).message}`,
			);
			if (attempt < maxAttempts) {
				await sleep(backoffMs * attempt, options.signal);
			}
		}
	}

	if (options.fallbackToSimulated === false) {
		throw lastError;
	}
	logger.warn(
		`🔁 Could not start a real browser after ${maxAttempts} attempts, using simulated browser`,
	);
	const session = createSimulated();
	await session.start();
	return session;
}
