import os from "node:os";
import path from "node:path";
import type { BrowserSettings } from "../config";
import type { LaunchOptions } from "./types";

export const CHROME_HEADLESS_ARGS = ["--headless=new"];

export const CHROME_DOCKER_ARGS = [
	"--no-sandbox",
	"--disable-gpu-sandbox",
	"--disable-setuid-sandbox",
	"--disable-dev-shm-usage",
	"--no-zygote",
];

export const CHROME_DEFAULT_ARGS = [
	"--disable-blink-features=AutomationControlled",
	"--disable-popup-blocking",
	"--disable-renderer-backgrounding",
	"--disable-backgrounding-occluded-windows",
	"--no-first-run",
	"--no-default-browser-check",
];

export interface BrowserProfileOptions {
	headless: boolean;
	channel?: string;
	userDataDir?: string;
	defaultTimeoutMs: number;
	pageLoadTimeoutMs: number;
	slowMoMs: number;
	screenshotDir: string;
	args: string[];
}

/**
 * Launch configuration for a Playwright session, derived from the browser
 * section of the settings.
 */
export class BrowserProfile implements BrowserProfileOptions {
	readonly headless: boolean;
	readonly channel?: string;
	readonly userDataDir?: string;
	readonly defaultTimeoutMs: number;
	readonly pageLoadTimeoutMs: number;
	readonly slowMoMs: number;
	readonly screenshotDir: string;
	readonly args: string[];

	constructor(options: BrowserProfileOptions) {
		this.headless = options.headless;
		this.channel = options.channel;
		this.userDataDir = options.userDataDir;
		this.defaultTimeoutMs = options.defaultTimeoutMs;
		this.pageLoadTimeoutMs = options.pageLoadTimeoutMs;
		this.slowMoMs = options.slowMoMs;
		this.screenshotDir = options.screenshotDir;
		this.args = options.args;
	}

	static fromSettings(settings: BrowserSettings, args: string[] = []): BrowserProfile {
		return new BrowserProfile({
			headless: settings.headless,
			channel: settings.channel,
			userDataDir: settings.userDataDir,
			defaultTimeoutMs: settings.defaultTimeoutMs,
			pageLoadTimeoutMs: settings.pageLoadTimeoutMs,
			slowMoMs: settings.slowMoMs,
			screenshotDir:
				settings.screenshotDir ??
				path.join(os.tmpdir(), "pagepilot-screenshots"),
			args,
		});
	}

	/**
	 * Chrome CLI args for this profile: defaults, then system-specific, then
	 * user-provided. A later `--flag=value` replaces an earlier one.
	 */
	getArgs(): string[] {
		const merged = [
			...CHROME_DEFAULT_ARGS,
			...(process.env.DOCKER ? CHROME_DOCKER_ARGS : []),
			...(this.headless ? CHROME_HEADLESS_ARGS : ["--start-maximized"]),
			...this.args,
		];
		return argsAsList(argsAsDict(merged));
	}

	toLaunchOptions(): LaunchOptions {
		return {
			headless: this.headless,
			channel: this.channel,
			slowMo: this.slowMoMs,
			timeout: this.pageLoadTimeoutMs,
			args: this.getArgs(),
		};
	}
}

export function argsAsDict(args: string[]): Map<string, string> {
	const result = new Map<string, string>();
	for (const arg of args) {
		const trimmed = arg.trim().replace(/^-+/, "");
		const separator = trimmed.indexOf("=");
		if (separator === -1) {
			result.set(trimmed, "");
		} else {
			result.set(trimmed.slice(0, separator), trimmed.slice(separator + 1));
		}
	}
	return result;
}

export function argsAsList(args: Map<string, string>): string[] {
	return [...args.entries()].map(([key, value]) =>
		value ? `--${key}=${value}` : `--${key}`,
	);
}
