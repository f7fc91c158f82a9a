/**
 * Lazy-loading configuration for pagepilot environment variables, plus the
 * immutable `Settings` value that every task is constructed from.
 */

import { z } from "zod";
import { ConfigurationError } from "./exceptions";

const PLACEHOLDER_API_KEYS = new Set([
	"your-anthropic-api-key-here",
	"your-openai-api-key-here",
]);

function envString(name: string): string | undefined {
	const value = process.env[name]?.trim();
	return value ? value : undefined;
}

function envFlag(name: string): boolean | undefined {
	const value = envString(name);
	if (value === undefined) {
		return undefined;
	}
	return ["t", "y", "1"].includes(value.toLowerCase().charAt(0));
}

function envInt(name: string): number | undefined {
	const value = envString(name);
	if (value === undefined) {
		return undefined;
	}
	const parsed = Number.parseInt(value, 10);
	return Number.isNaN(parsed) ? undefined : parsed;
}

function envSecret(name: string): string | undefined {
	const value = envString(name);
	if (value === undefined || PLACEHOLDER_API_KEYS.has(value)) {
		return undefined;
	}
	return value;
}

/**
 * Lazy-loading configuration class for environment variables
 * (env vars can change at runtime so we read them fresh on every access)
 */
class Config {
	get pagepilotLoggingLevel(): string {
		return (envString("PAGEPILOT_LOGGING_LEVEL") ?? "info").toLowerCase();
	}

	get pagepilotLogFile(): string | undefined {
		return envString("PAGEPILOT_LOG_FILE");
	}

	// LLM
	get llmProvider(): string | undefined {
		return envString("PAGEPILOT_LLM_PROVIDER")?.toLowerCase();
	}

	get llmModel(): string | undefined {
		return envString("PAGEPILOT_MODEL");
	}

	get llmTimeoutMs(): number | undefined {
		return envInt("PAGEPILOT_LLM_TIMEOUT_MS");
	}

	get anthropicApiKey(): string | undefined {
		return envSecret("ANTHROPIC_API_KEY");
	}

	get openaiApiKey(): string | undefined {
		return envSecret("OPENAI_API_KEY");
	}

	// Agent
	get maxIterations(): number | undefined {
		return envInt("PAGEPILOT_MAX_ITERATIONS");
	}

	get useRealBrowser(): boolean | undefined {
		return envFlag("PAGEPILOT_USE_REAL_BROWSER");
	}

	get enableSecurityChecks(): boolean | undefined {
		return envFlag("PAGEPILOT_ENABLE_SECURITY_CHECKS");
	}

	get startUrl(): string | undefined {
		return envString("PAGEPILOT_START_URL");
	}

	// Browser
	get headless(): boolean | undefined {
		return envFlag("PAGEPILOT_HEADLESS");
	}

	get browserChannel(): string | undefined {
		return envString("PAGEPILOT_BROWSER_CHANNEL");
	}

	get userDataDir(): string | undefined {
		return envString("PAGEPILOT_USER_DATA_DIR");
	}

	get defaultTimeoutMs(): number | undefined {
		return envInt("PAGEPILOT_DEFAULT_TIMEOUT_MS");
	}

	get pageLoadTimeoutMs(): number | undefined {
		return envInt("PAGEPILOT_PAGE_LOAD_TIMEOUT_MS");
	}

	get slowMoMs(): number | undefined {
		return envInt("PAGEPILOT_SLOW_MO_MS");
	}

	get screenshotDir(): string | undefined {
		return envString("PAGEPILOT_SCREENSHOT_DIR");
	}

	// Server
	get serverHost(): string | undefined {
		return envString("PAGEPILOT_SERVER_HOST");
	}

	get serverPort(): number | undefined {
		return envInt("PAGEPILOT_SERVER_PORT");
	}

	get approvalTimeoutMs(): number | undefined {
		return envInt("PAGEPILOT_APPROVAL_TIMEOUT_MS");
	}
}

export const CONFIG = new Config();

export const DEFAULT_MODELS = {
	anthropic: "claude-3-5-sonnet-20240620",
	openai: "gpt-4o",
} as const;

export const BrowserSettingsSchema = z.object({
	headless: z.boolean().default(false),
	channel: z.string().optional(),
	userDataDir: z.string().optional(),
	defaultTimeoutMs: z.number().int().positive().default(5000),
	pageLoadTimeoutMs: z.number().int().positive().default(30000),
	slowMoMs: z.number().int().nonnegative().default(0),
	screenshotDir: z.string().optional(),
});

export const AgentSettingsSchema = z.object({
	maxIterations: z.number().int().min(1).max(20).default(5),
	useRealBrowser: z.boolean().default(false),
	enableSecurityChecks: z.boolean().default(true),
	startUrl: z.string().min(1).default("https://example.com"),
	historyWindow: z.number().int().positive().default(10),
	pageExcerptChars: z.number().int().positive().default(2000),
});

export const LlmSettingsSchema = z.object({
	provider: z.enum(["anthropic", "openai"]).default("anthropic"),
	apiKey: z.string().min(1).optional(),
	model: z.string().min(1).optional(),
	temperature: z.number().min(0).max(2).default(0),
	maxTokens: z.number().int().positive().default(4096),
	timeoutMs: z.number().int().positive().default(60000),
});

export const ServerSettingsSchema = z.object({
	host: z.string().min(1).default("0.0.0.0"),
	port: z.number().int().min(0).max(65535).default(8000),
	approvalTimeoutMs: z.number().int().nonnegative().default(300000),
	maxStoredTasks: z.number().int().positive().default(100),
});

export const SettingsSchema = z.object({
	browser: BrowserSettingsSchema.default({}),
	agent: AgentSettingsSchema.default({}),
	llm: LlmSettingsSchema.default({}),
	server: ServerSettingsSchema.default({}),
});

export type BrowserSettings = Readonly<z.infer<typeof BrowserSettingsSchema>>;
export type AgentSettings = Readonly<z.infer<typeof AgentSettingsSchema>>;
export type LlmSettings = Readonly<z.infer<typeof LlmSettingsSchema>>;
export type ServerSettings = Readonly<z.infer<typeof ServerSettingsSchema>>;

export interface Settings {
	readonly browser: BrowserSettings;
	readonly agent: AgentSettings;
	readonly llm: LlmSettings;
	readonly server: ServerSettings;
}

export type SettingsInput = z.input<typeof SettingsSchema>;

function definedEntries<T extends object>(value: T | undefined): Partial<T> {
	const result: Partial<T> = {};
	if (!value) {
		return result;
	}
	for (const [key, entry] of Object.entries(value)) {
		if (entry !== undefined) {
			Reflect.set(result, key, entry);
		}
	}
	return result;
}

/**
 * Read the settings the environment provides; unset variables are left out so
 * schema defaults apply. The API key is the one of `providerOverride` when
 * given.
 */
export function settingsFromEnv(
	providerOverride?: LlmSettings["provider"],
): SettingsInput {
	const provider = providerOverride ?? CONFIG.llmProvider;
	const resolvedProvider = provider === "openai" ? "openai" : "anthropic";
	return {
		browser: definedEntries({
			headless: CONFIG.headless,
			channel: CONFIG.browserChannel,
			userDataDir: CONFIG.userDataDir,
			defaultTimeoutMs: CONFIG.defaultTimeoutMs,
			pageLoadTimeoutMs: CONFIG.pageLoadTimeoutMs,
			slowMoMs: CONFIG.slowMoMs,
			screenshotDir: CONFIG.screenshotDir,
		}),
		agent: definedEntries({
			maxIterations: CONFIG.maxIterations,
			useRealBrowser: CONFIG.useRealBrowser,
			enableSecurityChecks: CONFIG.enableSecurityChecks,
			startUrl: CONFIG.startUrl,
		}),
		llm: definedEntries({
			provider,
			apiKey:
				resolvedProvider === "openai"
					? CONFIG.openaiApiKey
					: CONFIG.anthropicApiKey,
			model: CONFIG.llmModel,
			timeoutMs: CONFIG.llmTimeoutMs,
		}),
		server: definedEntries({
			host: CONFIG.serverHost,
			port: CONFIG.serverPort,
			approvalTimeoutMs: CONFIG.approvalTimeoutMs,
		}),
	};
}

/**
 * Build a frozen `Settings` value. `base` defaults to the environment;
 * `overrides` win per field.
 */
export function loadSettings(
	overrides: SettingsInput = {},
	base: SettingsInput = settingsFromEnv(overrides.llm?.provider),
): Settings {
	const merged: SettingsInput = {
		browser: { ...base.browser, ...definedEntries(overrides.browser) },
		agent: { ...base.agent, ...definedEntries(overrides.agent) },
		llm: { ...base.llm, ...definedEntries(overrides.llm) },
		server: { ...base.server, ...definedEntries(overrides.server) },
	};

	const parsed = SettingsSchema.safeParse(merged);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigurationError(`Invalid configuration: ${details}`);
	}

	return Object.freeze({
		browser: Object.freeze(parsed.data.browser),
		agent: Object.freeze(parsed.data.agent),
		llm: Object.freeze(parsed.data.llm),
		server: Object.freeze(parsed.data.server),
	});
}

export function hasLlmCredentials(llm: LlmSettings): boolean {
	return llm.apiKey !== undefined && llm.apiKey !== "";
}

export function resolveModelName(llm: LlmSettings): string {
	return llm.model ?? DEFAULT_MODELS[llm.provider];
}
