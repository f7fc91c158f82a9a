#!/usr/bin/env node

import "dotenv/config";

import * as readline from "node:readline/promises";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { type ApprovalHandler, autoApprove, autoReject } from "./agent/approval";
import { Agent } from "./agent/service";
import { createTask } from "./agent/views";
import { checkBrowserHealth } from "./browser/health";
import { formatHealth, formatResult, formatSettings, formatStep } from "./cli_format";
import { loadSettings } from "./config";
import { CancelledError } from "./exceptions";
import ppLogger, { LOG_LEVELS, setLogLevel } from "./logging_config";
import { startServer } from "./server";
import { SignalHandler } from "./utils";

const logger = ppLogger.child({ module: "pagepilot/cli" });

/** Ask on the terminal; anything but y/yes is a reject. */
const promptApproval: ApprovalHandler = async (request, signal) => {
	if (!process.stdin.isTTY) {
		logger.warn(`No terminal to ask for approval, rejecting: ${request.message}`);
		return false;
	}
	const rl = readline.createInterface({
		input: process.stdin,
		output: process.stdout,
	});
	try {
		const answer = await rl.question(
			`\n⚠️  ${request.message}\nApprove this action? [y/N] `,
			{ signal },
		);
		return /^y(es)?$/i.test(answer.trim());
	} catch (error) {
		if (signal?.aborted) {
			throw new CancelledError();
		}
		throw error;
	} finally {
		rl.close();
	}
};

interface RunArgs {
	task: string;
	realBrowser?: boolean;
	maxIterations?: number;
	provider?: "anthropic" | "openai";
	autoApprove?: boolean;
	autoReject?: boolean;
}

async function runTask(args: RunArgs): Promise<number> {
	const settings = loadSettings({
		llm: { provider: args.provider },
		agent: {
			maxIterations: args.maxIterations,
			useRealBrowser: args.realBrowser,
		},
	});
	const task = createTask({
		description: args.task,
		maxIterations: settings.agent.maxIterations,
		useRealBrowser: settings.agent.useRealBrowser,
	});

	const approvalHandler = args.autoApprove
		? autoApprove
		: args.autoReject
			? autoReject
			: promptApproval;

	const abort = new AbortController();
	const signals = new SignalHandler({ onInterrupt: () => abort.abort() });
	signals.register();
	try {
		const agent = new Agent(task, {
			settings,
			approvalHandler,
			signal: abort.signal,
			registerNewStepCallback: (step) => {
				console.log(formatStep(step));
			},
		});
		const result = await agent.run();
		console.log(`\n${formatResult(result)}`);
		return result.status === "done" ? 0 : 1;
	} finally {
		signals.unregister();
	}
}

async function runHealth(realBrowser?: boolean): Promise<number> {
	const settings = loadSettings({ agent: { useRealBrowser: realBrowser } });
	const health = await checkBrowserHealth({
		useRealBrowser: settings.agent.useRealBrowser,
		browser: settings.browser,
	});
	console.log(formatHealth(health));
	return health.status === "unhealthy" ? 1 : 0;
}

async function runServer(host?: string, port?: number): Promise<number> {
	const settings = loadSettings({ server: { host, port } });
	const server = await startServer({ settings });

	await new Promise<void>((resolve, reject) => {
		const signals = new SignalHandler({
			onInterrupt: () => {
				signals.unregister();
				server.close().then(resolve, reject);
			},
			exitOnSecondInt: true,
		});
		signals.register();
	});
	return 0;
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
	await yargs(argv)
		.scriptName("pagepilot")
		.option("log-level", {
			choices: LOG_LEVELS,
			describe: "Override PAGEPILOT_LOGGING_LEVEL",
		})
		.middleware((args) => {
			if (args.logLevel) {
				setLogLevel(args.logLevel);
			}
		})
		.command(
			"run <task>",
			"Run one browser task",
			(y) =>
				y
					.positional("task", {
						type: "string",
						demandOption: true,
						describe: "What the agent should do, in plain language",
					})
					.option("real-browser", {
						type: "boolean",
						describe: "Drive a real Chromium instead of the simulated browser",
					})
					.option("max-iterations", {
						type: "number",
						describe: "Upper bound on executed steps (1-20)",
					})
					.option("provider", {
						choices: ["anthropic", "openai"] as const,
						describe: "LLM provider used for decisions",
					})
					.option("auto-approve", {
						type: "boolean",
						describe: "Approve every destructive action without asking",
						conflicts: "auto-reject",
					})
					.option("auto-reject", {
						type: "boolean",
						describe: "Reject every destructive action without asking",
					}),
			async (args) => {
				process.exitCode = await runTask(args);
			},
		)
		.command(
			"health",
			"Check that a browser session can be opened",
			(y) =>
				y.option("real-browser", {
					type: "boolean",
					describe: "Check a real Chromium instead of the simulated browser",
				}),
			async (args) => {
				process.exitCode = await runHealth(args.realBrowser);
			},
		)
		.command(
			"config",
			"Print the effective configuration",
			(y) => y,
			() => {
				console.log(formatSettings(loadSettings()));
			},
		)
		.command(
			"server",
			"Start the REST server",
			(y) =>
				y
					.option("host", { type: "string", describe: "Interface to bind" })
					.option("port", { type: "number", describe: "Port to listen on" }),
			async (args) => {
				process.exitCode = await runServer(args.host, args.port);
			},
		)
		.demandCommand(1)
		.strict()
		.help()
		.parseAsync();
}

if (require.main === module) {
	main().catch((error: unknown) => {
		logger.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
		process.exit(1);
	});
}
