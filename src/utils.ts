import type { Logger } from "winston";
import { CancelledError } from "./exceptions";
import ppLogger from "./logging_config";

const logger = ppLogger.child({ module: "pagepilot/utils" });

function isLogger(value: unknown): value is Logger {
	return (
		typeof value === "object" &&
		value !== null &&
		"debug" in value &&
		typeof value.debug === "function"
	);
}

function loggerOf(target: unknown): Logger {
	if (typeof target === "object" && target !== null && "logger" in target) {
		if (isLogger(target.logger)) {
			return target.logger;
		}
	}
	return logger;
}

/**
 * Decorator for timing asynchronous method execution. Logs at debug level
 * through the instance's own `logger` when the call takes longer than 0.25s.
 */
export function timeExecutionAsync(additionalText = "") {
	return function <This, Args extends unknown[], R>(
		_target: object,
		_propertyKey: string | symbol,
		descriptor: TypedPropertyDescriptor<(this: This, ...args: Args) => Promise<R>>,
	) {
		const originalMethod = descriptor.value;
		if (!originalMethod) {
			return descriptor;
		}

		descriptor.value = async function (this: This, ...args: Args): Promise<R> {
			const startTime = Date.now();
			try {
				return await originalMethod.apply(this, args);
			} finally {
				const executionTime = (Date.now() - startTime) / 1000;
				if (executionTime > 0.25) {
					loggerOf(this).debug(
						`⏳ ${additionalText.replace(/-/g, "")}() took ${executionTime.toFixed(2)}s`,
					);
				}
			}
		};

		return descriptor;
	};
}

/**
 * Resolve after `ms`, or reject with `CancelledError` as soon as `signal`
 * aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new CancelledError());
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			reject(new CancelledError());
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Settle with `promise`, unless `signal` aborts first. The underlying work is
 * not stopped; its late result is discarded.
 */
export function raceWithAbort<T>(
	promise: Promise<T>,
	signal?: AbortSignal,
): Promise<T> {
	if (!signal) {
		return promise;
	}
	if (signal.aborted) {
		promise.catch((error: unknown) =>
			logger.debug(`Discarding result of cancelled work: ${String(error)}`),
		);
		return Promise.reject(new CancelledError());
	}
	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(new CancelledError());
		signal.addEventListener("abort", onAbort, { once: true });
		promise.then(
			(value) => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			},
		);
	});
}

export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw new CancelledError();
	}
}

export function truncate(text: string, maxLength: number): string {
	if (text.length <= maxLength) {
		return text;
	}
	return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}

export function collapseWhitespace(text: string): string {
	return text.replace(/\s+/g, " ").trim();
}

export interface SignalHandlerOptions {
	/** Called on the first Ctrl+C. */
	onInterrupt: () => void;
	/** Exit the process on the second Ctrl+C. */
	exitOnSecondInt?: boolean;
}

/**
 * Turns the first SIGINT/SIGTERM into a graceful interrupt and the second
 * into an immediate exit.
 */
export class SignalHandler {
	private interrupted = false;
	private readonly handler = () => this.handle();

	constructor(private readonly options: SignalHandlerOptions) {}

	register(): void {
		process.on("SIGINT", this.handler);
		process.on("SIGTERM", this.handler);
	}

	unregister(): void {
		process.off("SIGINT", this.handler);
		process.off("SIGTERM", this.handler);
	}

	private handle(): void {
		if (this.interrupted && (this.options.exitOnSecondInt ?? true)) {
			logger.warn("Second interrupt received, exiting immediately");
			process.exit(130);
		}
		this.interrupted = true;
		logger.warn("Interrupt received, cancelling (press Ctrl+C again to force exit)");
		this.options.onInterrupt();
	}
}
