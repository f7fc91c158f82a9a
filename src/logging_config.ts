import winston, { Logger } from "winston";
import { CONFIG } from "./config";
import { ConfigurationError } from "./exceptions";

export const LOG_LEVELS = [
	"error",
	"warn",
	"info",
	"http",
	"verbose",
	"debug",
	"silly",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(level: string): level is LogLevel {
	return LOG_LEVELS.some((known) => known === level);
}

function resolveLevel(): string {
	const level = CONFIG.pagepilotLoggingLevel;
	return isLogLevel(level) ? level : "info";
}

const transports: winston.transport[] = [new winston.transports.Console()];
const logFile = CONFIG.pagepilotLogFile;
if (logFile) {
	transports.push(new winston.transports.File({ filename: logFile }));
}

const ppLogger: Logger = winston.createLogger({
	level: resolveLevel(),
	format: winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.printf(({ level, message, timestamp, stack, module }) => {
			const scope = typeof module === "string" ? ` [${module}]` : "";
			if (stack) {
				return `${timestamp} ${level}${scope}: ${message}\n${stack}`;
			}
			return `${timestamp} ${level}${scope}: ${message}`;
		}),
	),
	transports,
});

/** Change the level of `ppLogger` and every child logger. */
export function setLogLevel(level: string): void {
	const normalized = level.toLowerCase();
	if (!isLogLevel(normalized)) {
		throw new ConfigurationError(`Unknown log level: ${level}`);
	}
	ppLogger.level = normalized;
}

export default ppLogger;
