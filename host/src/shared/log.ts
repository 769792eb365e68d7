import fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export type Logger = winston.Logger;

export interface LoggerOptions {
	serviceName: string;
	/** Omit to log to the console only. */
	logDir?: string;
	level?: string;
	console?: boolean;
}

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

function lineFormat(serviceName: string) {
	return winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const meta = info.stack ? `\n${String(info.stack)}` : "";
			return `${String(info.timestamp)} [${serviceName}] ${info.level}: ${String(info.message)}${meta}`;
		})
	);
}

export function createLogger(opts: LoggerOptions): Logger {
	const level = getLevel(opts.level);
	const format = lineFormat(opts.serviceName);

	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		transports.push(new winston.transports.Console({ level, format }));
	}

	if (opts.logDir) {
		fs.mkdirSync(opts.logDir, { recursive: true });

		transports.push(
			new DailyRotateFile({
				level,
				format,
				dirname: opts.logDir,
				filename: `${opts.serviceName}.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "14d",
				zippedArchive: false
			})
		);

		transports.push(
			new DailyRotateFile({
				level: "error",
				format,
				dirname: opts.logDir,
				filename: `${opts.serviceName}.error.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "30d",
				zippedArchive: false
			})
		);
	}

	return winston.createLogger({
		level,
		format,
		transports
	});
}

/** Logger that drops everything; used where output would only be noise. */
export function createSilentLogger(): Logger {
	return winston.createLogger({
		silent: true,
		transports: [new winston.transports.Console({ silent: true })]
	});
}
