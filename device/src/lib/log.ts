import winston from "winston";

export function createLogger(serviceName: string, level?: string): winston.Logger {
	const format = winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const meta = info.stack ? `\n${String(info.stack)}` : "";
			return `${String(info.timestamp)} [${serviceName}] ${info.level}: ${String(info.message)}${meta}`;
		})
	);

	return winston.createLogger({
		level: (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase(),
		format,
		transports: [new winston.transports.Console()]
	});
}
