import winston from "winston";

/** Console-only logger with the same line format as the server. */
export function createLogger(serviceName: string, level?: string): winston.Logger {
	return winston.createLogger({
		level: (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase(),
		format: winston.format.combine(
			winston.format.timestamp(),
			winston.format.errors({ stack: true }),
			winston.format.splat(),
			winston.format.printf(info => {
				const meta = info.stack ? `\n${String(info.stack)}` : "";
				return `${String(info.timestamp)} [${serviceName}] ${info.level}: ${String(info.message)}${meta}`;
			})
		),
		transports: [new winston.transports.Console()]
	});
}
