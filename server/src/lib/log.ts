import fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export interface LoggerOptions {
	logDir: string;
	serviceName: string;
	level?: string;
	console?: boolean;
	/** Write rotated files under logDir. Default: true */
	files?: boolean;
}

function ensureDir(dir: string): void {
	fs.mkdirSync(dir, { recursive: true });
}

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

export function logFormat(serviceName: string): winston.Logform.Format {
	return winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const ts = String(info.timestamp);
			const meta = info.stack ? `\n${String(info.stack)}` : "";
			return `${ts} [${serviceName}] ${info.level}: ${String(info.message)}${meta}`;
		})
	);
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = getLevel(opts.level);
	const format = logFormat(opts.serviceName);

	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		transports.push(
			new winston.transports.Console({
				level,
				format
			})
		);
	}

	if (opts.files ?? true) {
		ensureDir(opts.logDir);

		transports.push(
			new DailyRotateFile({
				level,
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

/** A logger with no transports, for tests and dry runs. */
export function createSilentLogger(): winston.Logger {
	return winston.createLogger({ silent: true });
}
