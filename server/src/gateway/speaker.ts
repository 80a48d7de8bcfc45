import { spawn } from "node:child_process";
import type winston from "winston";

import type { SpeechConfig } from "../lib/config";
import { announcementFailed } from "../lib/errors";
import type { Speaker } from "./types";

/** Substitutes "{text}" in every argument. Text is passed as one argv entry, never through a shell. */
export function speechArgs(template: readonly string[], text: string): string[] {
	return template.map(arg => arg.split("{text}").join(text));
}

/** Runs a text-to-speech command (espeak-ng by default) and waits for it to exit. */
export class CommandSpeaker implements Speaker {
	constructor(
		private readonly config: SpeechConfig,
		private readonly logger: winston.Logger
	) {}

	speak(text: string, signal: AbortSignal): Promise<void> {
		const args = speechArgs(this.config.args, text);
		this.logger.debug("Running %s %s", this.config.command, args.join(" "));

		return new Promise((resolve, reject) => {
			const child = spawn(this.config.command, args, { stdio: ["ignore", "ignore", "pipe"], signal });
			let stderr = "";

			child.stderr?.on("data", (d: Buffer) => (stderr += d.toString()));
			child.on("error", err => {
				reject(announcementFailed(`Speech command ${this.config.command} failed: ${err.message}`, err));
			});
			child.on("close", (code, sig) => {
				if (code === 0) {
					resolve();
					return;
				}
				const why = sig ? `killed by ${sig}` : `exited with code ${String(code)}`;
				reject(announcementFailed(`Speech command ${this.config.command} ${why}: ${stderr.trim()}`));
			});
		});
	}
}

/** Used when speech output is disabled. */
export class LogSpeaker implements Speaker {
	constructor(private readonly logger: winston.Logger) {}

	async speak(text: string): Promise<void> {
		this.logger.info("Announcement (speech disabled): %s", text);
	}
}

export function createSpeaker(config: SpeechConfig, logger: winston.Logger): Speaker {
	return config.enabled ? new CommandSpeaker(config, logger) : new LogSpeaker(logger);
}
