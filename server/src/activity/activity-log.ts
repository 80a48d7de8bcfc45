import type winston from "winston";
import type { ActivityEntry } from "@sightline/common";

export const ACTIVITY_LOG_CAPACITY = 200;

const pad = (n: number) => String(n).padStart(2, "0");

/** Local time as "YYYY-MM-DD HH:MM:SS". */
export function formatTimestamp(d: Date): string {
	return (
		`${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
		`${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
	);
}

/** Bounded, insertion-ordered record of what the system and the devices reported. */
export class ActivityLog {
	private readonly entries: ActivityEntry[] = [];

	constructor(
		private readonly capacity: number = ACTIVITY_LOG_CAPACITY,
		private readonly logger?: winston.Logger,
		private readonly clock: () => Date = () => new Date()
	) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new RangeError(`Activity log capacity must be a positive integer, got ${capacity}`);
		}
	}

	get size(): number {
		return this.entries.length;
	}

	append(entry: ActivityEntry): void {
		this.entries.push(Object.freeze({ ...entry }));
		if (this.entries.length > this.capacity) {
			this.entries.splice(0, this.entries.length - this.capacity);
		}
		this.logger?.info("[%s] %s", entry.source, entry.message);
	}

	push(source: string, message: string): void {
		this.append({ time: formatTimestamp(this.clock()), source, message });
	}

	snapshot(): ActivityEntry[] {
		return this.entries.slice();
	}
}
