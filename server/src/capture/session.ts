import type { SessionState } from "@sightline/common";

export type SessionOwner =
	| { kind: "signal"; deviceId: string }
	| { kind: "manual"; action: "capture" | "detect" };

/** Proof of ownership handed out by tryBegin(). Only the current lease may move the session. */
export interface SessionLease {
	readonly id: number;
	readonly owner: SessionOwner;
}

export interface SessionSnapshot {
	state: SessionState;
	owner: SessionOwner | null;
	targetVersion: number | null;
	deadline: number | null;
}

export class StaleLeaseError extends Error {
	constructor(leaseId: number) {
		super(`Session lease ${leaseId} is no longer valid`);
		this.name = "StaleLeaseError";
	}
}

/**
 * The one capture session of the process.
 *
 * Every transition is synchronous, so check-and-set is atomic between awaits.
 * Invariant: state is idle exactly when no lease is held.
 */
export class Session {
	private state: SessionState = "idle";
	private lease: SessionLease | null = null;
	private targetVersion: number | null = null;
	private deadline: number | null = null;
	private nextLeaseId = 1;

	get current(): SessionState {
		return this.state;
	}

	isIdle(): boolean {
		return this.state === "idle";
	}

	/** Leaves idle for polling. Null when the session is already taken. */
	tryBegin(owner: SessionOwner, targetVersion: number, deadline: number | null = null): SessionLease | null {
		if (this.lease) return null;

		const lease: SessionLease = Object.freeze({ id: this.nextLeaseId++, owner });
		this.lease = lease;
		this.state = "polling";
		this.targetVersion = targetVersion;
		this.deadline = deadline;
		return lease;
	}

	holds(lease: SessionLease): boolean {
		return this.lease !== null && this.lease.id === lease.id;
	}

	toDetecting(lease: SessionLease): void {
		this.assertHeld(lease);
		this.state = "detecting";
	}

	toPolling(lease: SessionLease, targetVersion: number): void {
		this.assertHeld(lease);
		this.state = "polling";
		this.targetVersion = targetVersion;
	}

	/** Back to idle; the lease is spent. Ending a lease that is no longer held is a no-op. */
	end(lease: SessionLease): void {
		if (!this.holds(lease)) return;
		this.lease = null;
		this.state = "idle";
		this.targetVersion = null;
		this.deadline = null;
	}

	target(): number | null {
		return this.targetVersion;
	}

	snapshot(): SessionSnapshot {
		return {
			state: this.state,
			owner: this.lease?.owner ?? null,
			targetVersion: this.targetVersion,
			deadline: this.deadline
		};
	}

	private assertHeld(lease: SessionLease): void {
		if (!this.holds(lease)) {
			throw new StaleLeaseError(lease.id);
		}
	}
}
