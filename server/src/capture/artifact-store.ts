export interface Artifact {
	readonly data: Buffer;
	readonly version: number;
	readonly writtenAt: Date;
}

/**
 * Holds the single live image.
 * The version counter only moves forward: clear() drops the bytes, not the count,
 * so a version observed before a clear can never be observed again.
 */
export class ArtifactStore {
	private artifact: Artifact | null = null;
	private counter = 0;

	constructor(private readonly clock: () => Date = () => new Date()) {}

	write(data: Buffer): Artifact {
		this.counter += 1;
		this.artifact = Object.freeze({
			data: Buffer.from(data),
			version: this.counter,
			writtenAt: this.clock()
		});
		return this.artifact;
	}

	current(): Artifact | null {
		return this.artifact;
	}

	version(): number {
		return this.counter;
	}

	clear(): void {
		this.artifact = null;
	}
}
