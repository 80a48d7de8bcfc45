export interface TopicOptions {
	namespace: string;
	deviceId: string;
	/** Overrides `{namespace}/cam_image`. */
	imageTopic?: string;
}

export interface TopicLayout {
	namespace: string;
	/** Wake signals of the configured device. */
	signal: string;
	/** Raw frames; chunked frames live below it. */
	image: string;
	/** Single filter for both the raw topic and its chunk sub-topics ("a/#" also matches "a"). */
	imageStream: string;
	logs: string;
	logsPrefix: string;
	command: string;
}

export type FramePart =
	| { imageId: number; part: "start" }
	| { imageId: number; part: "chunk"; index: number }
	| { imageId: number; part: "end" };

function signalTopic(namespace: string, deviceId: string): string {
	return `${namespace}/device/${deviceId}/signal`;
}

export function buildTopics(opts: TopicOptions): TopicLayout {
	const ns = opts.namespace;
	const image = opts.imageTopic ?? `${ns}/cam_image`;
	return {
		namespace: ns,
		signal: signalTopic(ns, opts.deviceId),
		image,
		imageStream: `${image}/#`,
		logs: `${ns}/logs/#`,
		logsPrefix: `${ns}/logs/`,
		command: `${ns}/camera/command`
	};
}

export function frameTopic(image: string, part: FramePart): string {
	if (part.part === "chunk") {
		return `${image}/${part.imageId}/chunk/${part.index}`;
	}
	return `${image}/${part.imageId}/${part.part}`;
}

function parseIndex(segment: string | undefined): number | null {
	if (segment === undefined || !/^\d+$/.test(segment)) return null;
	return Number.parseInt(segment, 10);
}

/** Inverse of frameTopic. Returns null for anything that is not a chunked-frame topic of `image`. */
export function parseFrameTopic(image: string, topic: string): FramePart | null {
	const prefix = `${image}/`;
	if (!topic.startsWith(prefix)) return null;

	const rest = topic.slice(prefix.length).split("/");
	const imageId = parseIndex(rest[0]);
	if (imageId === null) return null;

	const kind = rest[1];
	if (rest.length === 2 && (kind === "start" || kind === "end")) {
		return { imageId, part: kind };
	}
	if (rest.length === 3 && kind === "chunk") {
		const index = parseIndex(rest[2]);
		return index === null ? null : { imageId, part: "chunk", index };
	}
	return null;
}
