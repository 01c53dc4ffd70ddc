/**
 * Repository Base Utilities
 *
 * Every artifact is one JSON document: a versioned envelope around a
 * schema-checked payload. Writes go to a temp file in the same directory
 * and are renamed into place, so readers never see a partial document.
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { ArtifactError, errorMessage, type Granularity, toIsoDate } from "@fxline/domain";
import type { Logger } from "@fxline/logger";
import { z } from "zod";
import { log as defaultLog } from "../logger.js";
import { IsoTimestampSchema, toIso } from "../schema/artifacts.js";

// ============================================
// Types
// ============================================

export const ARTIFACT_VERSION = 1;

export type ArtifactLayer = "raw" | "processed" | "model_ready";

/**
 * Identifies one artifact. `granularity` is absent for instrument-level
 * artifacts such as raw news.
 */
export interface ArtifactKey {
	instrument: string;
	granularity?: Granularity;
	start: number;
	end: number;
}

export interface RepositoryOptions<S extends z.ZodTypeAny> {
	kind: string;
	layer: ArtifactLayer;
	/** File name prefix, e.g. "news_" */
	prefix?: string;
	payload: S;
	encode: (value: z.output<S>) => z.input<S>;
	logger?: Logger;
}

const EnvelopeSchema = z.object({
	kind: z.string(),
	version: z.number().int(),
	key: z.object({
		instrument: z.string().min(1),
		granularity: z.string().optional(),
		start: IsoTimestampSchema,
		end: IsoTimestampSchema,
	}),
	payload: z.unknown(),
});

// ============================================
// Helpers
// ============================================

/**
 * `<prefix><INSTRUMENT>[_<granularity>]_<start>_<end>.json`, dates as YYYY-MM-DD.
 */
export function artifactFileName(key: ArtifactKey, prefix = ""): string {
	const parts = [key.instrument.toUpperCase()];
	if (key.granularity) {
		parts.push(key.granularity);
	}
	parts.push(toIsoDate(key.start), toIsoDate(key.end));
	return `${prefix}${parts.join("_")}.json`;
}

/**
 * Write `contents` to `path` through a sibling temp file and a rename.
 */
export async function writeAtomic(path: string, contents: string): Promise<void> {
	await mkdir(dirname(path), { recursive: true });
	const tmp = `${path}.${process.pid}.${randomUUID()}.tmp`;
	try {
		await writeFile(tmp, contents, "utf8");
		await rename(tmp, path);
	} catch (error) {
		await rm(tmp, { force: true });
		throw new ArtifactError(path, `Failed to write artifact (${errorMessage(error)})`, error);
	}
}

// ============================================
// Repository
// ============================================

/**
 * Typed access to one artifact kind under `<dataDir>/<layer>/`.
 */
export class ArtifactRepository<S extends z.ZodTypeAny> {
	readonly kind: string;
	readonly directory: string;
	private readonly log: Logger;

	constructor(
		dataDir: string,
		private readonly options: RepositoryOptions<S>,
	) {
		this.kind = options.kind;
		this.directory = join(dataDir, options.layer);
		this.log = options.logger ?? defaultLog;
	}

	path(key: ArtifactKey): string {
		return join(this.directory, artifactFileName(key, this.options.prefix));
	}

	async exists(key: ArtifactKey): Promise<boolean> {
		try {
			return (await stat(this.path(key))).isFile();
		} catch {
			return false;
		}
	}

	/**
	 * Persist `value`, replacing any previous artifact for the key.
	 * Identical input produces byte-identical files.
	 *
	 * @returns the artifact path
	 */
	async save(key: ArtifactKey, value: z.output<S>): Promise<string> {
		const path = this.path(key);
		const document = {
			kind: this.kind,
			version: ARTIFACT_VERSION,
			key: {
				instrument: key.instrument,
				...(key.granularity ? { granularity: key.granularity } : {}),
				start: toIso(key.start),
				end: toIso(key.end),
			},
			payload: this.options.encode(value),
		};
		await writeAtomic(path, `${JSON.stringify(document, null, 2)}\n`);
		this.log.info({ kind: this.kind, path }, "Artifact written");
		return path;
	}

	/**
	 * @throws ArtifactError when the file is missing, is not JSON, or fails validation
	 */
	async load(key: ArtifactKey): Promise<z.output<S>> {
		return this.loadPath(this.path(key));
	}

	async loadPath(path: string): Promise<z.output<S>> {
		let text: string;
		try {
			text = await readFile(path, "utf8");
		} catch (error) {
			throw new ArtifactError(path, "Artifact not found", error);
		}

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (error) {
			throw new ArtifactError(path, "Artifact is not valid JSON", error);
		}

		const envelope = EnvelopeSchema.safeParse(json);
		if (!envelope.success) {
			throw new ArtifactError(path, `Invalid ${this.kind} artifact: ${describeIssue(envelope.error)}`, envelope.error);
		}
		if (envelope.data.kind !== this.kind) {
			throw new ArtifactError(path, `Expected a ${this.kind} artifact, found ${envelope.data.kind}`);
		}
		if (envelope.data.version !== ARTIFACT_VERSION) {
			throw new ArtifactError(path, `Unsupported artifact version ${envelope.data.version}`);
		}

		const payload = this.options.payload.safeParse(envelope.data.payload);
		if (!payload.success) {
			throw new ArtifactError(path, `Invalid ${this.kind} artifact: ${describeIssue(payload.error, "payload")}`, payload.error);
		}
		return payload.data;
	}
}

function describeIssue(error: z.ZodError, root?: string): string {
	const issue = error.issues[0];
	if (!issue) {
		return "unknown";
	}
	const path = [...(root ? [root] : []), ...issue.path].join(".");
	return path ? `${path}: ${issue.message}` : issue.message;
}
