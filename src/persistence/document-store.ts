/**
 * Durable single-document JSON persistence for rules and
 * tracked accounts.
 *
 * FileDocumentStore writes to `<path>.tmp`, copies the previous file to
 * `<path>.bak`, then renames the temp file into place. A primary file that
 * cannot be parsed falls back to the backup.
 */

import { copyFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { type Logger, defaultLogger } from "../lib/logger/index.js";
import { StorageError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

/** `null` when nothing has been saved yet. */
export type StoredDocument = { readonly document: unknown } | null;

export interface DocumentStore {
	load(): Promise<Result<StoredDocument, StorageError>>;
	save(document: unknown): Promise<Result<void, StorageError>>;
}

export interface FileDocumentStoreConfig {
	readonly filePath: string;
	readonly logger?: Logger | undefined;
}

type ReadOutcome =
	| { readonly kind: "missing" }
	| { readonly kind: "parsed"; readonly document: unknown }
	| { readonly kind: "corrupt"; readonly error: Error };

export class FileDocumentStore implements DocumentStore {
	private readonly filePath: string;
	private readonly logger: Logger;
	private writeQueue: Promise<Result<void, StorageError>> = Promise.resolve(ok(undefined));

	private constructor(config: FileDocumentStoreConfig) {
		this.filePath = config.filePath;
		this.logger = config.logger ?? defaultLogger({ component: "document-store" });
	}

	static create(config: FileDocumentStoreConfig): FileDocumentStore {
		return new FileDocumentStore(config);
	}

	get backupPath(): string {
		return `${this.filePath}.bak`;
	}

	async load(): Promise<Result<StoredDocument, StorageError>> {
		const primary = await readDocument(this.filePath);
		if (primary.kind === "parsed") return ok({ document: primary.document });

		const backup = await readDocument(this.backupPath);
		if (primary.kind === "corrupt") {
			this.logger.warn(
				{ filePath: this.filePath, error: primary.error.message },
				"document unreadable, trying backup",
			);
		}
		if (backup.kind === "parsed") {
			this.logger.warn({ filePath: this.backupPath }, "document restored from backup");
			return ok({ document: backup.document });
		}
		if (primary.kind === "missing" && backup.kind === "missing") return ok(null);

		const cause = primary.kind === "corrupt" ? primary.error : undefined;
		return err(new StorageError(`Cannot load ${this.filePath}`, { filePath: this.filePath, cause }));
	}

	/** Writes are serialized; each resolves after its rename has completed. */
	save(document: unknown): Promise<Result<void, StorageError>> {
		const content = `${JSON.stringify(document, null, 2)}\n`;
		const next = this.writeQueue.then(() => this.writeOnce(content));
		this.writeQueue = next;
		return next;
	}

	private async writeOnce(content: string): Promise<Result<void, StorageError>> {
		const tmpPath = `${this.filePath}.tmp`;
		try {
			await mkdir(dirname(this.filePath), { recursive: true });
			await writeFile(tmpPath, content, "utf-8");
			try {
				await copyFile(this.filePath, this.backupPath);
			} catch (cause: unknown) {
				if (!isNodeError(cause) || cause.code !== "ENOENT") throw cause;
			}
			await rename(tmpPath, this.filePath);
			return ok(undefined);
		} catch (cause: unknown) {
			const code = isNodeError(cause) ? cause.code : "UNKNOWN";
			this.logger.error({ filePath: this.filePath, code }, "document write failed");
			return err(new StorageError(`Cannot write ${this.filePath}`, { filePath: this.filePath, code, cause }));
		}
	}
}

async function readDocument(path: string): Promise<ReadOutcome> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (cause: unknown) {
		if (isNodeError(cause) && cause.code === "ENOENT") return { kind: "missing" };
		return { kind: "corrupt", error: cause instanceof Error ? cause : new Error(String(cause)) };
	}
	try {
		const document: unknown = JSON.parse(content);
		return { kind: "parsed", document };
	} catch (cause: unknown) {
		return { kind: "corrupt", error: cause instanceof Error ? cause : new Error(String(cause)) };
	}
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}

/** In-memory store for tests; can be told to fail writes. */
export class MemoryDocumentStore implements DocumentStore {
	private stored: StoredDocument;
	private failWrites = false;
	private _saves = 0;

	constructor(initial?: unknown) {
		this.stored = initial === undefined ? null : { document: structuredClone(initial) };
	}

	async load(): Promise<Result<StoredDocument, StorageError>> {
		return ok(this.stored === null ? null : { document: structuredClone(this.stored.document) });
	}

	async save(document: unknown): Promise<Result<void, StorageError>> {
		if (this.failWrites) {
			return err(new StorageError("Memory store is failing writes"));
		}
		this._saves++;
		this.stored = { document: JSON.parse(JSON.stringify(document)) };
		return ok(undefined);
	}

	/** Make subsequent saves fail until called again with `false`. */
	setFailWrites(fail: boolean): void {
		this.failWrites = fail;
	}

	/** Last saved document, or null. */
	peek(): unknown {
		return this.stored?.document ?? null;
	}

	get saves(): number {
		return this._saves;
	}
}
