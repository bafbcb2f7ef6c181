/**
 * JSONL journal of detected trades, correlations, fetch
 * failures and rule changes.
 *
 * Appends one JSON object per line. Writes are serialized; when
 * `maxFileSizeBytes` is set the file rotates to `<path>.1` … `<path>.N`.
 * `restore()` reports corrupt lines instead of dropping them.
 */

import { appendFile, mkdir, readFile, rename, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { type Logger, defaultLogger } from "../lib/logger/index.js";
import { StorageError } from "../shared/errors.js";
import {
	type CorrelationEntry,
	type Journal,
	type JournalEntry,
	correlationEntrySchema,
} from "./journal.js";

export interface FileJournalConfig {
	readonly filePath: string;
	readonly maxFileSizeBytes?: number | undefined;
	/** Rotated files kept; defaults to 5 when rotation is on. */
	readonly maxFiles?: number | undefined;
	readonly logger?: Logger | undefined;
}

/** A line in the JSONL file that could not be parsed as JSON. */
export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
}

export interface RestoreResult {
	readonly entries: readonly unknown[];
	readonly corruptLines: readonly CorruptLine[];
}

const MAX_WRITE_ERRORS = 10;

export class FileJournal implements Journal {
	private readonly config: FileJournalConfig;
	private readonly logger: Logger;
	private closed = false;
	private writeQueue: Promise<void> = Promise.resolve();
	private readonly recentWriteErrors: StorageError[] = [];

	private constructor(config: FileJournalConfig) {
		this.config = config;
		this.logger = config.logger ?? defaultLogger({ component: "journal" });
	}

	static create(config: FileJournalConfig): FileJournal {
		return new FileJournal(config);
	}

	private get filePath(): string {
		return this.config.filePath;
	}

	private get maxFiles(): number {
		if (this.config.maxFiles !== undefined) return this.config.maxFiles;
		return this.config.maxFileSizeBytes !== undefined ? 5 : 0;
	}

	/** @throws StorageError when the append fails or the journal is closed */
	async record(entry: JournalEntry): Promise<void> {
		if (this.closed) {
			throw new StorageError("Journal is closed", { filePath: this.filePath });
		}
		const line = `${JSON.stringify(entry)}\n`;
		// A failed write must not block the ones queued after it.
		const next = this.writeQueue.catch(() => undefined).then(() => this.writeOnce(line));
		this.writeQueue = next;
		await next;
	}

	async restore(): Promise<RestoreResult> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (cause: unknown) {
			if (isNodeError(cause) && cause.code === "ENOENT") {
				return { entries: [], corruptLines: [] };
			}
			throw new StorageError(`Cannot read ${this.filePath}`, { filePath: this.filePath, cause });
		}

		const entries: unknown[] = [];
		const corruptLines: CorruptLine[] = [];
		const lines = content.split("\n");
		for (let i = 0; i < lines.length; i++) {
			const trimmed = lines[i]?.trim() ?? "";
			if (trimmed.length === 0) continue;
			try {
				const parsed: unknown = JSON.parse(trimmed);
				entries.push(parsed);
			} catch {
				corruptLines.push({ lineNumber: i + 1, raw: trimmed.slice(0, 200) });
			}
		}
		if (corruptLines.length > 0) {
			this.logger.warn(
				{ filePath: this.filePath, corrupt: corruptLines.length },
				"journal has corrupt lines",
			);
		}
		return { entries, corruptLines };
	}

	/** Correlations emitted at or after `sinceMs`, oldest first. Current file only. */
	async recentCorrelations(sinceMs: number): Promise<CorrelationEntry[]> {
		const { entries } = await this.restore();
		const correlations: CorrelationEntry[] = [];
		for (const entry of entries) {
			const parsed = correlationEntrySchema.safeParse(entry);
			if (parsed.success && parsed.data.timestamp >= sinceMs) {
				correlations.push(parsed.data);
			}
		}
		return correlations;
	}

	/** Drains pending writes, then rejects further records. */
	async close(): Promise<void> {
		this.closed = true;
		await this.flush();
	}

	async flush(): Promise<void> {
		await this.writeQueue.catch(() => undefined);
	}

	/** The last few write failures, oldest first. */
	writeErrors(): readonly StorageError[] {
		return this.recentWriteErrors;
	}

	private async writeOnce(line: string): Promise<void> {
		try {
			await mkdir(dirname(this.filePath), { recursive: true });
			if (this.config.maxFileSizeBytes !== undefined && this.config.maxFileSizeBytes > 0) {
				await this.rotateIfNeeded(this.config.maxFileSizeBytes);
			}
			await appendFile(this.filePath, line, "utf-8");
		} catch (cause: unknown) {
			const code = isNodeError(cause) ? cause.code : "UNKNOWN";
			const error = new StorageError(`Journal write to ${this.filePath} failed [${code}]`, {
				filePath: this.filePath,
				code,
				cause,
			});
			this.recentWriteErrors.push(error);
			if (this.recentWriteErrors.length > MAX_WRITE_ERRORS) this.recentWriteErrors.shift();
			this.logger.error({ filePath: this.filePath, code }, "journal write failed");
			throw error;
		}
	}

	private async rotateIfNeeded(maxSize: number): Promise<void> {
		try {
			const stats = await stat(this.filePath);
			if (stats.size < maxSize) return;
		} catch (cause: unknown) {
			if (isNodeError(cause) && cause.code === "ENOENT") return;
			throw cause;
		}
		await this.rotate();
	}

	private async rotate(): Promise<void> {
		for (let i = this.maxFiles - 1; i >= 1; i--) {
			await renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
		}
		await renameIfExists(this.filePath, `${this.filePath}.1`);
		this.logger.info({ filePath: this.filePath }, "journal rotated");
	}
}

async function renameIfExists(src: string, dst: string): Promise<void> {
	try {
		await rename(src, dst);
	} catch (cause: unknown) {
		if (!isNodeError(cause) || cause.code !== "ENOENT") throw cause;
	}
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}
