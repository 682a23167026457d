/**
 * FileJournal -- JSONL journal for audit records.
 *
 * One JSON object per line. Writes are serialised through a promise chain so
 * concurrent callers never interleave partial lines, and the file is rotated
 * by size when `maxFileSizeBytes` is set (`audit.jsonl` → `audit.jsonl.1` …).
 *
 * `restore()` validates every line against the configured schema: lines that
 * are not JSON, or not a record, come back in `corruptLines` with a reason.
 */

import { appendFile, readFile, rename, stat } from "node:fs/promises";
import { validate } from "../lib/validation/index.js";
import type { z } from "../lib/validation/index.js";
import { StoreUnavailableError, errorMessage } from "../shared/errors.js";
import type { Journal } from "./journal.js";

const KEPT_WRITE_ERRORS = 10;
const RAW_PREVIEW_CHARS = 200;

export interface FileJournalConfig<T> {
	readonly filePath: string;
	/** Shape of one record, checked on restore. */
	readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
	readonly maxFileSizeBytes?: number;
	/** Rotated files kept beside the live one. Default: 5 when rotating. */
	readonly maxFiles?: number;
}

export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
	readonly reason: "invalid_json" | "invalid_record";
}

export interface RestoreResult<T> {
	readonly entries: readonly T[];
	readonly corruptLines: readonly CorruptLine[];
}

export class FileJournal<T> implements Journal<T> {
	private readonly filePath: string;
	private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
	private readonly maxFileSizeBytes: number;
	private readonly maxFiles: number;
	private tail: Promise<void> = Promise.resolve();
	private closed = false;
	private readonly recentErrors: StoreUnavailableError[] = [];

	private constructor(config: FileJournalConfig<T>) {
		this.filePath = config.filePath;
		this.schema = config.schema;
		this.maxFileSizeBytes = config.maxFileSizeBytes ?? 0;
		this.maxFiles = config.maxFiles ?? (this.maxFileSizeBytes > 0 ? 5 : 0);
	}

	static create<T>(config: FileJournalConfig<T>): FileJournal<T> {
		return new FileJournal(config);
	}

	async record(entry: T): Promise<void> {
		if (this.closed) throw new Error("FileJournal is closed");
		const line = `${JSON.stringify(entry)}\n`;
		// each write waits for the previous one, failed or not
		const write = this.tail.then(
			() => this.append(line),
			() => this.append(line),
		);
		this.tail = write;
		await write;
	}

	async restore(): Promise<RestoreResult<T>> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (e) {
			if (errnoCode(e) === "ENOENT") return { entries: [], corruptLines: [] };
			throw e;
		}

		const entries: T[] = [];
		const corruptLines: CorruptLine[] = [];
		content.split("\n").forEach((rawLine, index) => {
			const line = rawLine.trim();
			if (line.length === 0) return;
			const lineNumber = index + 1;
			const raw = line.slice(0, RAW_PREVIEW_CHARS);

			let json: unknown;
			try {
				json = JSON.parse(line);
			} catch {
				corruptLines.push({ lineNumber, raw, reason: "invalid_json" });
				return;
			}
			const parsed = validate(this.schema, json);
			if (parsed.ok) {
				entries.push(parsed.value);
			} else {
				corruptLines.push({ lineNumber, raw, reason: "invalid_record" });
			}
		});
		return { entries, corruptLines };
	}

	/** Refuse further writes once the queued ones have settled. */
	async close(): Promise<void> {
		this.closed = true;
		await this.settle();
	}

	/** Resolves once queued writes settle; their failures are in `writeErrors()`. */
	async flush(): Promise<void> {
		await this.settle();
	}

	/** The most recent write failures, oldest first. */
	writeErrors(): readonly StoreUnavailableError[] {
		return [...this.recentErrors];
	}

	private async settle(): Promise<void> {
		try {
			await this.tail;
		} catch (e) {
			if (!(e instanceof StoreUnavailableError)) throw e;
		}
	}

	private async append(line: string): Promise<void> {
		try {
			if (this.maxFileSizeBytes > 0 && (await this.currentSize()) >= this.maxFileSizeBytes) {
				await this.rotate();
			}
			await appendFile(this.filePath, line, "utf-8");
		} catch (e) {
			const code = errnoCode(e) ?? "UNKNOWN";
			const error = new StoreUnavailableError(
				`FileJournal write to ${this.filePath} failed: [${code}] ${errorMessage(e)}`,
				{ filePath: this.filePath, code, cause: e },
			);
			this.recentErrors.push(error);
			if (this.recentErrors.length > KEPT_WRITE_ERRORS) this.recentErrors.shift();
			throw error;
		}
	}

	private async currentSize(): Promise<number> {
		try {
			return (await stat(this.filePath)).size;
		} catch (e) {
			if (errnoCode(e) === "ENOENT") return 0;
			throw e;
		}
	}

	/** Shift `.1 … .n-1` up by one, then move the live file to `.1`. */
	private async rotate(): Promise<void> {
		for (let i = this.maxFiles - 1; i >= 1; i--) {
			await renameIfPresent(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
		}
		await renameIfPresent(this.filePath, `${this.filePath}.1`);
	}
}

async function renameIfPresent(from: string, to: string): Promise<void> {
	try {
		await rename(from, to);
	} catch (e) {
		if (errnoCode(e) !== "ENOENT") throw e;
	}
}

function errnoCode(e: unknown): string | undefined {
	if (!(e instanceof Error) || !("code" in e)) return undefined;
	return typeof e.code === "string" ? e.code : undefined;
}
