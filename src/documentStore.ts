import * as fs from 'fs';
import * as path from 'path';
import { ConsistencyError } from './errors';
import { FileLock, FileLockOptions, withFileLock } from './fileLock';

/**
 * Persistent single-document store. Every operation re-reads; callers never
 * hold on to loaded data across operations.
 */
export interface DocumentStore<T> {
	/** Human-readable location, used in messages */
	readonly location: string;
	load(): T;
	save(data: T): void;
	/** Run a read-modify-write cycle with the store's exclusive lock held. */
	withLock<R>(fn: () => Promise<R> | R): Promise<R>;
}

/** How a document is read from and written to its JSON form. */
export interface DocumentCodec<T> {
	empty(): T;
	/** Parse untrusted JSON. Each codec decides whether a malformed entry is dropped or fatal. */
	parse(raw: unknown, location: string): T;
	/** Value written to disk, e.g. with empty entries pruned. */
	serialize(data: T): unknown;
}

/** Name-keyed map without a prototype, so every name is an ordinary key. */
export function createRecord<V>(): Record<string, V> {
	return Object.create(null);
}

/** Own entry of a name-keyed map; inherited members never count. */
export function ownEntry<V>(record: Readonly<Record<string, V>>, key: string): V | undefined {
	return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

export function encodeDocument<T>(codec: DocumentCodec<T>, data: T): string {
	return JSON.stringify(codec.serialize(data), null, 2) + '\n';
}

export function decodeDocument<T>(codec: DocumentCodec<T>, text: string, location: string): T {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch {
		throw new ConsistencyError(
			`Metadata file is not valid JSON: ${location}`,
			'Fix or move the file aside by hand; it is never overwritten automatically.'
		);
	}
	return codec.parse(parsed, location);
}

/**
 * JSON file store. Writes go to a temp file in the same directory and are
 * renamed over the target, so the file is always either the old or the new
 * document.
 */
export class FileDocumentStore<T> implements DocumentStore<T> {
	private readonly lock: FileLock;

	constructor(
		private readonly filePath: string,
		private readonly codec: DocumentCodec<T>,
		lockOptions: FileLockOptions
	) {
		this.lock = new FileLock(`${filePath}.lock`, lockOptions);
	}

	get location(): string {
		return this.filePath;
	}

	load(): T {
		let text: string;
		try {
			text = fs.readFileSync(this.filePath, 'utf-8');
		} catch (err) {
			if (err !== null && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
				return this.codec.empty();
			}
			throw err;
		}
		if (text.trim().length === 0) {
			return this.codec.empty();
		}
		return decodeDocument(this.codec, text, this.filePath);
	}

	save(data: T): void {
		const dir = path.dirname(this.filePath);
		fs.mkdirSync(dir, { recursive: true });
		const tempPath = `${this.filePath}.${process.pid}.tmp`;
		try {
			fs.writeFileSync(tempPath, encodeDocument(this.codec, data), 'utf-8');
			fs.renameSync(tempPath, this.filePath);
		} catch (err) {
			fs.rmSync(tempPath, { force: true });
			throw err;
		}
	}

	withLock<R>(fn: () => Promise<R> | R): Promise<R> {
		return withFileLock(this.lock, fn);
	}
}

/**
 * In-memory store with the same round-trip semantics as the file store: data
 * is kept in encoded form, so loads never share objects with earlier saves.
 */
export class MemoryDocumentStore<T> implements DocumentStore<T> {
	readonly location: string;
	private text: string | undefined;
	private lockDepth = 0;
	/** Number of completed save() calls */
	saveCount = 0;
	/** When set, the next save() throws it (then clears). */
	failNextSave: Error | undefined;

	constructor(private readonly codec: DocumentCodec<T>, location = 'memory', initial?: T) {
		this.location = location;
		if (initial !== undefined) {
			this.text = encodeDocument(codec, initial);
		}
	}

	get locked(): boolean {
		return this.lockDepth > 0;
	}

	/** Encoded document as it would sit on disk, or undefined if never written. */
	get raw(): string | undefined {
		return this.text;
	}

	/** Replace the encoded document, as a hand edit of the file would. */
	set raw(text: string | undefined) {
		this.text = text;
	}

	load(): T {
		if (this.text === undefined) {
			return this.codec.empty();
		}
		return decodeDocument(this.codec, this.text, this.location);
	}

	save(data: T): void {
		if (this.failNextSave) {
			const failure = this.failNextSave;
			this.failNextSave = undefined;
			throw failure;
		}
		this.text = encodeDocument(this.codec, data);
		this.saveCount++;
	}

	async withLock<R>(fn: () => Promise<R> | R): Promise<R> {
		this.lockDepth++;
		try {
			return await fn();
		} finally {
			this.lockDepth--;
		}
	}
}
