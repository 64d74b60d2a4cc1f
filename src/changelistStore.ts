import * as path from 'path';
import { DocumentCodec, DocumentStore, FileDocumentStore, createRecord, ownEntry } from './documentStore';
import { ConsistencyError } from './errors';
import { FileLockOptions } from './fileLock';

/** JSON shape of cl.json: mapping of changelist name → storage-relative file paths */
export type ChangelistData = Record<string, string[]>;

export const DEFAULT_CHANGELIST_FILE = 'cl.json';

/** Reserved git ref names that cannot be used as changelist names */
const GIT_RESERVED_WORDS = new Set([
	'HEAD', 'FETCH_HEAD', 'ORIG_HEAD', 'MERGE_HEAD',
	'CHERRY_PICK_HEAD', 'REVERT_HEAD', 'BISECT_HEAD',
	'stash', 'refs', 'objects', 'packed-refs',
]);

/** Pattern for valid changelist names: alphanumeric, hyphens, underscores, dots */
const VALID_NAME_RE = /^[a-zA-Z0-9._-]+$/;

const MAX_NAME_LENGTH = 100;

/**
 * Validate a changelist name.
 * Returns null if valid, or an error message string if invalid.
 */
export function validateChangelistName(name: string): string | null {
	if (!name || name.length === 0) {
		return 'Changelist name cannot be empty';
	}
	if (name.length > MAX_NAME_LENGTH) {
		return `Changelist name must be at most ${MAX_NAME_LENGTH} characters`;
	}
	if (!VALID_NAME_RE.test(name)) {
		return 'Changelist name may only contain alphanumeric characters, hyphens, underscores, and dots';
	}
	if (/^\.+$/.test(name)) {
		return 'Changelist name cannot consist of only dots';
	}
	if (GIT_RESERVED_WORDS.has(name)) {
		return `"${name}" is a reserved git name and cannot be used as a changelist name`;
	}
	return null;
}

/**
 * Reads cl.json leniently: entries that are not string arrays are dropped,
 * and a path listed twice keeps only its first owner.
 */
export const changelistCodec: DocumentCodec<ChangelistData> = {
	empty: () => createRecord<string[]>(),

	parse(raw: unknown, location: string): ChangelistData {
		if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
			throw new ConsistencyError(
				`Changelist file does not contain a JSON object: ${location}`,
				'Fix or move the file aside by hand; it is never overwritten automatically.'
			);
		}
		const result = createRecord<string[]>();
		const owned = new Set<string>();
		for (const [name, files] of Object.entries(raw)) {
			if (!Array.isArray(files) || !files.every((f: unknown) => typeof f === 'string')) {
				continue;
			}
			const kept: string[] = [];
			for (const f of files) {
				if (typeof f === 'string' && !owned.has(f)) {
					owned.add(f);
					kept.push(f);
				}
			}
			result[name] = kept;
		}
		return result;
	},

	serialize(data: ChangelistData): ChangelistData {
		const toWrite = createRecord<string[]>();
		for (const [name, files] of Object.entries(data)) {
			if (files.length > 0) {
				toWrite[name] = files;
			}
		}
		return toWrite;
	},
};

/** Store for `<git-dir>/cl.json`. */
export function createChangelistStore(
	gitDir: string,
	lockOptions: FileLockOptions,
	fileName = DEFAULT_CHANGELIST_FILE
): DocumentStore<ChangelistData> {
	return new FileDocumentStore(path.join(gitDir, fileName), changelistCodec, lockOptions);
}

/**
 * Working copy of the changelist mapping. Paths given to it must already be
 * storage-relative; validation of user input happens before this point.
 * Enforces single ownership: a path belongs to at most one changelist.
 */
export class Changelists {
	private data: ChangelistData;

	constructor(data: ChangelistData = {}) {
		this.data = createRecord<string[]>();
		for (const [name, files] of Object.entries(data)) {
			this.data[name] = [...files];
		}
	}

	/** Get all changelists (including empty ones in memory). */
	getAll(): Readonly<ChangelistData> {
		return this.data;
	}

	/** Get files in a specific changelist. Returns empty array if not found. */
	getFiles(name: string): readonly string[] {
		return ownEntry(this.data, name) ?? [];
	}

	/** Get all changelist names. */
	getNames(): string[] {
		return Object.keys(this.data);
	}

	has(name: string): boolean {
		return Object.prototype.hasOwnProperty.call(this.data, name);
	}

	/**
	 * Add files to a changelist, creating it if needed. Files are removed from
	 * any other changelist first.
	 * Returns a map of path → previous owner for files that migrated.
	 */
	addFiles(name: string, files: readonly string[]): Map<string, string> {
		const nameError = validateChangelistName(name);
		if (nameError) {
			throw new Error(nameError);
		}

		const moved = new Map<string, string>();
		const fileSet = new Set(files);
		for (const [clName, clFiles] of Object.entries(this.data)) {
			if (clName === name) {
				continue;
			}
			const remaining = clFiles.filter(f => !fileSet.has(f));
			if (remaining.length !== clFiles.length) {
				for (const f of clFiles) {
					if (fileSet.has(f)) {
						moved.set(f, clName);
					}
				}
				this.data[clName] = remaining;
			}
		}

		const target = ownEntry(this.data, name) ?? [];
		const existing = new Set(target);
		for (const f of files) {
			if (!existing.has(f)) {
				target.push(f);
				existing.add(f);
			}
		}
		this.data[name] = target;
		return moved;
	}

	/** Remove files from a specific changelist. Returns the paths actually removed. */
	removeFiles(name: string, files: readonly string[]): string[] {
		const current = ownEntry(this.data, name);
		if (!current) {
			return [];
		}
		const toRemove = new Set(files);
		this.data[name] = current.filter(f => !toRemove.has(f));
		return current.filter(f => toRemove.has(f));
	}

	/** Delete a changelist entirely. Returns the files that were in it. */
	deleteChangelist(name: string): string[] {
		const files = ownEntry(this.data, name) ?? [];
		delete this.data[name];
		return [...files];
	}

	/** Delete all changelists. */
	deleteAll(): void {
		this.data = createRecord<string[]>();
	}

	/** Find which changelist a file belongs to. Returns null if unassigned. */
	findChangelist(filePath: string): string | null {
		for (const [name, files] of Object.entries(this.data)) {
			if (files.includes(filePath)) {
				return name;
			}
		}
		return null;
	}

	/** Every path in every changelist. */
	assignedFiles(): Set<string> {
		const all = new Set<string>();
		for (const files of Object.values(this.data)) {
			for (const f of files) {
				all.add(f);
			}
		}
		return all;
	}

	toData(): ChangelistData {
		const copy = createRecord<string[]>();
		for (const [name, files] of Object.entries(this.data)) {
			copy[name] = [...files];
		}
		return copy;
	}
}
