import * as path from 'path';
import { DocumentCodec, DocumentStore, FileDocumentStore, createRecord } from './documentStore';
import { ConsistencyError } from './errors';
import { FileLockOptions } from './fileLock';

/** Which files went onto the shelf, by the state they were in */
export interface FileCategories {
	unstaged_changes: string[];
	staged_additions: string[];
	untracked: string[];
	deleted_files: string[];
}

/** Marks records shelved by a branch promotion that has not finished yet. */
export interface PromotionMarker {
	target: string;
	branch: string;
	started_at: string;
}

/** Metadata for a single shelved changelist */
export interface ShelvedRecord {
	/** git stash reference at capture time, e.g. stash@{0}; re-resolved by message before use */
	shelf_ref: string;
	shelf_message: string;
	/** Every member of the changelist, so it comes back whole */
	files: string[];
	timestamp: string;
	source_branch: string;
	file_categories: FileCategories;
	promotion?: PromotionMarker;
}

/** JSON shape of cl-stashes.json: mapping of changelist name → shelved record */
export type ShelvedData = Record<string, ShelvedRecord>;

export const DEFAULT_SHELF_FILE = 'cl-stashes.json';

export function emptyCategories(): FileCategories {
	return { unstaged_changes: [], staged_additions: [], untracked: [], deleted_files: [] };
}

/**
 * Reads cl-stashes.json strictly: a record that does not validate stops the
 * read, since writing the document back would lose it and orphan its stash.
 */
export const shelvedCodec: DocumentCodec<ShelvedData> = {
	empty: () => createRecord<ShelvedRecord>(),

	parse(raw: unknown, location: string): ShelvedData {
		if (!isRecord(raw) || Array.isArray(raw)) {
			throw new ConsistencyError(
				`Shelf file does not contain a JSON object: ${location}`,
				'Fix or move the file aside by hand; shelved changes may still be listed by `git stash list`.'
			);
		}
		const result = createRecord<ShelvedRecord>();
		const unreadable: string[] = [];
		for (const [name, meta] of Object.entries(raw)) {
			if (isShelvedRecord(meta)) {
				result[name] = meta;
			} else {
				unreadable.push(name);
			}
		}
		if (unreadable.length > 0) {
			throw new ConsistencyError(
				`Shelf file has unreadable record(s) for ${unreadable.map(name => `"${name}"`).join(', ')}: ${location}`,
				'Fix those entries by hand; their changes are still listed by `git stash list`.'
			);
		}
		return result;
	},

	serialize: (data: ShelvedData) => data,
};

/** Store for `<git-dir>/cl-stashes.json`. */
export function createStashStore(
	gitDir: string,
	lockOptions: FileLockOptions,
	fileName = DEFAULT_SHELF_FILE
): DocumentStore<ShelvedData> {
	return new FileDocumentStore(path.join(gitDir, fileName), shelvedCodec, lockOptions);
}

/** Get the set of all files across all shelved changelists. */
export function getShelvedFiles(data: Readonly<ShelvedData>): Set<string> {
	const files = new Set<string>();
	for (const meta of Object.values(data)) {
		for (const f of meta.files) {
			files.add(f);
		}
	}
	return files;
}

/** Names of records still carrying a promotion marker, i.e. an interrupted promotion. */
export function findInterruptedPromotion(data: Readonly<ShelvedData>): { marker: PromotionMarker; names: string[] } | null {
	let marker: PromotionMarker | null = null;
	const names: string[] = [];
	for (const [name, meta] of Object.entries(data)) {
		if (meta.promotion) {
			marker = marker ?? meta.promotion;
			names.push(name);
		}
	}
	return marker ? { marker, names } : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null;
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((f: unknown) => typeof f === 'string');
}

/** Type guard for ShelvedRecord validation */
function isShelvedRecord(value: unknown): value is ShelvedRecord {
	if (!isRecord(value)) {
		return false;
	}
	return (
		typeof value.shelf_ref === 'string' &&
		typeof value.shelf_message === 'string' &&
		isStringArray(value.files) &&
		typeof value.timestamp === 'string' &&
		typeof value.source_branch === 'string' &&
		isFileCategories(value.file_categories) &&
		(value.promotion === undefined || isPromotionMarker(value.promotion))
	);
}

/** Type guard for FileCategories validation */
function isFileCategories(value: unknown): value is FileCategories {
	if (!isRecord(value)) {
		return false;
	}
	const requiredArrays = ['unstaged_changes', 'staged_additions', 'untracked', 'deleted_files'];
	return requiredArrays.every(key => isStringArray(value[key]));
}

function isPromotionMarker(value: unknown): value is PromotionMarker {
	return (
		isRecord(value) &&
		typeof value.target === 'string' &&
		typeof value.branch === 'string' &&
		typeof value.started_at === 'string'
	);
}
