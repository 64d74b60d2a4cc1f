import { RawStatusEntry } from './gitUtils';
import { Logger, silentLogger } from './logger';
import { Vcs } from './vcs';

export type StatusClass = 'untracked' | 'added' | 'modified' | 'deleted' | 'unclassified';

export interface StatusEntry {
	/** Storage-relative */
	path: string;
	/** Raw 2-character porcelain code: index column, then worktree column */
	code: string;
	statusClass: StatusClass;
	originalPath?: string;
}

export type StatusMap = Map<string, StatusEntry>;

export interface StatusSnapshot {
	entries: StatusMap;
	/** Entries left out because their code is unclassified and showAll was off */
	suppressed: StatusEntry[];
}

export interface StatusOptions {
	/** Keep unclassified codes (unmerged states and the like) in `entries` */
	showAll?: boolean;
	includeUntracked?: boolean;
}

/** Collapse a 2-character porcelain code into a status class. */
export function classifyStatus(code: string): StatusClass {
	if (code === '??') {
		return 'untracked';
	}
	if (code === ' D' || code === 'D ') {
		return 'deleted';
	}
	if (code.startsWith('A')) {
		return 'added';
	}
	if (/[MTRC]/.test(code)) {
		return 'modified';
	}
	return 'unclassified';
}

/** The worktree column shows a change that is not staged. */
export function hasUnstagedChange(code: string): boolean {
	return code !== '??' && /[MTD]/.test(code.charAt(1));
}

/** Changes exist only in the index; the worktree column is blank. */
export function isIndexOnly(code: string): boolean {
	return code.charAt(1) === ' ' && code.charAt(0) !== ' ';
}

export function buildStatusMap(raw: readonly RawStatusEntry[], options: StatusOptions = {}): StatusSnapshot {
	const entries: StatusMap = new Map();
	const suppressed: StatusEntry[] = [];
	for (const item of raw) {
		const entry: StatusEntry = { path: item.path, code: item.code, statusClass: classifyStatus(item.code) };
		if (item.originalPath !== undefined) {
			entry.originalPath = item.originalPath;
		}
		if (entry.statusClass === 'unclassified' && !options.showAll) {
			suppressed.push(entry);
			continue;
		}
		entries.set(entry.path, entry);
	}
	return { entries, suppressed };
}

/**
 * Read-only view of working-tree state. Asks the VCS fresh on every call;
 * nothing is cached because state can change between any two operations.
 */
export class StatusGateway {
	constructor(private readonly vcs: Vcs, private readonly logger: Logger = silentLogger) {}

	rawStatus(includeUntracked = true): Promise<RawStatusEntry[]> {
		return this.vcs.status(includeUntracked);
	}

	async statusMap(options: StatusOptions = {}): Promise<StatusSnapshot> {
		const raw = await this.rawStatus(options.includeUntracked ?? true);
		const snapshot = buildStatusMap(raw, options);
		this.logger.debug(`status: ${snapshot.entries.size} entries, ${snapshot.suppressed.length} suppressed`);
		return snapshot;
	}

	/** Every entry, unclassified ones included. Used by the shelve and restore logic. */
	async fullStatus(): Promise<StatusMap> {
		const snapshot = await this.statusMap({ showAll: true, includeUntracked: true });
		return snapshot.entries;
	}
}
