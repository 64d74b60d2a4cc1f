import { StatusEntry, StatusMap, hasUnstagedChange, isIndexOnly } from './statusGateway';
import { ShelvedRecord } from './stashStore';

/**
 * - ideal: the path is gone, the pop recreates it
 * - safe: clean or index-only, the pop applies on top
 * - blocking: the pop would fail or clobber work
 */
export type RestoreClass = 'ideal' | 'safe' | 'blocking';

export type BlockingReason = 'untracked-present' | 'worktree-changes' | 'unmerged';

export interface RestoreVerdict {
	restoreClass: RestoreClass;
	reason?: BlockingReason;
}

export interface ConflictReport {
	ideal: string[];
	safe: string[];
	blocking: string[];
	/** One actionable line per blocking path */
	suggestions: string[];
}

function isUnmerged(code: string): boolean {
	return code.includes('U') || code === 'DD' || code === 'AA';
}

/** Classify one shelved path against its current working-tree state. */
export function classifyRestoreTarget(entry: StatusEntry | undefined, existsOnDisk: boolean): RestoreVerdict {
	if (!entry) {
		return { restoreClass: existsOnDisk ? 'safe' : 'ideal' };
	}
	const code = entry.code;
	if (code === '??') {
		return { restoreClass: 'blocking', reason: 'untracked-present' };
	}
	if (isUnmerged(code)) {
		return { restoreClass: 'blocking', reason: 'unmerged' };
	}
	if (isIndexOnly(code)) {
		return { restoreClass: 'safe' };
	}
	if (hasUnstagedChange(code)) {
		return { restoreClass: 'blocking', reason: 'worktree-changes' };
	}
	return { restoreClass: 'blocking', reason: 'unmerged' };
}

export function suggestionFor(reason: BlockingReason, filePath: string): string {
	switch (reason) {
		case 'untracked-present':
			return `Remove or rename the untracked file ${filePath}`;
		case 'worktree-changes':
			return `Commit, shelve or discard the working-directory changes to ${filePath}`;
		case 'unmerged':
			return `Resolve the merge conflict in ${filePath} first`;
	}
}

/**
 * Pre-flight for popping a shelf. Only paths the shelf actually holds can
 * clash with the pop; members that stayed in place are reported as safe.
 */
export function checkConflicts(
	record: Pick<ShelvedRecord, 'files' | 'file_categories'>,
	currentStatus: StatusMap,
	fileExists: (storagePath: string) => boolean
): ConflictReport {
	const categories = record.file_categories;
	const pushed = new Set([
		...categories.unstaged_changes,
		...categories.staged_additions,
		...categories.untracked,
		...categories.deleted_files,
	]);
	const report: ConflictReport = { ideal: [], safe: [], blocking: [], suggestions: [] };
	for (const filePath of record.files) {
		if (!pushed.has(filePath)) {
			report.safe.push(filePath);
			continue;
		}
		const verdict = classifyRestoreTarget(currentStatus.get(filePath), fileExists(filePath));
		report[verdict.restoreClass].push(filePath);
		if (verdict.reason) {
			report.suggestions.push(suggestionFor(verdict.reason, filePath));
		}
	}
	return report;
}
