import * as path from 'path';
import { Changelists, validateChangelistName } from './changelistStore';
import { ownEntry } from './documentStore';
import { NotFoundError, UserInputError } from './errors';
import { CommitMessage } from './gitUtils';
import { SanitizedPaths, sanitizePath, sanitizePaths, toCallerRelative } from './pathResolver';
import { PromotionMarker, ShelvedData, findInterruptedPromotion, getShelvedFiles } from './stashStore';
import { StatusClass, StatusMap } from './statusGateway';
import { Workspace } from './workspace';

export interface FileStatus {
	/** Storage-relative */
	path: string;
	/** Porcelain code, or null for a clean member */
	code: string | null;
	statusClass: StatusClass | null;
}

export interface ChangelistGroup {
	name: string;
	files: FileStatus[];
}

export interface ShelvedSummary {
	name: string;
	files: string[];
	sourceBranch: string;
	timestamp: string;
	promotion?: PromotionMarker;
}

export interface GroupedStatus {
	changelists: ChangelistGroup[];
	/** Changed paths that belong to no changelist, active or shelved */
	unassigned: FileStatus[];
	shelved: ShelvedSummary[];
	/** Entries hidden because their status code is unclassified */
	suppressed: number;
	interruptedPromotion: { marker: PromotionMarker; names: string[] } | null;
}

export interface StatusFilter {
	/** Only these changelists (active or shelved) */
	names?: readonly string[];
	includeUnassigned?: boolean;
	/** Overrides the configured default */
	showAll?: boolean;
}

export interface AssignResult {
	added: string[];
	/** path → changelist it was taken from */
	moved: Map<string, string>;
}

export interface WorkingTreeActionOptions {
	/** Delete the changelist once the action succeeds */
	deleteAfter?: boolean;
}

export interface CommitOptions {
	message: CommitMessage;
	/** Keep the committed files in the changelist */
	keep?: boolean;
}

export type ChangelistLocation = { name: string; state: 'active' | 'shelved' };

/**
 * CRUD over the active changelist store plus the working-tree actions on a
 * changelist. Every mutation is one locked read-modify-write: it either
 * persists completely or not at all.
 */
export class ChangelistEngine {
	constructor(private readonly ws: Workspace) {}

	async assign(name: string, userPaths: readonly string[]): Promise<AssignResult> {
		const nameError = validateChangelistName(name);
		if (nameError) {
			throw new UserInputError(nameError);
		}
		const paths = this.resolvePaths(userPaths);
		if (paths.accepted.length === 0) {
			throw new UserInputError('No files to add');
		}
		for (const missing of paths.missing) {
			this.ws.logger.warn(`${this.display(missing)} does not exist; adding it anyway`);
		}

		return this.ws.changelists.withLock(() => {
			const shelved = this.ws.shelves.load();
			if (ownEntry(shelved, name)) {
				throw new UserInputError(
					`Changelist "${name}" is shelved`,
					`Restore it with \`git changelist unstash ${name}\` before adding files.`
				);
			}
			const shelvedFiles = getShelvedFiles(shelved);
			const taken = paths.accepted.filter(p => shelvedFiles.has(p));
			if (taken.length > 0) {
				throw new UserInputError(
					`File(s) belong to a shelved changelist: ${taken.map(p => this.display(p)).join(', ')}`,
					'Restore that changelist first.'
				);
			}

			const changelists = new Changelists(this.ws.changelists.load());
			const moved = changelists.addFiles(name, paths.accepted);
			this.ws.changelists.save(changelists.toData());
			for (const [file, from] of moved) {
				this.ws.logger.info(`Moved ${this.display(file)} from "${from}" to "${name}"`);
			}
			return { added: paths.accepted, moved };
		});
	}

	/**
	 * Take paths out of their changelist. With `fromName`, only that
	 * changelist is touched. Returns the paths actually removed.
	 */
	async unassign(userPaths: readonly string[], fromName?: string): Promise<string[]> {
		const paths = this.resolvePaths(userPaths);
		return this.ws.changelists.withLock(() => {
			const changelists = new Changelists(this.ws.changelists.load());
			const removed: string[] = [];
			if (fromName !== undefined) {
				if (!changelists.has(fromName)) {
					throw new NotFoundError(`Changelist "${fromName}" not found`);
				}
				removed.push(...changelists.removeFiles(fromName, paths.accepted));
			} else {
				for (const p of paths.accepted) {
					const owner = changelists.findChangelist(p);
					if (owner !== null) {
						removed.push(...changelists.removeFiles(owner, [p]));
					}
				}
			}
			const removedSet = new Set(removed);
			for (const p of paths.accepted) {
				if (!removedSet.has(p)) {
					this.ws.logger.warn(`${this.display(p)} is not in ${fromName !== undefined ? `"${fromName}"` : 'any changelist'}`);
				}
			}
			if (removed.length > 0) {
				this.ws.changelists.save(changelists.toData());
			}
			return removed;
		});
	}

	/** Delete changelists by name. Nothing is deleted unless every name exists. */
	delete(names: readonly string[]): Promise<string[]> {
		return this.ws.changelists.withLock(() => {
			const changelists = new Changelists(this.ws.changelists.load());
			const missing = names.filter(n => !changelists.has(n));
			if (missing.length > 0) {
				throw new NotFoundError(`Changelist(s) not found: ${missing.join(', ')}`);
			}
			const unique = [...new Set(names)];
			for (const n of unique) {
				changelists.deleteChangelist(n);
			}
			this.ws.changelists.save(changelists.toData());
			return unique;
		});
	}

	deleteAll(): Promise<string[]> {
		return this.ws.changelists.withLock(() => {
			const changelists = new Changelists(this.ws.changelists.load());
			const names = changelists.getNames();
			changelists.deleteAll();
			this.ws.changelists.save(changelists.toData());
			return names;
		});
	}

	/** Partition current status by changelist membership. Read-only. */
	async groupedStatus(filter: StatusFilter = {}): Promise<GroupedStatus> {
		const changelists = new Changelists(this.ws.changelists.load());
		const shelved = this.ws.shelves.load();
		const snapshot = await this.ws.status.statusMap({ showAll: filter.showAll ?? this.ws.config.showAll });

		const wanted = filter.names ? new Set(filter.names) : null;
		if (wanted) {
			const unknown = [...wanted].filter(n => !changelists.has(n) && !ownEntry(shelved, n));
			if (unknown.length > 0) {
				throw new NotFoundError(`Changelist(s) not found: ${unknown.join(', ')}`);
			}
		}

		const suppressedPaths = new Set(snapshot.suppressed.map(entry => entry.path));
		const groups: ChangelistGroup[] = [];
		for (const name of changelists.getNames()) {
			if (wanted && !wanted.has(name)) {
				continue;
			}
			const files: FileStatus[] = [];
			for (const p of changelists.getFiles(name)) {
				if (suppressedPaths.has(p)) {
					continue;
				}
				files.push(fileStatus(p, snapshot.entries));
			}
			groups.push({ name, files });
		}

		const unassigned: FileStatus[] = [];
		if (filter.includeUnassigned ?? true) {
			const assigned = changelists.assignedFiles();
			const shelvedFiles = getShelvedFiles(shelved);
			for (const entry of snapshot.entries.values()) {
				if (!assigned.has(entry.path) && !shelvedFiles.has(entry.path)) {
					unassigned.push({ path: entry.path, code: entry.code, statusClass: entry.statusClass });
				}
			}
		}

		return {
			changelists: groups,
			unassigned,
			shelved: summarizeShelved(shelved, wanted),
			suppressed: snapshot.suppressed.length,
			interruptedPromotion: findInterruptedPromotion(shelved),
		};
	}

	/** Stage the changed tracked members of a changelist. Untracked members are skipped. */
	async stage(name: string, options: WorkingTreeActionOptions = {}): Promise<string[]> {
		const status = await this.ws.status.fullStatus();
		const targets = this.members(name).filter(p => {
			const code = status.get(p)?.code;
			return code !== undefined && code !== '??';
		});
		if (targets.length > 0) {
			await this.ws.vcs.add(targets);
		}
		await this.finish(name, options);
		return targets;
	}

	/** Unstage members that have index changes. */
	async unstage(name: string, options: WorkingTreeActionOptions = {}): Promise<string[]> {
		const status = await this.ws.status.fullStatus();
		const targets = this.members(name).filter(p => {
			const code = status.get(p)?.code;
			return code !== undefined && code !== '??' && code.charAt(0) !== ' ';
		});
		if (targets.length > 0) {
			await this.ws.vcs.reset(targets);
		}
		await this.finish(name, options);
		return targets;
	}

	/**
	 * Commit the changed tracked members. Committed files leave the
	 * changelist unless `keep` is set; an emptied changelist is pruned.
	 */
	async commit(name: string, options: CommitOptions): Promise<string[]> {
		const status = await this.ws.status.fullStatus();
		const targets = this.members(name).filter(p => {
			const code = status.get(p)?.code;
			return code !== undefined && code !== '??';
		});
		if (targets.length === 0) {
			this.ws.logger.info(`No tracked files with changes in "${name}"; nothing committed`);
			return [];
		}

		const message: CommitMessage = 'messageFile' in options.message
			? { messageFile: path.resolve(this.ws.cwd, options.message.messageFile) }
			: options.message;
		await this.ws.vcs.commit(targets, message);

		if (!options.keep) {
			await this.ws.changelists.withLock(() => {
				const changelists = new Changelists(this.ws.changelists.load());
				changelists.removeFiles(name, targets);
				this.ws.changelists.save(changelists.toData());
			});
		}
		return targets;
	}

	/** Combined diff over the members of the named changelists. */
	async diff(names: readonly string[], options: { staged?: boolean } = {}): Promise<string> {
		const files: string[] = [];
		for (const name of names) {
			files.push(...this.members(name));
		}
		if (files.length === 0) {
			return '';
		}
		return this.ws.vcs.diff([...new Set(files)], { staged: options.staged });
	}

	/**
	 * Revert members to HEAD, index and worktree. Untracked and newly added
	 * files have nothing in HEAD and are left alone.
	 */
	async checkout(names: readonly string[], options: WorkingTreeActionOptions = {}): Promise<string[]> {
		const status = await this.ws.status.fullStatus();
		const targets: string[] = [];
		for (const name of names) {
			for (const p of this.members(name)) {
				const code = status.get(p)?.code;
				if (code !== undefined && code !== '??' && code.charAt(0) !== 'A') {
					targets.push(p);
				}
			}
		}
		if (targets.length > 0) {
			await this.ws.vcs.revert(targets);
		}
		if (options.deleteAfter) {
			await this.delete(names);
		}
		return targets;
	}

	/** Which changelist, active or shelved, holds a path. */
	findChangelist(userPath: string): ChangelistLocation | null {
		const resolution = sanitizePath(userPath, this.ws.repoRoot, { cwd: this.ws.cwd, exists: () => true });
		if (!resolution.ok) {
			throw new UserInputError(resolution.message);
		}
		const active = new Changelists(this.ws.changelists.load()).findChangelist(resolution.path);
		if (active !== null) {
			return { name: active, state: 'active' };
		}
		for (const [name, record] of Object.entries(this.ws.shelves.load())) {
			if (record.files.includes(resolution.path)) {
				return { name, state: 'shelved' };
			}
		}
		return null;
	}

	/** Storage path → caller-relative display form. */
	display(storagePath: string): string {
		return toCallerRelative(storagePath, this.ws.cwd, this.ws.repoRoot);
	}

	private members(name: string): string[] {
		const changelists = new Changelists(this.ws.changelists.load());
		if (!changelists.has(name)) {
			throw new NotFoundError(`Changelist "${name}" not found`, 'Run `git changelist status` to list changelists.');
		}
		return [...changelists.getFiles(name)];
	}

	private async finish(name: string, options: WorkingTreeActionOptions): Promise<void> {
		if (options.deleteAfter) {
			await this.delete([name]);
		}
	}

	/** Validate user paths; any rejection fails the whole call. */
	private resolvePaths(userPaths: readonly string[]): SanitizedPaths {
		const { repoRoot } = this.ws;
		const result = sanitizePaths(userPaths, repoRoot, {
			cwd: this.ws.cwd,
			exists: absolute => this.ws.fileExists(path.relative(repoRoot, absolute).split(path.sep).join('/')),
		});
		if (result.rejected.length > 0) {
			throw new UserInputError(result.rejected.map(r => r.message).join('\n'));
		}
		return result;
	}
}

function fileStatus(filePath: string, entries: StatusMap): FileStatus {
	const entry = entries.get(filePath);
	return entry
		? { path: filePath, code: entry.code, statusClass: entry.statusClass }
		: { path: filePath, code: null, statusClass: null };
}

function summarizeShelved(shelved: ShelvedData, wanted: Set<string> | null): ShelvedSummary[] {
	const summaries: ShelvedSummary[] = [];
	for (const [name, record] of Object.entries(shelved)) {
		if (wanted && !wanted.has(name)) {
			continue;
		}
		const summary: ShelvedSummary = {
			name,
			files: [...record.files],
			sourceBranch: record.source_branch,
			timestamp: record.timestamp,
		};
		if (record.promotion) {
			summary.promotion = record.promotion;
		}
		summaries.push(summary);
	}
	return summaries;
}
