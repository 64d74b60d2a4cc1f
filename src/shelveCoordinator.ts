import { Changelists } from './changelistStore';
import { ownEntry } from './documentStore';
import { ConsistencyError, NotFoundError, RestoreBlockedError, UserInputError, errorMessage } from './errors';
import { ConflictReport, checkConflicts } from './restoreConflicts';
import { FileCategories, PromotionMarker, ShelvedRecord, emptyCategories } from './stashStore';
import { StatusMap, hasUnstagedChange } from './statusGateway';
import { Workspace } from './workspace';

export const SHELF_MESSAGE_PREFIX = 'changelist-shelf';

export interface ShelveCategorization {
	/** Paths handed to the shelf push */
	shelvable: string[];
	/** Clean, staged-only or unmerged paths; the push would skip them */
	notShelvable: string[];
	categories: FileCategories;
}

export interface ShelveOptions {
	/** Tag the record as part of a branch promotion */
	promotion?: PromotionMarker;
}

export interface ShelvedEntry {
	name: string;
	record: ShelvedRecord;
}

export interface ShelveAllResult {
	shelved: ShelvedEntry[];
	/** Changelists left active because nothing in them could be shelved */
	skipped: string[];
}

export interface RestoreOptions {
	/** Restore even when the current branch differs from the one it was shelved on */
	ignoreBranch?: boolean;
	/** Skip the branch check and the conflict pre-flight */
	force?: boolean;
}

export interface RestoreResult {
	name: string;
	files: string[];
	/** Absent when the pre-flight was skipped */
	conflicts?: ConflictReport;
}

export interface RestoreFailure {
	name: string;
	reason: string;
}

export interface RestoreAllResult {
	restored: RestoreResult[];
	failed: RestoreFailure[];
}

export function shelfMessage(name: string, timestamp: string): string {
	return `${SHELF_MESSAGE_PREFIX}:${name}:${timestamp}`;
}

/**
 * Split changelist members into what a scoped shelf push takes and what it
 * would silently leave behind. Untracked files count only because they are
 * listed in the changelist.
 */
export function categorizeForShelve(paths: readonly string[], statusMap: StatusMap): ShelveCategorization {
	const result: ShelveCategorization = { shelvable: [], notShelvable: [], categories: emptyCategories() };
	for (const filePath of paths) {
		const code = statusMap.get(filePath)?.code;
		let category: keyof FileCategories | null = null;
		if (code === undefined) {
			category = null;
		} else if (code === '??') {
			category = 'untracked';
		} else if (code.includes('U') || code === 'DD' || code === 'AA') {
			category = null;
		} else if (code.charAt(1) === 'D' || code === 'D ') {
			category = 'deleted_files';
		} else if (code.charAt(0) === 'A') {
			category = 'staged_additions';
		} else if (hasUnstagedChange(code)) {
			category = 'unstaged_changes';
		}

		if (category === null) {
			result.notShelvable.push(filePath);
			continue;
		}
		result.shelvable.push(filePath);
		result.categories[category].push(filePath);
	}
	return result;
}

/**
 * Moves changelists between the active store and the shelf. Both stores are
 * locked (active first) for the whole of each operation, so an observer sees
 * a changelist either active or shelved and never both.
 */
export class ShelveCoordinator {
	constructor(private readonly ws: Workspace) {}

	/** Ref of the shelf entry carrying `message`, or null when it is gone. */
	async findShelfRef(message: string): Promise<string | null> {
		const entries = await this.ws.vcs.stashList();
		const match = entries.find(entry => entry.message === message || entry.message.endsWith(`: ${message}`));
		return match ? match.ref : null;
	}

	/** Categorize a changelist's members against the current working tree. */
	async plan(name: string): Promise<ShelveCategorization> {
		const active = new Changelists(this.ws.changelists.load());
		if (!active.has(name)) {
			throw new NotFoundError(`Changelist "${name}" not found`, 'Run `git changelist status` to list changelists.');
		}
		return categorizeForShelve(active.getFiles(name), await this.ws.status.fullStatus());
	}

	shelveOne(name: string, options: ShelveOptions = {}): Promise<ShelvedRecord> {
		return this.withBothLocks(async () => {
			const { vcs, logger } = this.ws;
			const shelved = this.ws.shelves.load();
			if (ownEntry(shelved, name)) {
				throw new UserInputError(`Changelist "${name}" is already shelved`);
			}
			const active = new Changelists(this.ws.changelists.load());
			if (!active.has(name)) {
				throw new NotFoundError(`Changelist "${name}" not found`, 'Run `git changelist status` to list changelists.');
			}

			const files = [...active.getFiles(name)];
			const plan = categorizeForShelve(files, await this.ws.status.fullStatus());
			if (plan.shelvable.length === 0) {
				throw new UserInputError(
					`Nothing to shelve in changelist "${name}"`,
					'Its files are clean or have only staged changes, which stay in the index.'
				);
			}
			if (plan.notShelvable.length > 0) {
				logger.warn(`Leaving ${plan.notShelvable.length} file(s) of "${name}" in place: ${plan.notShelvable.join(', ')}`);
			}

			const timestamp = this.ws.now().toISOString();
			const message = shelfMessage(name, timestamp);
			logger.debug(`shelving ${plan.shelvable.length} file(s) as "${message}"`);
			await vcs.stashPush(message, plan.shelvable, { includeUntracked: plan.categories.untracked.length > 0 });

			let recordSaved = false;
			try {
				const ref = await this.findShelfRef(message);
				if (ref === null) {
					throw new ConsistencyError(
						`Shelf entry "${message}" was not found right after it was created`,
						'Check `git stash list` for it and pop it by hand.'
					);
				}
				const record: ShelvedRecord = {
					shelf_ref: ref,
					shelf_message: message,
					files,
					timestamp,
					source_branch: (await vcs.currentBranch()) ?? 'HEAD',
					file_categories: plan.categories,
				};
				if (options.promotion) {
					record.promotion = options.promotion;
				}
				shelved[name] = record;
				this.ws.shelves.save(shelved);
				recordSaved = true;

				active.deleteChangelist(name);
				this.ws.changelists.save(active.toData());
				return record;
			} catch (err) {
				await this.undoPush(name, message, recordSaved, err);
				throw err;
			}
		});
	}

	/**
	 * Shelve every active changelist that has something to shelve. On failure
	 * the ones already shelved are restored in reverse order before the
	 * error is rethrown.
	 */
	shelveAll(options: ShelveOptions = {}): Promise<ShelveAllResult> {
		return this.withBothLocks(async () => {
			const names = new Changelists(this.ws.changelists.load()).getNames();
			const result: ShelveAllResult = { shelved: [], skipped: [] };
			for (const name of names) {
				try {
					const plan = await this.plan(name);
					if (plan.shelvable.length === 0) {
						this.ws.logger.debug(`"${name}" has nothing to shelve; leaving it active`);
						result.skipped.push(name);
						continue;
					}
					const record = await this.shelveOne(name, options);
					result.shelved.push({ name, record });
				} catch (err) {
					const unrecovered = await this.rollBack(result.shelved.map(entry => entry.name));
					if (unrecovered.length > 0) {
						throw new ConsistencyError(
							`Shelving "${name}" failed (${errorMessage(err)}) and ${unrecovered.length} changelist(s) could not be restored: ` +
								unrecovered.map(f => `${f.name} (${f.reason})`).join('; '),
							'Restore them with `git changelist unstash <name>` once the cause is fixed.'
						);
					}
					throw err;
				}
			}
			return result;
		});
	}

	restoreOne(name: string, options: RestoreOptions = {}): Promise<RestoreResult> {
		return this.withBothLocks(async () => {
			const { vcs, logger } = this.ws;
			const shelved = this.ws.shelves.load();
			const record = ownEntry(shelved, name);
			if (!record) {
				throw new NotFoundError(`No shelved changelist named "${name}"`, 'Run `git changelist status` to list shelved changelists.');
			}
			const active = new Changelists(this.ws.changelists.load());
			if (active.has(name)) {
				throw new ConsistencyError(
					`Changelist "${name}" is both active and shelved`,
					`Rename or delete the active changelist "${name}", then restore again.`
				);
			}

			if (!options.force && !options.ignoreBranch) {
				const branch = (await vcs.currentBranch()) ?? 'HEAD';
				if (record.source_branch !== 'HEAD' && branch !== record.source_branch) {
					throw new UserInputError(
						`Changelist "${name}" was shelved on branch "${record.source_branch}", but the current branch is "${branch}"`,
						'Switch back to that branch, or pass --force to restore it here.'
					);
				}
			}

			let conflicts: ConflictReport | undefined;
			if (!options.force) {
				conflicts = checkConflicts(record, await this.ws.status.fullStatus(), this.ws.fileExists);
				if (conflicts.blocking.length > 0) {
					throw new RestoreBlockedError(name, conflicts.blocking, conflicts.suggestions);
				}
			}

			const ref = await this.findShelfRef(record.shelf_message);
			if (ref === null) {
				throw new ConsistencyError(
					`Shelf entry for "${name}" is missing: ${record.shelf_message}`,
					`It may have been dropped by hand. Check \`git stash list\`; if it is gone, remove "${name}" from ${this.ws.shelves.location}.`
				);
			}
			logger.debug(`restoring "${name}" from ${ref}`);
			await vcs.stashPop(ref);

			try {
				delete shelved[name];
				this.ws.shelves.save(shelved);
				active.addFiles(name, record.files);
				this.ws.changelists.save(active.toData());
			} catch (err) {
				throw new ConsistencyError(
					`Shelf for "${name}" was applied but the metadata could not be updated: ${errorMessage(err)}`,
					`Check ${this.ws.shelves.location} and ${this.ws.changelists.location}, then re-add the files with \`git changelist add ${name} ...\`.`
				);
			}

			const result: RestoreResult = { name, files: [...record.files] };
			if (conflicts) {
				result.conflicts = conflicts;
			}
			return result;
		});
	}

	/** Restore every shelved changelist, continuing past individual failures. */
	restoreAll(options: RestoreOptions = {}): Promise<RestoreAllResult> {
		return this.withBothLocks(async () => {
			const result: RestoreAllResult = { restored: [], failed: [] };
			for (const name of Object.keys(this.ws.shelves.load())) {
				try {
					result.restored.push(await this.restoreOne(name, options));
				} catch (err) {
					this.ws.logger.debug(`restore of "${name}" failed: ${errorMessage(err)}`);
					result.failed.push({ name, reason: errorMessage(err) });
				}
			}
			return result;
		});
	}

	/**
	 * Restore `names` in reverse order. The conflict pre-flight still runs;
	 * a blocked restore is reported, never dropped. Returns what could not be restored.
	 */
	async rollBack(names: readonly string[]): Promise<RestoreFailure[]> {
		const failures: RestoreFailure[] = [];
		for (const name of [...names].reverse()) {
			try {
				await this.restoreOne(name, { ignoreBranch: true });
				this.ws.logger.debug(`rolled back shelf of "${name}"`);
			} catch (err) {
				failures.push({ name, reason: errorMessage(err) });
			}
		}
		return failures;
	}

	/** Drop promotion markers from every shelved record. */
	clearPromotionMarkers(): Promise<void> {
		return this.ws.shelves.withLock(() => {
			const shelved = this.ws.shelves.load();
			let changed = false;
			for (const record of Object.values(shelved)) {
				if (record.promotion) {
					delete record.promotion;
					changed = true;
				}
			}
			if (changed) {
				this.ws.shelves.save(shelved);
			}
		});
	}

	withBothLocks<T>(fn: () => Promise<T>): Promise<T> {
		return this.ws.changelists.withLock(() => this.ws.shelves.withLock(fn));
	}

	/** Give back a shelf push whose metadata could not be written. */
	private async undoPush(name: string, message: string, recordSaved: boolean, cause: unknown): Promise<void> {
		try {
			if (recordSaved) {
				const shelved = this.ws.shelves.load();
				delete shelved[name];
				this.ws.shelves.save(shelved);
			}
			const ref = await this.findShelfRef(message);
			if (ref !== null) {
				await this.ws.vcs.stashPop(ref);
			}
		} catch (undoErr) {
			throw new ConsistencyError(
				`Shelving "${name}" failed (${errorMessage(cause)}) and could not be undone: ${errorMessage(undoErr)}`,
				`Look for "${message}" in \`git stash list\` and pop it by hand.`
			);
		}
	}
}
