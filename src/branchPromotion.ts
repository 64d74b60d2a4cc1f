import { Changelists } from './changelistStore';
import { ownEntry } from './documentStore';
import { ChangelistError, ConsistencyError, NotFoundError, UserInputError, errorMessage, toChangelistError } from './errors';
import { RestoreFailure, ShelveCoordinator } from './shelveCoordinator';
import { PromotionMarker, findInterruptedPromotion, getShelvedFiles } from './stashStore';
import { Workspace } from './workspace';

export type PromotionState =
	| 'validating'
	| 'shelving-all'
	| 'creating-branch'
	| 'restoring-target'
	| 'done'
	| 'rolling-back';

export interface PromotionRequest {
	/** Changelist to carry onto the new branch */
	name: string;
	/** Defaults to the changelist name */
	branch?: string;
	/** Start point; defaults to the current HEAD */
	base?: string;
}

export interface PromotionReport {
	/** `done`, or `rolling-back` once the rollback has run */
	state: 'done' | 'rolling-back';
	target: string;
	branch: string;
	/** Every state entered, in order */
	history: PromotionState[];
	/** Changelists shelved during the attempt, in order */
	shelved: string[];
	/** Changelists still shelved at the end, with why */
	unrecovered: RestoreFailure[];
	/** What sent the workflow into rollback */
	failure?: ChangelistError;
}

/** Where HEAD pointed before the attempt: a branch, or a commit when detached. */
export interface HeadPosition {
	ref: string;
	detached: boolean;
}

export type TransitionListener = (state: PromotionState) => void;

/**
 * Moves one changelist onto a fresh branch: shelve every changelist, create
 * the branch, restore only the target. Any failure after the first shelf
 * push puts everything back on the original position, or reports exactly
 * what is still shelved.
 */
export class BranchPromotion {
	private readonly shelver: ShelveCoordinator;
	private history: PromotionState[] = [];

	constructor(private readonly ws: Workspace, private readonly onTransition?: TransitionListener) {
		this.shelver = new ShelveCoordinator(ws);
	}

	promote(request: PromotionRequest): Promise<PromotionReport> {
		this.history = [];
		return this.shelver.withBothLocks(() => this.run(request));
	}

	private async run(request: PromotionRequest): Promise<PromotionReport> {
		const { vcs, logger } = this.ws;
		const target = request.name;
		const branch = request.branch ?? target;

		this.enter('validating');
		await this.validate(target, branch);
		const origin = await this.currentPosition();
		logger.debug(`original position: ${origin.detached ? 'detached at ' : ''}${origin.ref}`);

		const marker: PromotionMarker = { target, branch, started_at: this.ws.now().toISOString() };
		const report: PromotionReport = { state: 'done', target, branch, history: this.history, shelved: [], unrecovered: [] };

		this.enter('shelving-all');
		let targetShelved = false;
		try {
			for (const name of new Changelists(this.ws.changelists.load()).getNames()) {
				const plan = await this.shelver.plan(name);
				if (plan.shelvable.length === 0) {
					logger.debug(`"${name}" has nothing to shelve; it stays active`);
					continue;
				}
				await this.shelver.shelveOne(name, { promotion: marker });
				report.shelved.push(name);
				targetShelved = targetShelved || name === target;
			}
		} catch (err) {
			return this.rollBack(report, origin, err, false);
		}

		this.enter('creating-branch');
		try {
			await vcs.createBranch(branch, request.base);
		} catch (err) {
			return this.rollBack(report, origin, err, false);
		}

		this.enter('restoring-target');
		if (targetShelved) {
			try {
				await this.shelver.restoreOne(target, { ignoreBranch: true });
			} catch (err) {
				return this.rollBack(report, origin, err, true);
			}
		}

		await this.shelver.clearPromotionMarkers();
		this.enter('done');
		return report;
	}

	/** Fails fast; nothing has been changed when this throws. */
	private async validate(target: string, branch: string): Promise<void> {
		const { vcs } = this.ws;
		const shelved = this.ws.shelves.load();
		const interrupted = findInterruptedPromotion(shelved);
		if (interrupted) {
			throw new ConsistencyError(
				`An earlier promotion of "${interrupted.marker.target}" to branch "${interrupted.marker.branch}" did not finish; still shelved: ${interrupted.names.join(', ')}`,
				'Restore those changelists with `git changelist unstash <name>` (or --all), then try again.'
			);
		}
		if (ownEntry(shelved, target)) {
			throw new UserInputError(
				`Changelist "${target}" is shelved`,
				`Restore it with \`git changelist unstash ${target}\` first.`
			);
		}
		const active = new Changelists(this.ws.changelists.load());
		if (!active.has(target)) {
			throw new NotFoundError(`Changelist "${target}" not found`, 'Run `git changelist status` to list changelists.');
		}
		if (branch.length === 0 || branch.startsWith('-') || /[\s\x00-\x1f\x7f]/.test(branch)) {
			throw new UserInputError(`Invalid branch name: ${JSON.stringify(branch)}`);
		}
		if (await vcs.branchExists(branch)) {
			throw new UserInputError(`Branch "${branch}" already exists`, 'Pick another branch name.');
		}

		const assigned = active.assignedFiles();
		const shelvedFiles = getShelvedFiles(shelved);
		const unassigned = [...(await this.ws.status.fullStatus()).keys()].filter(
			p => !assigned.has(p) && !shelvedFiles.has(p)
		);
		if (unassigned.length > 0) {
			throw new UserInputError(
				`${unassigned.length} changed file(s) belong to no changelist and would be carried to the new branch: ${unassigned.join(', ')}`,
				'Add them to a changelist, commit them or stash them first.'
			);
		}
	}

	/**
	 * Return to the original position and restore everything shelved during
	 * the attempt, newest first. When the repository cannot be put back on
	 * the original position nothing is restored; every record is reported.
	 */
	private async rollBack(
		report: PromotionReport,
		origin: HeadPosition,
		cause: unknown,
		switchBack: boolean
	): Promise<PromotionReport> {
		const { vcs, logger } = this.ws;
		this.enter('rolling-back');
		report.state = 'rolling-back';
		report.failure = toChangelistError(cause);
		logger.debug(`rolling back: ${errorMessage(cause)}`);

		if (switchBack) {
			try {
				await vcs.switchTo(origin.ref);
			} catch (err) {
				logger.debug(`switching back to ${origin.ref} failed: ${errorMessage(err)}`);
			}
		}

		const stillShelved = report.shelved.filter(name => ownEntry(this.ws.shelves.load(), name) !== undefined);
		if (!(await this.isAt(origin))) {
			report.unrecovered = stillShelved.map(name => ({
				name,
				reason: `the repository is no longer at ${origin.ref}; restore it by hand`,
			}));
		} else {
			report.unrecovered = await this.shelver.rollBack(stillShelved);
		}

		await this.shelver.clearPromotionMarkers();
		return report;
	}

	private async currentPosition(): Promise<HeadPosition> {
		const branch = await this.ws.vcs.currentBranch();
		if (branch !== null) {
			return { ref: branch, detached: false };
		}
		return { ref: await this.ws.vcs.headCommit(), detached: true };
	}

	private async isAt(origin: HeadPosition): Promise<boolean> {
		try {
			const now = await this.currentPosition();
			return now.detached === origin.detached && now.ref === origin.ref;
		} catch (err) {
			this.ws.logger.debug(`could not read HEAD: ${errorMessage(err)}`);
			return false;
		}
	}

	private enter(state: PromotionState): void {
		this.history.push(state);
		this.ws.logger.debug(`promotion: ${state}`);
		this.onTransition?.(state);
	}
}
