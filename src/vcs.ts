import {
	CommitMessage,
	DiffOptions,
	RawStatusEntry,
	StashEntry,
	StashPushOptions,
	getCurrentBranch,
	getGitStatus,
	getHeadCommit,
	gitAdd,
	gitBranchExists,
	gitCheckout,
	gitCheckoutBranch,
	gitCheckoutExistingBranch,
	gitCommit,
	gitConfigGet,
	gitDiff,
	gitReset,
	gitStashList,
	gitStashPop,
	gitStashPush,
} from './gitUtils';

/**
 * The version-control operations the workflows need. The real implementation
 * shells out to git; tests use an in-process fake. Every method treats a
 * non-zero exit as failure and rejects with ExternalToolError. Paths are
 * storage-relative (git runs at the repository root).
 */
export interface Vcs {
	status(includeUntracked: boolean): Promise<RawStatusEntry[]>;
	currentBranch(): Promise<string | null>;
	headCommit(): Promise<string>;
	branchExists(name: string): Promise<boolean>;
	/** Create `name` from `base` (or HEAD) and switch to it */
	createBranch(name: string, base?: string): Promise<void>;
	/** Switch to an existing branch or commit */
	switchTo(ref: string): Promise<void>;
	stashPush(message: string, paths: readonly string[], options: StashPushOptions): Promise<void>;
	stashList(): Promise<StashEntry[]>;
	stashPop(ref: string): Promise<void>;
	add(paths: readonly string[]): Promise<void>;
	reset(paths: readonly string[]): Promise<void>;
	revert(paths: readonly string[]): Promise<void>;
	commit(paths: readonly string[], message: CommitMessage): Promise<void>;
	diff(paths: readonly string[], options?: DiffOptions): Promise<string>;
	configGet(key: string): Promise<string | null>;
}

/** Vcs backed by the git executable, rooted at the repository's top level. */
export class GitVcs implements Vcs {
	constructor(private readonly gitRoot: string) {}

	status(includeUntracked: boolean): Promise<RawStatusEntry[]> {
		return getGitStatus(this.gitRoot, includeUntracked);
	}

	currentBranch(): Promise<string | null> {
		return getCurrentBranch(this.gitRoot);
	}

	headCommit(): Promise<string> {
		return getHeadCommit(this.gitRoot);
	}

	branchExists(name: string): Promise<boolean> {
		return gitBranchExists(name, this.gitRoot);
	}

	createBranch(name: string, base?: string): Promise<void> {
		return gitCheckoutBranch(name, this.gitRoot, base);
	}

	switchTo(ref: string): Promise<void> {
		return gitCheckoutExistingBranch(ref, this.gitRoot);
	}

	stashPush(message: string, paths: readonly string[], options: StashPushOptions): Promise<void> {
		return gitStashPush(message, this.gitRoot, paths, options);
	}

	stashList(): Promise<StashEntry[]> {
		return gitStashList(this.gitRoot);
	}

	stashPop(ref: string): Promise<void> {
		return gitStashPop(ref, this.gitRoot);
	}

	add(paths: readonly string[]): Promise<void> {
		return gitAdd(paths, this.gitRoot);
	}

	reset(paths: readonly string[]): Promise<void> {
		return gitReset(paths, this.gitRoot);
	}

	revert(paths: readonly string[]): Promise<void> {
		return gitCheckout(paths, this.gitRoot);
	}

	commit(paths: readonly string[], message: CommitMessage): Promise<void> {
		return gitCommit(paths, message, this.gitRoot);
	}

	diff(paths: readonly string[], options?: DiffOptions): Promise<string> {
		return gitDiff(paths, this.gitRoot, options);
	}

	configGet(key: string): Promise<string | null> {
		return gitConfigGet(key, this.gitRoot);
	}
}
