import { execFile } from 'child_process';
import { ExternalToolError, UserInputError } from './errors';
import { normalizeGitPath } from './pathResolver';

/** One line of `git status --porcelain`: 2-character code and root-relative path */
export interface RawStatusEntry {
	code: string;
	path: string;
	/** Source path of a rename or copy */
	originalPath?: string;
}

/** A single stash entry from git stash list */
export interface StashEntry {
	ref: string;
	message: string;
}

/** Options for gitDiff */
export interface DiffOptions {
	staged?: boolean;
}

export interface StashPushOptions {
	includeUntracked?: boolean;
}

/** Exactly one of message / messageFile */
export type CommitMessage = { message: string } | { messageFile: string };

/**
 * Execute a git command using execFile (no shell) for safety.
 * All commands run with cwd set to the given directory.
 */
function execGit(args: string[], cwd: string): Promise<string> {
	return new Promise((resolve, reject) => {
		execFile('git', args, { cwd, maxBuffer: 10 * 1024 * 1024 }, (error, stdout, stderr) => {
			if (error) {
				const status = typeof error.code === 'number' ? error.code : null;
				const msg = stderr.trim() || stdout.trim() || error.message;
				reject(new ExternalToolError({ command: `git ${args[0]}`, status, stderr: msg }));
				return;
			}
			resolve(stdout);
		});
	});
}

/**
 * Returns the absolute path to the repository root.
 * Runs `git rev-parse --show-toplevel` from the given directory.
 */
export async function getGitRoot(cwd: string): Promise<string> {
	const output = await execGit(['rev-parse', '--show-toplevel'], cwd);
	return output.trim();
}

/** Absolute path of the git directory (where metadata files live). */
export async function getGitDir(cwd: string): Promise<string> {
	const output = await execGit(['rev-parse', '--absolute-git-dir'], cwd);
	return output.trim();
}

const QUOTE_ESCAPES: Record<string, number> = {
	a: 0x07, b: 0x08, t: 0x09, n: 0x0a, v: 0x0b, f: 0x0c, r: 0x0d,
	'"': 0x22, '\\': 0x5c,
};

/**
 * Undo git's C-style path quoting ("with space", octal-escaped UTF-8 bytes).
 * Unquoted input is returned as is.
 */
export function unquoteGitPath(raw: string): string {
	if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) {
		return raw;
	}
	const body = raw.slice(1, -1);
	const bytes: number[] = [];
	for (let i = 0; i < body.length; i++) {
		const ch = body[i];
		if (ch !== '\\') {
			bytes.push(...Buffer.from(ch, 'utf-8'));
			continue;
		}
		const next = body[i + 1];
		if (next === undefined) {
			break;
		}
		if (/[0-7]/.test(next)) {
			bytes.push(Number.parseInt(body.slice(i + 1, i + 4), 8));
			i += 3;
			continue;
		}
		bytes.push(QUOTE_ESCAPES[next] ?? next.charCodeAt(0));
		i += 1;
	}
	return Buffer.from(bytes).toString('utf-8');
}

/**
 * Parse `git status --porcelain` (v1) output. Renames ("R  old -> new") keep
 * the new path.
 */
export function parsePorcelainStatus(output: string): RawStatusEntry[] {
	const entries: RawStatusEntry[] = [];
	for (const line of output.split('\n')) {
		if (line.length < 4) {
			continue;
		}
		const code = line.substring(0, 2);
		const rest = line.substring(3);
		const arrowIndex = rest.indexOf(' -> ');
		if (arrowIndex !== -1 && (code.includes('R') || code.includes('C'))) {
			entries.push({
				code,
				path: normalizeGitPath(unquoteGitPath(rest.substring(arrowIndex + 4))),
				originalPath: normalizeGitPath(unquoteGitPath(rest.substring(0, arrowIndex))),
			});
			continue;
		}
		entries.push({ code, path: normalizeGitPath(unquoteGitPath(rest)) });
	}
	return entries;
}

/**
 * Runs `git status --porcelain` and returns the parsed entries.
 * With includeUntracked every untracked file is listed individually;
 * without it untracked files are omitted.
 */
export async function getGitStatus(gitRoot: string, includeUntracked = true): Promise<RawStatusEntry[]> {
	const args = ['status', '--porcelain', includeUntracked ? '--untracked-files=all' : '--untracked-files=no'];
	const output = await execGit(args, gitRoot);
	return parsePorcelainStatus(output);
}

/**
 * Stages the specified files via `git add`.
 * Paths are resolved relative to git root.
 */
export async function gitAdd(files: readonly string[], gitRoot: string): Promise<void> {
	if (files.length === 0) {
		return;
	}
	await execGit(['add', '--', ...files], gitRoot);
}

/**
 * Unstages the specified files via `git reset HEAD`.
 */
export async function gitReset(files: readonly string[], gitRoot: string): Promise<void> {
	if (files.length === 0) {
		return;
	}
	await execGit(['reset', '--quiet', 'HEAD', '--', ...files], gitRoot);
}

/**
 * Reverts files to HEAD via `git checkout HEAD --`.
 */
export async function gitCheckout(files: readonly string[], gitRoot: string): Promise<void> {
	if (files.length === 0) {
		return;
	}
	await execGit(['checkout', 'HEAD', '--', ...files], gitRoot);
}

/**
 * Commits specified files with the given message (or message file).
 * Files are staged first via `git add`, then committed as a pathspec so
 * unrelated staged changes stay out of the commit.
 */
export async function gitCommit(files: readonly string[], message: CommitMessage, gitRoot: string): Promise<void> {
	if (files.length === 0) {
		throw new UserInputError('No files to commit');
	}
	const messageArgs = 'message' in message ? ['-m', message.message] : ['-F', message.messageFile];
	if ('message' in message && message.message.trim().length === 0) {
		throw new UserInputError('Commit message cannot be empty');
	}
	await gitAdd(files, gitRoot);
	await execGit(['commit', ...messageArgs, '--', ...files], gitRoot);
}

/**
 * Returns diff output for the specified files.
 * Supports --staged flag via options.
 */
export async function gitDiff(files: readonly string[], gitRoot: string, options?: DiffOptions): Promise<string> {
	const args = ['diff'];
	if (options?.staged) {
		args.push('--staged');
	}
	if (files.length > 0) {
		args.push('--', ...files);
	}
	return execGit(args, gitRoot);
}

/**
 * Creates a stash with the given message.
 * If files are specified, only those files are stashed (using --).
 */
export async function gitStashPush(
	message: string,
	gitRoot: string,
	files?: readonly string[],
	options?: StashPushOptions
): Promise<void> {
	const args = ['stash', 'push', '-m', message];
	if (options?.includeUntracked) {
		args.push('--include-untracked');
	}
	if (files && files.length > 0) {
		args.push('--', ...files);
	}
	await execGit(args, gitRoot);
}

/**
 * Pops a specific stash reference (e.g., "stash@{0}").
 */
export async function gitStashPop(ref: string, gitRoot: string): Promise<void> {
	await execGit(['stash', 'pop', ref], gitRoot);
}

/**
 * Lists stash entries with their references and messages.
 */
export async function gitStashList(gitRoot: string): Promise<StashEntry[]> {
	const output = await execGit(['stash', 'list'], gitRoot);
	const entries: StashEntry[] = [];
	for (const line of output.split('\n')) {
		if (!line.trim()) {
			continue;
		}
		// Format: "stash@{0}: On branch: message"
		const colonIndex = line.indexOf(':');
		if (colonIndex === -1) {
			continue;
		}
		const ref = line.substring(0, colonIndex);
		const message = line.substring(colonIndex + 2);
		entries.push({ ref, message });
	}
	return entries;
}

/**
 * Returns the current branch name, or null if in detached HEAD state.
 */
export async function getCurrentBranch(gitRoot: string): Promise<string | null> {
	try {
		const output = await execGit(['symbolic-ref', '--short', '-q', 'HEAD'], gitRoot);
		return output.trim() || null;
	} catch (e: unknown) {
		// exit 1 with -q: HEAD is detached
		if (e instanceof ExternalToolError && e.status === 1) {
			return null;
		}
		throw e;
	}
}

/** Full commit id of HEAD. */
export async function getHeadCommit(gitRoot: string): Promise<string> {
	const output = await execGit(['rev-parse', 'HEAD'], gitRoot);
	return output.trim();
}

/**
 * Creates and switches to a new branch.
 * If base is provided, the branch is created from that base ref.
 */
export async function gitCheckoutBranch(name: string, gitRoot: string, base?: string): Promise<void> {
	const args = ['checkout', '-b', name];
	if (base) {
		args.push(base);
	}
	await execGit(args, gitRoot);
}

/** True if `refs/heads/<name>` exists. */
export async function gitBranchExists(name: string, gitRoot: string): Promise<boolean> {
	try {
		await execGit(['rev-parse', '--verify', '--quiet', `refs/heads/${name}`], gitRoot);
		return true;
	} catch (e: unknown) {
		if (e instanceof ExternalToolError && e.status === 1) {
			return false;
		}
		throw e;
	}
}

/** Switches to an existing branch, or detaches at a commit id. */
export async function gitCheckoutExistingBranch(ref: string, gitRoot: string): Promise<void> {
	await execGit(['checkout', ref], gitRoot);
}

/**
 * Reads a git configuration value. Returns null when the key is unset
 * (git exits 1).
 */
export async function gitConfigGet(key: string, cwd: string): Promise<string | null> {
	try {
		const output = await execGit(['config', '--get', key], cwd);
		return output.trim();
	} catch (e: unknown) {
		if (e instanceof ExternalToolError && e.status === 1) {
			return null;
		}
		throw e;
	}
}
