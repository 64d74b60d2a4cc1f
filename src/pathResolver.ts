import * as fs from 'fs';
import * as path from 'path';

/**
 * Three path forms are in play:
 * - storage-relative: relative to the repository root, forward slashes (persisted)
 * - caller-relative: relative to the invoking process's cwd (display, git arguments)
 * - absolute
 */

export type PathRejectionReason = 'empty' | 'outside-repo' | 'dangerous-character' | 'nonexistent';

export interface PathRejection {
	ok: false;
	input: string;
	reason: PathRejectionReason;
	message: string;
}

export interface AcceptedPath {
	ok: true;
	input: string;
	/** Storage-relative form */
	path: string;
	exists: boolean;
}

export type PathResolution = AcceptedPath | PathRejection;

export interface SanitizeOptions {
	/** Directory relative paths are resolved against. Defaults to the repository root. */
	cwd?: string;
	/** Reject paths that do not exist on disk. */
	requireExists?: boolean;
	/** Existence probe, given an absolute path. Defaults to fs.existsSync. */
	exists?: (absolutePath: string) => boolean;
}

/**
 * Control characters plus shell metacharacters. No shell is ever spawned, but
 * stored paths may later reach integrations that do.
 */
const UNSAFE_CHARACTERS = /[\x00-\x1f\x7f;|&`$]/;

function reject(input: string, reason: PathRejectionReason, message: string): PathRejection {
	return { ok: false, input, reason, message };
}

function isOutside(relative: string): boolean {
	return relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
}

function isMissing(err: unknown): boolean {
	return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/** Resolve symbolic links in the part of `target` that exists; the rest is kept as written. */
function realPathOf(target: string): string {
	const rest: string[] = [];
	let current = target;
	for (;;) {
		try {
			return path.join(fs.realpathSync(current), ...rest);
		} catch (err) {
			const parent = path.dirname(current);
			if (!isMissing(err) || parent === current) {
				throw err;
			}
			rest.unshift(path.basename(current));
			current = parent;
		}
	}
}

/**
 * Validate a user-supplied path and convert it to storage-relative form.
 * Directory symlinks are resolved, so the stored form names the real location;
 * the last component is kept, since git tracks a symlink as itself.
 * Never throws for bad input; the rejection carries the reason.
 */
export function sanitizePath(userPath: string, repoRoot: string, options: SanitizeOptions = {}): PathResolution {
	if (!userPath || userPath.length === 0) {
		return reject(userPath, 'empty', 'File path cannot be empty');
	}
	if (UNSAFE_CHARACTERS.test(userPath)) {
		return reject(userPath, 'dangerous-character', `Unsafe characters in path: ${JSON.stringify(userPath)}`);
	}

	const root = path.resolve(repoRoot);
	const base = options.cwd ? path.resolve(root, options.cwd) : root;
	const absolute = path.resolve(base, userPath);
	const relative = path.relative(root, absolute);

	if (relative === '' || isOutside(relative)) {
		return reject(userPath, 'outside-repo', `Path is outside the repository: ${userPath}`);
	}

	const realRelative = path.relative(
		realPathOf(root),
		path.join(realPathOf(path.dirname(absolute)), path.basename(absolute))
	);
	if (realRelative === '' || isOutside(realRelative)) {
		return reject(userPath, 'outside-repo', `Path leads outside the repository through a symbolic link: ${userPath}`);
	}

	const storagePath = realRelative.split(path.sep).join('/');
	if (storagePath === '.git' || storagePath.startsWith('.git/')) {
		return reject(userPath, 'outside-repo', `Path is inside the git directory: ${userPath}`);
	}

	const exists = (options.exists ?? fs.existsSync)(absolute);
	if (!exists && options.requireExists) {
		return reject(userPath, 'nonexistent', `Path does not exist: ${userPath}`);
	}

	return { ok: true, input: userPath, path: storagePath, exists };
}

export interface SanitizedPaths {
	/** Storage-relative, deduplicated, in input order */
	accepted: string[];
	rejected: PathRejection[];
	/** Accepted paths that do not exist on disk */
	missing: string[];
}

/** Sanitize a batch of paths, deduplicating accepted ones. */
export function sanitizePaths(userPaths: readonly string[], repoRoot: string, options: SanitizeOptions = {}): SanitizedPaths {
	const result: SanitizedPaths = { accepted: [], rejected: [], missing: [] };
	const seen = new Set<string>();
	for (const userPath of userPaths) {
		const resolution = sanitizePath(userPath, repoRoot, options);
		if (!resolution.ok) {
			result.rejected.push(resolution);
			continue;
		}
		if (seen.has(resolution.path)) {
			continue;
		}
		seen.add(resolution.path);
		result.accepted.push(resolution.path);
		if (!resolution.exists) {
			result.missing.push(resolution.path);
		}
	}
	return result;
}

/** Storage-relative → absolute. */
export function toAbsolute(storagePath: string, repoRoot: string): string {
	return path.join(path.resolve(repoRoot), ...storagePath.split('/'));
}

/**
 * Storage-relative → relative to `cwd`, forward slashes. Gives the same file
 * regardless of where in the tree the command was invoked.
 */
export function toCallerRelative(storagePath: string, cwd: string, repoRoot: string): string {
	const relative = path.relative(path.resolve(cwd), toAbsolute(storagePath, repoRoot));
	if (relative === '') {
		return '.';
	}
	return relative.split(path.sep).join('/');
}

/** Path as git itself reports it (porcelain output is root-relative) → storage form. */
export function normalizeGitPath(gitPath: string): string {
	const forward = gitPath.split(path.sep).join('/');
	return path.posix.normalize(forward).replace(/\/$/, '');
}
