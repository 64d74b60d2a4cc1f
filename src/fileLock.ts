import * as fs from 'fs';
import * as path from 'path';
import { LockContentionError } from './errors';

export interface FileLockOptions {
	/** How long to wait for a live holder before giving up. */
	timeoutMs: number;
	retryDelayMs?: number;
	/** Written into the lock file. Defaults to process.pid. */
	pid?: number;
	isProcessAlive?: (pid: number) => boolean;
}

function isErrnoCode(err: unknown, code: string): boolean {
	return err !== null && typeof err === 'object' && 'code' in err && err.code === code;
}

export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (err) {
		// EPERM: exists, owned by someone else
		return !isErrnoCode(err, 'ESRCH');
	}
}

let tombstoneSeq = 0;

function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Advisory, exclusive, cooperative lock backed by a `<file>.lock` sentinel
 * created with O_EXCL. Only processes that use this class honour it.
 *
 * Re-entrant within one instance: nested acquire() calls just bump a depth
 * counter, so a workflow holding the lock can call operations that take it.
 */
export class FileLock {
	private depth = 0;
	private readonly retryDelayMs: number;
	private readonly pid: number;
	private readonly alive: (pid: number) => boolean;

	constructor(readonly lockPath: string, private readonly options: FileLockOptions) {
		this.retryDelayMs = options.retryDelayMs ?? 50;
		this.pid = options.pid ?? process.pid;
		this.alive = options.isProcessAlive ?? isProcessAlive;
	}

	get held(): boolean {
		return this.depth > 0;
	}

	async acquire(): Promise<void> {
		if (this.depth > 0) {
			this.depth++;
			return;
		}

		const deadline = Date.now() + this.options.timeoutMs;
		for (;;) {
			if (this.tryCreate()) {
				this.depth = 1;
				return;
			}

			const holder = this.readHolder();
			if (holder !== null && !this.alive(holder)) {
				this.breakStaleLock(holder);
				continue;
			}

			if (Date.now() >= deadline) {
				throw new LockContentionError(this.lockPath, holder);
			}
			await sleep(this.retryDelayMs);
		}
	}

	release(): void {
		if (this.depth === 0) {
			return;
		}
		this.depth--;
		if (this.depth === 0) {
			this.removeLockFile();
		}
	}

	private tryCreate(): boolean {
		fs.mkdirSync(path.dirname(this.lockPath), { recursive: true });
		try {
			fs.writeFileSync(this.lockPath, `${this.pid}\n`, { flag: 'wx' });
			return true;
		} catch (err) {
			if (isErrnoCode(err, 'EEXIST')) {
				return false;
			}
			throw err;
		}
	}

	/**
	 * Move the lock aside before deleting it. If what was moved no longer names
	 * the dead holder, another process took the lock in between: link it back.
	 */
	private breakStaleLock(stalePid: number): void {
		const tombstone = `${this.lockPath}.${this.pid}.${++tombstoneSeq}.stale`;
		try {
			fs.renameSync(this.lockPath, tombstone);
		} catch (err) {
			if (isErrnoCode(err, 'ENOENT')) {
				return;
			}
			throw err;
		}
		try {
			if (readPid(tombstone) !== stalePid) {
				try {
					fs.linkSync(tombstone, this.lockPath);
				} catch (err) {
					if (!isErrnoCode(err, 'EEXIST')) {
						throw err;
					}
				}
			}
		} finally {
			fs.rmSync(tombstone, { force: true });
		}
	}

	/** Pid recorded in the lock file, or null if unreadable or half-written. */
	private readHolder(): number | null {
		return readPid(this.lockPath);
	}

	private removeLockFile(): void {
		try {
			fs.unlinkSync(this.lockPath);
		} catch (err) {
			if (!isErrnoCode(err, 'ENOENT')) {
				throw err;
			}
		}
	}
}

function readPid(file: string): number | null {
	let content: string;
	try {
		content = fs.readFileSync(file, 'utf-8');
	} catch (err) {
		if (isErrnoCode(err, 'ENOENT')) {
			return null;
		}
		throw err;
	}
	const pid = Number.parseInt(content.trim(), 10);
	return Number.isInteger(pid) && pid > 0 ? pid : null;
}

/** Run `fn` with the lock held; released on every exit path. */
export async function withFileLock<T>(lock: FileLock, fn: () => Promise<T> | T): Promise<T> {
	await lock.acquire();
	try {
		return await fn();
	} finally {
		lock.release();
	}
}
