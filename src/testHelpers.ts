import { ChangelistData, changelistCodec } from './changelistStore';
import { ChangelistConfig, DEFAULT_CONFIG } from './config';
import { MemoryDocumentStore } from './documentStore';
import { ExternalToolError } from './errors';
import { CommitMessage, DiffOptions, RawStatusEntry, StashEntry, StashPushOptions } from './gitUtils';
import { ConsoleLogger, OutputSink } from './logger';
import { ShelvedData, shelvedCodec } from './stashStore';
import { StatusGateway } from './statusGateway';
import { Vcs } from './vcs';
import { Workspace } from './workspace';

export type VcsMethod = keyof Vcs;

export interface VcsCall {
	method: VcsMethod;
	args: unknown[];
}

interface FakeShelf {
	message: string;
	branch: string;
	entries: RawStatusEntry[];
}

/**
 * In-process stand-in for git. Models porcelain status, a file set on disk,
 * the stash stack and branches closely enough for the workflows.
 */
export class FakeVcs implements Vcs {
	/** path → porcelain code; insertion order is the order status reports */
	readonly codes = new Map<string, string>();
	/** Storage paths present on disk */
	readonly disk = new Set<string>();
	readonly branches = new Set<string>(['main']);
	branch: string | null = 'main';
	head = '0123456789abcdef0123456789abcdef01234567';
	readonly shelves: FakeShelf[] = [];
	readonly calls: VcsCall[] = [];
	readonly config = new Map<string, string>();
	diffOutput = '';
	private readonly failures = new Map<VcsMethod, Error>();

	/** Set a file's status code; clean files are kept on disk. */
	setStatus(filePath: string, code: string): this {
		this.codes.set(filePath, code);
		if (!code.includes('D')) {
			this.disk.add(filePath);
		}
		return this;
	}

	/** Make the next call to `method` fail. */
	failNext(method: VcsMethod, error?: Error): this {
		this.failures.set(method, error ?? new ExternalToolError({ command: `git ${method}`, status: 1, stderr: `${method} failed` }));
		return this;
	}

	exists(filePath: string): boolean {
		return this.disk.has(filePath);
	}

	callsTo(method: VcsMethod): VcsCall[] {
		return this.calls.filter(call => call.method === method);
	}

	async status(includeUntracked: boolean): Promise<RawStatusEntry[]> {
		this.record('status', [includeUntracked]);
		const entries: RawStatusEntry[] = [];
		for (const [p, code] of this.codes) {
			if (code === '??' && !includeUntracked) {
				continue;
			}
			entries.push({ code, path: p });
		}
		return entries;
	}

	async currentBranch(): Promise<string | null> {
		this.record('currentBranch', []);
		return this.branch;
	}

	async headCommit(): Promise<string> {
		this.record('headCommit', []);
		return this.head;
	}

	async branchExists(name: string): Promise<boolean> {
		this.record('branchExists', [name]);
		return this.branches.has(name);
	}

	async createBranch(name: string, base?: string): Promise<void> {
		this.record('createBranch', [name, base]);
		if (this.branches.has(name)) {
			throw new ExternalToolError({ command: 'git checkout', status: 128, stderr: `fatal: a branch named '${name}' already exists` });
		}
		this.branches.add(name);
		this.branch = name;
	}

	async switchTo(ref: string): Promise<void> {
		this.record('switchTo', [ref]);
		if (this.branches.has(ref)) {
			this.branch = ref;
			return;
		}
		if (ref === this.head) {
			this.branch = null;
			return;
		}
		throw new ExternalToolError({ command: 'git checkout', status: 1, stderr: `error: pathspec '${ref}' did not match` });
	}

	async stashPush(message: string, paths: readonly string[], options: StashPushOptions): Promise<void> {
		this.record('stashPush', [message, [...paths], { ...options }]);
		const entries: RawStatusEntry[] = [];
		for (const p of paths) {
			const code = this.codes.get(p);
			if (code === undefined || (code === '??' && !options.includeUntracked)) {
				continue;
			}
			entries.push({ code, path: p });
			this.codes.delete(p);
			if (code === '??' || code.startsWith('A')) {
				this.disk.delete(p);
			} else if (code.charAt(1) === 'D' || code === 'D ') {
				this.disk.add(p);
			}
		}
		if (entries.length === 0) {
			throw new ExternalToolError({ command: 'git stash', status: 1, stderr: 'No local changes to save' });
		}
		this.shelves.unshift({ message, branch: this.branch ?? '(no branch)', entries });
	}

	async stashList(): Promise<StashEntry[]> {
		this.record('stashList', []);
		return this.shelves.map((shelf, i) => ({ ref: `stash@{${i}}`, message: `On ${shelf.branch}: ${shelf.message}` }));
	}

	async stashPop(ref: string): Promise<void> {
		this.record('stashPop', [ref]);
		const match = /^stash@\{(\d+)\}$/.exec(ref);
		const index = match ? Number(match[1]) : -1;
		const shelf = this.shelves[index];
		if (!shelf) {
			throw new ExternalToolError({ command: 'git stash', status: 1, stderr: `error: ${ref} is not a valid reference` });
		}
		const clashing = shelf.entries.filter(entry => this.codes.has(entry.path));
		if (clashing.length > 0) {
			throw new ExternalToolError({
				command: 'git stash',
				status: 1,
				stderr: `error: Your local changes to the following files would be overwritten by merge: ${clashing.map(e => e.path).join(' ')}`,
			});
		}
		for (const entry of shelf.entries) {
			this.codes.set(entry.path, entry.code);
			if (entry.code.charAt(1) === 'D' || entry.code === 'D ') {
				this.disk.delete(entry.path);
			} else {
				this.disk.add(entry.path);
			}
		}
		this.shelves.splice(index, 1);
	}

	async add(paths: readonly string[]): Promise<void> {
		this.record('add', [[...paths]]);
	}

	async reset(paths: readonly string[]): Promise<void> {
		this.record('reset', [[...paths]]);
	}

	async revert(paths: readonly string[]): Promise<void> {
		this.record('revert', [[...paths]]);
		for (const p of paths) {
			this.codes.delete(p);
			this.disk.add(p);
		}
	}

	async commit(paths: readonly string[], message: CommitMessage): Promise<void> {
		this.record('commit', [[...paths], message]);
		for (const p of paths) {
			this.codes.delete(p);
		}
	}

	async diff(paths: readonly string[], options?: DiffOptions): Promise<string> {
		this.record('diff', [[...paths], options]);
		return this.diffOutput;
	}

	async configGet(key: string): Promise<string | null> {
		this.record('configGet', [key]);
		return this.config.get(key) ?? null;
	}

	private record(method: VcsMethod, args: unknown[]): void {
		this.calls.push({ method, args });
		const failure = this.failures.get(method);
		if (failure) {
			this.failures.delete(method);
			throw failure;
		}
	}
}

/** Collects output lines instead of writing to the terminal. */
export class RecordingSink implements OutputSink {
	readonly stdout: string[] = [];
	readonly stderr: string[] = [];

	out(text: string): void {
		this.stdout.push(text);
	}

	err(text: string): void {
		this.stderr.push(text);
	}
}

export interface TestWorkspace extends Workspace {
	vcs: FakeVcs;
	changelists: MemoryDocumentStore<ChangelistData>;
	shelves: MemoryDocumentStore<ShelvedData>;
	sink: RecordingSink;
}

export interface TestWorkspaceOptions {
	repoRoot?: string;
	cwd?: string;
	config?: Partial<ChangelistConfig>;
	changelists?: ChangelistData;
	shelves?: ShelvedData;
	vcs?: FakeVcs;
	/** Fixed clock; each call advances it by one second */
	startTime?: string;
	verbose?: boolean;
}

/** Workspace wired to in-memory stores, a FakeVcs and a recording logger. */
export function createTestWorkspace(options: TestWorkspaceOptions = {}): TestWorkspace {
	const repoRoot = options.repoRoot ?? '/repo';
	const vcs = options.vcs ?? new FakeVcs();
	const sink = new RecordingSink();
	const logger = new ConsoleLogger({ color: false, verbose: options.verbose ?? false }, sink);
	let clock = Date.parse(options.startTime ?? '2024-01-02T03:04:05.000Z');
	return {
		repoRoot,
		cwd: options.cwd ?? repoRoot,
		config: { ...DEFAULT_CONFIG, color: false, ...options.config },
		vcs,
		status: new StatusGateway(vcs, logger),
		changelists: new MemoryDocumentStore(changelistCodec, 'cl.json', options.changelists),
		shelves: new MemoryDocumentStore(shelvedCodec, 'cl-stashes.json', options.shelves),
		logger,
		sink,
		fileExists: storagePath => vcs.exists(storagePath),
		now: () => {
			const current = new Date(clock);
			clock += 1000;
			return current;
		},
	};
}
