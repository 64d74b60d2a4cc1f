import * as fs from 'fs';
import { ChangelistData, createChangelistStore } from './changelistStore';
import { ChangelistConfig, loadConfig, Environment } from './config';
import { DocumentStore } from './documentStore';
import { FileLockOptions } from './fileLock';
import { getGitDir, getGitRoot, gitConfigGet } from './gitUtils';
import { Logger } from './logger';
import { toAbsolute } from './pathResolver';
import { ShelvedData, createStashStore } from './stashStore';
import { StatusGateway } from './statusGateway';
import { GitVcs, Vcs } from './vcs';

/**
 * Everything an operation needs, resolved once per invocation. Nothing here
 * caches repository state; stores re-read on every load().
 */
export interface Workspace {
	/** Absolute repository root */
	repoRoot: string;
	/** Directory the command was invoked from */
	cwd: string;
	config: ChangelistConfig;
	vcs: Vcs;
	status: StatusGateway;
	changelists: DocumentStore<ChangelistData>;
	shelves: DocumentStore<ShelvedData>;
	logger: Logger;
	/** Existence probe for a storage-relative path */
	fileExists(storagePath: string): boolean;
	now(): Date;
}

export interface OpenWorkspaceOptions {
	cwd: string;
	env: Environment;
	logger: Logger;
	overrides?: Partial<ChangelistConfig>;
}

export function lockOptionsFor(config: ChangelistConfig): FileLockOptions {
	return { timeoutMs: config.lockTimeoutMs };
}

/** Locate the repository around `cwd`, load configuration and build the stores. */
export async function openWorkspace(options: OpenWorkspaceOptions): Promise<Workspace> {
	const repoRoot = await getGitRoot(options.cwd);
	const gitDir = await getGitDir(options.cwd);
	const config = await loadConfig({
		gitConfig: key => gitConfigGet(key, repoRoot),
		env: options.env,
		overrides: options.overrides,
	});
	options.logger.debug(`repository root: ${repoRoot}, git dir: ${gitDir}`);

	const vcs = new GitVcs(repoRoot);
	const lockOptions = lockOptionsFor(config);
	return {
		repoRoot,
		cwd: options.cwd,
		config,
		vcs,
		status: new StatusGateway(vcs, options.logger),
		changelists: createChangelistStore(gitDir, lockOptions, config.metadataFile),
		shelves: createStashStore(gitDir, lockOptions, config.shelfFile),
		logger: options.logger,
		fileExists: storagePath => fs.existsSync(toAbsolute(storagePath, repoRoot)),
		now: () => new Date(),
	};
}
