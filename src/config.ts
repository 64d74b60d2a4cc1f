import { DEFAULT_CHANGELIST_FILE } from './changelistStore';
import { UserInputError } from './errors';
import { DEFAULT_SHELF_FILE } from './stashStore';

export interface ChangelistConfig {
	/** File name of the active changelist store, inside the git directory */
	metadataFile: string;
	/** File name of the shelved record store, inside the git directory */
	shelfFile: string;
	/** Show entries with unclassified status codes instead of only counting them */
	showAll: boolean;
	/** How long to wait for another invocation's metadata lock */
	lockTimeoutMs: number;
	color: boolean;
}

export const DEFAULT_CONFIG: Readonly<ChangelistConfig> = {
	metadataFile: DEFAULT_CHANGELIST_FILE,
	shelfFile: DEFAULT_SHELF_FILE,
	showAll: false,
	lockTimeoutMs: 2000,
	color: true,
};

/** git configuration keys, read with `git config --get` */
export const GIT_CONFIG_KEYS = {
	showAll: 'changelist.showAll',
	lockTimeout: 'changelist.lockTimeout',
	metadataFile: 'changelist.metadataFile',
	shelfFile: 'changelist.shelfFile',
} as const;

export type Environment = Record<string, string | undefined>;

export interface ConfigSources {
	/** Reads one git configuration key; null when unset */
	gitConfig?: (key: string) => Promise<string | null>;
	env?: Environment;
	/** Command-line flags; highest priority */
	overrides?: Partial<ChangelistConfig>;
}

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

export function parseBoolean(value: string, source: string): boolean {
	const normalized = value.trim().toLowerCase();
	if (TRUE_WORDS.has(normalized)) {
		return true;
	}
	if (FALSE_WORDS.has(normalized)) {
		return false;
	}
	throw new UserInputError(`Invalid boolean for ${source}: "${value}"`, 'Use true or false.');
}

export function parseTimeout(value: string, source: string): number {
	const trimmed = value.trim();
	const ms = Number(trimmed);
	if (trimmed.length === 0 || !Number.isInteger(ms) || ms < 0) {
		throw new UserInputError(`Invalid timeout for ${source}: "${value}"`, 'Use a whole number of milliseconds.');
	}
	return ms;
}

function parseFileName(value: string, source: string): string {
	const trimmed = value.trim();
	if (trimmed.length === 0 || /[\\/]/.test(trimmed) || trimmed === '.' || trimmed === '..') {
		throw new UserInputError(`Invalid file name for ${source}: "${value}"`, 'Use a plain file name; it is placed inside the git directory.');
	}
	return trimmed;
}

/**
 * Resolve configuration. Priority, lowest to highest: defaults, git config,
 * environment, command-line overrides.
 */
export async function loadConfig(sources: ConfigSources = {}): Promise<ChangelistConfig> {
	const config: ChangelistConfig = { ...DEFAULT_CONFIG };

	if (sources.gitConfig) {
		const read = sources.gitConfig;
		const showAll = await read(GIT_CONFIG_KEYS.showAll);
		if (showAll !== null) {
			config.showAll = parseBoolean(showAll, GIT_CONFIG_KEYS.showAll);
		}
		const lockTimeout = await read(GIT_CONFIG_KEYS.lockTimeout);
		if (lockTimeout !== null) {
			config.lockTimeoutMs = parseTimeout(lockTimeout, GIT_CONFIG_KEYS.lockTimeout);
		}
		const metadataFile = await read(GIT_CONFIG_KEYS.metadataFile);
		if (metadataFile !== null) {
			config.metadataFile = parseFileName(metadataFile, GIT_CONFIG_KEYS.metadataFile);
		}
		const shelfFile = await read(GIT_CONFIG_KEYS.shelfFile);
		if (shelfFile !== null) {
			config.shelfFile = parseFileName(shelfFile, GIT_CONFIG_KEYS.shelfFile);
		}
	}

	const env = sources.env ?? {};
	if (env.CHANGELIST_SHOW_ALL !== undefined && env.CHANGELIST_SHOW_ALL !== '') {
		config.showAll = parseBoolean(env.CHANGELIST_SHOW_ALL, 'CHANGELIST_SHOW_ALL');
	}
	if (env.CHANGELIST_LOCK_TIMEOUT !== undefined && env.CHANGELIST_LOCK_TIMEOUT !== '') {
		config.lockTimeoutMs = parseTimeout(env.CHANGELIST_LOCK_TIMEOUT, 'CHANGELIST_LOCK_TIMEOUT');
	}
	if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') {
		config.color = false;
	}

	const overrides = sources.overrides ?? {};
	config.metadataFile = overrides.metadataFile ?? config.metadataFile;
	config.shelfFile = overrides.shelfFile ?? config.shelfFile;
	config.showAll = overrides.showAll ?? config.showAll;
	config.lockTimeoutMs = overrides.lockTimeoutMs ?? config.lockTimeoutMs;
	config.color = overrides.color ?? config.color;

	if (config.metadataFile === config.shelfFile) {
		throw new UserInputError('The changelist file and the shelf file must differ', `Both are set to "${config.metadataFile}".`);
	}

	return config;
}
