import { Command, CommanderError } from 'commander';
import prompts from 'prompts';
import { BranchPromotion } from './branchPromotion';
import { ChangelistEngine } from './changelistEngine';
import { ChangelistConfig, Environment } from './config';
import { EXIT_CODES, InterruptedError, UserInputError, formatError, toChangelistError } from './errors';
import { CommitMessage } from './gitUtils';
import { ConsoleLogger, OutputSink, processSink } from './logger';
import { ShelveCoordinator } from './shelveCoordinator';
import { formatStatus } from './statusFormatter';
import { OpenWorkspaceOptions, Workspace, openWorkspace } from './workspace';

export const CLI_NAME = 'git-changelist';
export const CLI_VERSION = '1.0.0';

export interface GlobalOptions {
	verbose: boolean;
	quiet: boolean;
	color: boolean;
}

/** Either one changelist or all of them */
export type Selection = { all: true } | { all: false; name: string };

export type ParsedCommand =
	| { kind: 'add'; name: string; files: string[] }
	| { kind: 'remove'; name: string; files: string[] }
	| { kind: 'delete'; names: string[]; all: boolean }
	| { kind: 'status'; names: string[]; includeUnassigned: boolean; showAll?: boolean }
	| { kind: 'stage'; name: string; deleteAfter: boolean }
	| { kind: 'unstage'; name: string; deleteAfter: boolean }
	| { kind: 'commit'; name: string; message: CommitMessage; keep: boolean }
	| { kind: 'diff'; names: string[]; staged: boolean }
	| { kind: 'checkout'; names: string[]; deleteAfter: boolean; force: boolean }
	| { kind: 'stash'; target: Selection }
	| { kind: 'unstash'; target: Selection; force: boolean }
	| { kind: 'branch'; name: string; branch?: string; base?: string };

export interface ParsedArgs {
	command: ParsedCommand;
	globals: GlobalOptions;
}

/** Parsing stopped early: help, version or a usage error. */
export interface ParseExit {
	exitCode: number;
}

export interface CliDependencies {
	cwd: string;
	env: Environment;
	sink: OutputSink;
	open?: (options: OpenWorkspaceOptions) => Promise<Workspace>;
	/** Ask the user a yes/no question */
	confirm?: (message: string) => Promise<boolean>;
}

function selection(name: string | undefined, all: boolean | undefined, verb: string): Selection {
	if (all && name !== undefined) {
		throw new UserInputError(`Give either a changelist name or --all to ${verb}, not both`);
	}
	if (all) {
		return { all: true };
	}
	if (name === undefined) {
		throw new UserInputError(`Give a changelist name or --all to ${verb}`);
	}
	return { all: false, name };
}

function commitMessage(options: { message?: string; file?: string }): CommitMessage {
	if (options.message !== undefined && options.file !== undefined) {
		throw new UserInputError('Use either -m or -F, not both');
	}
	if (options.message !== undefined) {
		return { message: options.message };
	}
	if (options.file !== undefined) {
		return { messageFile: options.file };
	}
	throw new UserInputError('A commit message is required', 'Pass -m <message> or -F <file>.');
}

/** Build the commander program. Actions only record what was asked for. */
export function createProgram(sink: OutputSink, onParsed: (command: ParsedCommand) => void): Command {
	const program = new Command();

	program
		.name(CLI_NAME)
		.description('Group working-tree files into named changelists')
		.version(CLI_VERSION, '-V, --version', 'Output the version number')
		.option('-v, --verbose', 'Show debug output', false)
		.option('-q, --quiet', 'Only show errors', false)
		.option('--no-color', 'Disable color output')
		.exitOverride()
		.configureOutput({
			writeOut: text => sink.out(text.replace(/\n$/, '')),
			writeErr: text => sink.err(text.replace(/\n$/, '')),
		});

	program
		.command('add <name> <files...>')
		.alias('a')
		.description('Add files to a changelist, moving them out of any other')
		.action((name: string, files: string[]) => onParsed({ kind: 'add', name, files }));

	program
		.command('remove <name> <files...>')
		.aliases(['rm', 'r'])
		.description('Remove files from a changelist')
		.action((name: string, files: string[]) => onParsed({ kind: 'remove', name, files }));

	program
		.command('delete [names...]')
		.alias('del')
		.description('Delete changelists; the files themselves are untouched')
		.option('--all', 'Delete every changelist')
		.action((names: string[], opts: { all?: boolean }) => {
			if (!opts.all && names.length === 0) {
				throw new UserInputError('Give changelist names or --all');
			}
			onParsed({ kind: 'delete', names, all: opts.all === true });
		});

	program
		.command('status [names...]')
		.alias('st')
		.description('Show files grouped by changelist')
		.option('--include-no-cl', 'Also list unassigned files when filtering by name')
		.option('-a, --all', 'Show files with unusual status codes')
		.action((names: string[], opts: { includeNoCl?: boolean; all?: boolean }) => {
			const command: ParsedCommand = {
				kind: 'status',
				names,
				includeUnassigned: names.length === 0 || opts.includeNoCl === true,
			};
			if (opts.all) {
				command.showAll = true;
			}
			onParsed(command);
		});

	program
		.command('stage <name>')
		.description('Stage the tracked files of a changelist')
		.option('--delete', 'Delete the changelist afterwards')
		.action((name: string, opts: { delete?: boolean }) =>
			onParsed({ kind: 'stage', name, deleteAfter: opts.delete === true })
		);

	program
		.command('unstage <name>')
		.description('Unstage the files of a changelist')
		.option('--delete', 'Delete the changelist afterwards')
		.action((name: string, opts: { delete?: boolean }) =>
			onParsed({ kind: 'unstage', name, deleteAfter: opts.delete === true })
		);

	program
		.command('commit <name>')
		.alias('ci')
		.description('Commit the tracked files of a changelist')
		.option('-m, --message <message>', 'Commit message')
		.option('-F, --file <path>', 'Read the commit message from a file')
		.option('--keep', 'Keep the files in the changelist after committing')
		.action((name: string, opts: { message?: string; file?: string; keep?: boolean }) =>
			onParsed({ kind: 'commit', name, message: commitMessage(opts), keep: opts.keep === true })
		);

	program
		.command('diff <names...>')
		.description('Show the diff of one or more changelists')
		.option('--staged', 'Diff the index instead of the working tree')
		.action((names: string[], opts: { staged?: boolean }) =>
			onParsed({ kind: 'diff', names, staged: opts.staged === true })
		);

	program
		.command('checkout <names...>')
		.alias('co')
		.description('Discard the changes in one or more changelists')
		.option('--delete', 'Delete the changelists afterwards')
		.option('--force', 'Do not ask for confirmation')
		.action((names: string[], opts: { delete?: boolean; force?: boolean }) =>
			onParsed({ kind: 'checkout', names, deleteAfter: opts.delete === true, force: opts.force === true })
		);

	program
		.command('stash [name]')
		.alias('sh')
		.description('Shelve a changelist (or all of them) with git stash')
		.option('--all', 'Shelve every changelist')
		.action((name: string | undefined, opts: { all?: boolean }) =>
			onParsed({ kind: 'stash', target: selection(name, opts.all, 'stash') })
		);

	program
		.command('unstash [name]')
		.alias('us')
		.description('Restore a shelved changelist (or all of them)')
		.option('--all', 'Restore every shelved changelist')
		.option('--force', 'Skip the branch check and the conflict check')
		.action((name: string | undefined, opts: { all?: boolean; force?: boolean }) =>
			onParsed({ kind: 'unstash', target: selection(name, opts.all, 'unstash'), force: opts.force === true })
		);

	program
		.command('branch <name> [branch]')
		.alias('br')
		.description('Move a changelist onto a new branch, shelving all the others')
		.option('--from <base>', 'Create the branch from this ref instead of HEAD')
		.action((name: string, branch: string | undefined, opts: { from?: string }) => {
			const command: ParsedCommand = { kind: 'branch', name };
			if (branch !== undefined) {
				command.branch = branch;
			}
			if (opts.from !== undefined) {
				command.base = opts.from;
			}
			onParsed(command);
		});

	return program;
}

/** Parse argv (without the node and script entries). */
export async function parseArgs(argv: readonly string[], sink: OutputSink): Promise<ParsedArgs | ParseExit> {
	let parsed: ParsedCommand | undefined;
	const program = createProgram(sink, command => {
		parsed = command;
	});
	try {
		await program.parseAsync([...argv], { from: 'user' });
	} catch (err) {
		if (err instanceof CommanderError) {
			return { exitCode: err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_ARGUMENT };
		}
		throw err;
	}
	if (parsed === undefined) {
		return { exitCode: EXIT_CODES.INVALID_ARGUMENT };
	}
	const opts = program.opts<{ verbose: boolean; quiet: boolean; color: boolean }>();
	return { command: parsed, globals: { verbose: opts.verbose, quiet: opts.quiet, color: opts.color } };
}

async function confirmWithPrompt(message: string): Promise<boolean> {
	const response = await prompts(
		{ type: 'confirm', name: 'value', message, initial: false },
		{
			onCancel: () => {
				throw new InterruptedError();
			},
		}
	);
	return response.value === true;
}

/** Run one command; resolves to the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
	const envColor = deps.env.NO_COLOR === undefined || deps.env.NO_COLOR === '';
	const logger = new ConsoleLogger({ color: envColor }, deps.sink);
	try {
		const result = await parseArgs(argv, deps.sink);
		if ('exitCode' in result) {
			return result.exitCode;
		}
		const { command, globals } = result;
		const overrides: Partial<ChangelistConfig> = {};
		if (!globals.color) {
			overrides.color = false;
		}
		logger.configure({ verbose: globals.verbose, quiet: globals.quiet, color: globals.color && envColor });

		const ws = await (deps.open ?? openWorkspace)({ cwd: deps.cwd, env: deps.env, logger, overrides });
		logger.configure({ color: ws.config.color });
		return await execute(command, ws, { logger, confirm: deps.confirm ?? confirmWithPrompt });
	} catch (err) {
		const error = toChangelistError(err);
		logger.error(formatError(error));
		return error.exitCode;
	}
}

interface ExecuteContext {
	logger: ConsoleLogger;
	confirm: (message: string) => Promise<boolean>;
}

/** Dispatch a parsed command. Every kind is handled; the compiler checks it. */
export async function execute(command: ParsedCommand, ws: Workspace, ctx: ExecuteContext): Promise<number> {
	const { logger } = ctx;
	const engine = new ChangelistEngine(ws);
	const shelver = new ShelveCoordinator(ws);

	switch (command.kind) {
		case 'add': {
			const result = await engine.assign(command.name, command.files);
			logger.success(`Added ${result.added.length} file(s) to "${command.name}"`);
			return EXIT_CODES.SUCCESS;
		}
		case 'remove': {
			const removed = await engine.unassign(command.files, command.name);
			logger.success(`Removed ${removed.length} file(s) from "${command.name}"`);
			return EXIT_CODES.SUCCESS;
		}
		case 'delete': {
			const deleted = command.all ? await engine.deleteAll() : await engine.delete(command.names);
			logger.success(deleted.length > 0 ? `Deleted ${deleted.join(', ')}` : 'No changelists to delete');
			return EXIT_CODES.SUCCESS;
		}
		case 'status': {
			const status = await engine.groupedStatus({
				names: command.names.length > 0 ? command.names : undefined,
				includeUnassigned: command.includeUnassigned,
				showAll: command.showAll,
			});
			for (const line of formatStatus(status, { style: logger.chalk, display: p => engine.display(p) })) {
				logger.info(line);
			}
			return EXIT_CODES.SUCCESS;
		}
		case 'stage': {
			const staged = await engine.stage(command.name, { deleteAfter: command.deleteAfter });
			logger.success(`Staged ${staged.length} file(s) from "${command.name}"`);
			return EXIT_CODES.SUCCESS;
		}
		case 'unstage': {
			const unstaged = await engine.unstage(command.name, { deleteAfter: command.deleteAfter });
			logger.success(`Unstaged ${unstaged.length} file(s) from "${command.name}"`);
			return EXIT_CODES.SUCCESS;
		}
		case 'commit': {
			const committed = await engine.commit(command.name, { message: command.message, keep: command.keep });
			if (committed.length > 0) {
				logger.success(`Committed ${committed.length} file(s) from "${command.name}"`);
			}
			return EXIT_CODES.SUCCESS;
		}
		case 'diff': {
			const output = await engine.diff(command.names, { staged: command.staged });
			if (output.length > 0) {
				logger.info(output.replace(/\n$/, ''));
			}
			return EXIT_CODES.SUCCESS;
		}
		case 'checkout': {
			if (!command.force) {
				const ok = await ctx.confirm(`Discard all changes in ${command.names.join(', ')}?`);
				if (!ok) {
					logger.info('Aborted');
					return EXIT_CODES.SUCCESS;
				}
			}
			const reverted = await engine.checkout(command.names, { deleteAfter: command.deleteAfter });
			logger.success(`Reverted ${reverted.length} file(s)`);
			return EXIT_CODES.SUCCESS;
		}
		case 'stash': {
			if (command.target.all) {
				const result = await shelver.shelveAll();
				for (const entry of result.shelved) {
					logger.success(`Shelved "${entry.name}" (${entry.record.files.length} file(s))`);
				}
				for (const name of result.skipped) {
					logger.warn(`Nothing to shelve in "${name}"; left active`);
				}
				return EXIT_CODES.SUCCESS;
			}
			const record = await shelver.shelveOne(command.target.name);
			logger.success(`Shelved "${command.target.name}" (${record.files.length} file(s))`);
			return EXIT_CODES.SUCCESS;
		}
		case 'unstash': {
			if (command.target.all) {
				const result = await shelver.restoreAll({ force: command.force });
				for (const restored of result.restored) {
					logger.success(`Restored "${restored.name}"`);
				}
				for (const failure of result.failed) {
					logger.error(`Could not restore "${failure.name}": ${failure.reason}`);
				}
				return result.failed.length > 0 ? EXIT_CODES.GENERAL_ERROR : EXIT_CODES.SUCCESS;
			}
			await shelver.restoreOne(command.target.name, { force: command.force });
			logger.success(`Restored "${command.target.name}"`);
			return EXIT_CODES.SUCCESS;
		}
		case 'branch': {
			const report = await new BranchPromotion(ws).promote({ name: command.name, branch: command.branch, base: command.base });
			if (report.state === 'done') {
				logger.success(`Created branch "${report.branch}" with changelist "${report.target}"`);
				const others = report.shelved.filter(name => name !== report.target);
				if (others.length > 0) {
					logger.info(`Still shelved: ${others.join(', ')}`);
				}
				return EXIT_CODES.SUCCESS;
			}
			const failure = report.failure ?? toChangelistError(new Error('Branch promotion failed'));
			logger.error(formatError(failure));
			if (report.unrecovered.length === 0) {
				logger.info('Rolled back; all changelists are restored');
			} else {
				logger.error('These changelists are still shelved and need attention:');
				for (const item of report.unrecovered) {
					logger.error(`  ${item.name}: ${item.reason}`);
				}
			}
			return failure.exitCode;
		}
		default:
			return assertNever(command);
	}
}

function assertNever(value: never): never {
	throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}

/** Entry point used by bin.ts. */
export async function main(): Promise<void> {
	process.once('SIGINT', () => {
		processSink.err(formatError(new InterruptedError()));
		process.exit(EXIT_CODES.USER_INTERRUPT);
	});
	process.exitCode = await runCli(process.argv.slice(2), { cwd: process.cwd(), env: process.env, sink: processSink });
}
