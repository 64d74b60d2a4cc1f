/**
 * Process exit codes. Usage errors from the argument parser also exit with
 * INVALID_ARGUMENT.
 */
export const EXIT_CODES = {
	SUCCESS: 0,
	GENERAL_ERROR: 1,
	INVALID_ARGUMENT: 2,
	NOT_FOUND: 3,
	EXTERNAL_TOOL: 4,
	LOCK_CONTENTION: 5,
	CONSISTENCY: 6,
	USER_INTERRUPT: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type ErrorCode =
	| 'USER_INPUT'
	| 'NOT_FOUND'
	| 'EXTERNAL_TOOL'
	| 'LOCK_CONTENTION'
	| 'CONSISTENCY'
	| 'RESTORE_BLOCKED'
	| 'USER_INTERRUPT'
	| 'INTERNAL_ERROR';

export interface StructuredError {
	code: ErrorCode;
	message: string;
	exitCode: ExitCode;
	suggestion?: string;
}

/** Base class for every error this tool reports to the user. */
export class ChangelistError extends Error implements StructuredError {
	readonly code: ErrorCode;
	readonly exitCode: ExitCode;
	readonly suggestion?: string;

	constructor(error: StructuredError) {
		super(error.message);
		this.name = 'ChangelistError';
		this.code = error.code;
		this.exitCode = error.exitCode;
		this.suggestion = error.suggestion;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** Invalid changelist name, unsafe path, bad flag combination. No state was changed. */
export class UserInputError extends ChangelistError {
	constructor(message: string, suggestion?: string) {
		super({ code: 'USER_INPUT', message, exitCode: EXIT_CODES.INVALID_ARGUMENT, suggestion });
		this.name = 'UserInputError';
	}
}

export class NotFoundError extends ChangelistError {
	constructor(message: string, suggestion?: string) {
		super({ code: 'NOT_FOUND', message, exitCode: EXIT_CODES.NOT_FOUND, suggestion });
		this.name = 'NotFoundError';
	}
}

export interface ExternalToolFailure {
	/** e.g. `git stash push` */
	command: string;
	/** Exit status of the subprocess, if it ran at all */
	status: number | null;
	/** The tool's own diagnostic text */
	stderr: string;
}

/** A subprocess exited non-zero. The tool's own message is kept verbatim. */
export class ExternalToolError extends ChangelistError {
	readonly command: string;
	readonly status: number | null;
	readonly stderr: string;

	constructor(failure: ExternalToolFailure, suggestion?: string) {
		const detail = failure.stderr.trim();
		super({
			code: 'EXTERNAL_TOOL',
			message: detail ? `${failure.command} failed: ${detail}` : `${failure.command} failed`,
			exitCode: EXIT_CODES.EXTERNAL_TOOL,
			suggestion,
		});
		this.name = 'ExternalToolError';
		this.command = failure.command;
		this.status = failure.status;
		this.stderr = failure.stderr;
	}
}

export class LockContentionError extends ChangelistError {
	readonly lockPath: string;
	readonly holderPid: number | null;

	constructor(lockPath: string, holderPid: number | null) {
		const holder = holderPid === null ? 'another process' : `process ${holderPid}`;
		super({
			code: 'LOCK_CONTENTION',
			message: `Metadata is locked by ${holder}: ${lockPath}`,
			exitCode: EXIT_CODES.LOCK_CONTENTION,
			suggestion: 'Wait for the other invocation to finish and try again.',
		});
		this.name = 'LockContentionError';
		this.lockPath = lockPath;
		this.holderPid = holderPid;
	}
}

/**
 * Stored metadata disagrees with the repository, e.g. a shelved record whose
 * shelf entry is gone. Records are never discarded automatically.
 */
export class ConsistencyError extends ChangelistError {
	constructor(message: string, suggestion: string) {
		super({ code: 'CONSISTENCY', message, exitCode: EXIT_CODES.CONSISTENCY, suggestion });
		this.name = 'ConsistencyError';
	}
}

/** Raised before a shelf pop that would collide with the working tree. */
export class RestoreBlockedError extends ChangelistError {
	readonly blocking: readonly string[];

	constructor(name: string, blocking: readonly string[], suggestions: readonly string[]) {
		super({
			code: 'RESTORE_BLOCKED',
			message: `Cannot restore "${name}": ${blocking.length} file(s) would conflict with the working tree: ${blocking.join(', ')}`,
			exitCode: EXIT_CODES.INVALID_ARGUMENT,
			suggestion: suggestions.join('\n'),
		});
		this.name = 'RestoreBlockedError';
		this.blocking = blocking;
	}
}

/** The user cancelled a prompt or pressed Ctrl-C. */
export class InterruptedError extends ChangelistError {
	constructor() {
		super({ code: 'USER_INTERRUPT', message: 'Interrupted by user', exitCode: EXIT_CODES.USER_INTERRUPT });
		this.name = 'InterruptedError';
	}
}

export function isChangelistError(value: unknown): value is ChangelistError {
	return value instanceof ChangelistError;
}

export function toChangelistError(error: unknown): ChangelistError {
	if (isChangelistError(error)) {
		return error;
	}

	if (error instanceof Error) {
		return new ChangelistError({
			code: 'INTERNAL_ERROR',
			message: error.message,
			exitCode: EXIT_CODES.GENERAL_ERROR,
		});
	}

	return new ChangelistError({
		code: 'INTERNAL_ERROR',
		message: `Unknown error: ${String(error)}`,
		exitCode: EXIT_CODES.GENERAL_ERROR,
	});
}

/** Error message followed by its suggestion lines, indented. */
export function formatError(error: ChangelistError): string {
	const lines = [error.message];
	if (error.suggestion) {
		for (const line of error.suggestion.split('\n')) {
			lines.push(`  hint: ${line}`);
		}
	}
	return lines.join('\n');
}

/** `e.message` for Errors, `String(e)` otherwise. */
export function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
