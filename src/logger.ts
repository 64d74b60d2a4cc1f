import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	/** Only shown with --verbose */
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	/** info level, prefixed with a check mark */
	success(message: string): void;
}

export interface LoggerOptions {
	/** Show debug output */
	verbose?: boolean;
	/** Errors only */
	quiet?: boolean;
	color?: boolean;
}

/** Where console output goes; defaults to the process streams. */
export interface OutputSink {
	out(text: string): void;
	err(text: string): void;
}

export const processSink: OutputSink = {
	out: text => process.stdout.write(text + '\n'),
	err: text => process.stderr.write(text + '\n'),
};

/**
 * Logger for terminal output. Normal output goes to stdout, warnings and
 * errors to stderr.
 */
export class ConsoleLogger implements Logger {
	private options: Required<LoggerOptions>;
	private style: chalk.Chalk;

	constructor(options: LoggerOptions = {}, private readonly sink: OutputSink = processSink) {
		this.options = { verbose: false, quiet: false, color: true, ...options };
		this.style = createStyle(this.options.color);
	}

	configure(options: LoggerOptions): void {
		this.options = { ...this.options, ...options };
		this.style = createStyle(this.options.color);
	}

	/** Chalk instance honouring the color setting, for callers that render their own output. */
	get chalk(): chalk.Chalk {
		return this.style;
	}

	debug(message: string): void {
		if (this.shouldOutput('debug')) {
			this.sink.err(this.style.gray(`[debug] ${message}`));
		}
	}

	info(message: string): void {
		if (this.shouldOutput('info')) {
			this.sink.out(message);
		}
	}

	warn(message: string): void {
		if (this.shouldOutput('warn')) {
			this.sink.err(this.style.yellow(`${this.style.bold('warning:')} ${message}`));
		}
	}

	error(message: string): void {
		this.sink.err(this.style.red(`${this.style.bold('error:')} ${message}`));
	}

	success(message: string): void {
		if (this.shouldOutput('info')) {
			this.sink.out(`${this.style.green('✓')} ${message}`);
		}
	}

	private shouldOutput(level: LogLevel): boolean {
		if (this.options.quiet) {
			return level === 'error';
		}
		if (level === 'debug') {
			return this.options.verbose;
		}
		return true;
	}
}

function createStyle(color: boolean): chalk.Chalk {
	return color ? new chalk.Instance() : new chalk.Instance({ level: 0 });
}

/** Discards everything. */
export const silentLogger: Logger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
	success: () => undefined,
};
