import chalk from 'chalk';
import { FileStatus, GroupedStatus } from './changelistEngine';

export interface FormatOptions {
	style: chalk.Chalk;
	/** Storage path → what the user sees, usually caller-relative */
	display: (storagePath: string) => string;
}

/**
 * Map a 2-char git porcelain status to a colored label.
 */
export function colorizeStatus(code: string, style: chalk.Chalk): string {
	if (code === '??') {
		return style.green(code);
	}

	const index = code[0];
	const working = code[1];

	// Conflicts
	if (index === 'U' || working === 'U' || code === 'AA' || code === 'DD') {
		return style.red.bold(code);
	}

	// Deleted
	if (working === 'D' || index === 'D') {
		return style.red(code);
	}

	// Added
	if (index === 'A') {
		return style.green(code);
	}

	// Modified, renamed, copied
	if (/[MTRC]/.test(code)) {
		return style.yellow(code);
	}

	return code;
}

function fileLine(file: FileStatus, options: FormatOptions): string {
	const label = file.code === null ? '  ' : colorizeStatus(file.code, options.style);
	return `  [${label}] ${options.display(file.path)}`;
}

/** Render grouped status as output lines. */
export function formatStatus(status: GroupedStatus, options: FormatOptions): string[] {
	const { style } = options;
	const lines: string[] = [];

	for (const group of status.changelists) {
		lines.push(`${style.bold.cyan(group.name)}:`);
		for (const file of group.files) {
			lines.push(fileLine(file, options));
		}
	}

	if (status.unassigned.length > 0) {
		lines.push(`${style.bold('No Changelist')}:`);
		for (const file of status.unassigned) {
			lines.push(fileLine(file, options));
		}
	}

	if (status.shelved.length > 0) {
		lines.push(`${style.bold('Shelved')}:`);
		for (const shelf of status.shelved) {
			const count = `${shelf.files.length} file${shelf.files.length !== 1 ? 's' : ''}`;
			lines.push(`  ${style.cyan(shelf.name)} ${style.dim(`(${count}, from ${shelf.sourceBranch}, ${shelf.timestamp})`)}`);
			for (const file of shelf.files) {
				lines.push(`    ${style.dim(options.display(file))}`);
			}
		}
	}

	if (lines.length === 0) {
		lines.push(style.dim('No changelists.'));
	}

	if (status.suppressed > 0) {
		lines.push(style.dim(`(${status.suppressed} file(s) with other status codes hidden; use --all to show them)`));
	}

	if (status.interruptedPromotion) {
		const { marker, names } = status.interruptedPromotion;
		lines.push(
			style.yellow(`Promotion of "${marker.target}" to branch "${marker.branch}" was interrupted; still shelved: ${names.join(', ')}`)
		);
	}

	return lines;
}
