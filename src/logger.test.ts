import { describe, it, expect } from 'vitest';
import { ConsoleLogger } from './logger';
import { RecordingSink } from './testHelpers';

function setup(options: { verbose?: boolean; quiet?: boolean } = {}) {
	const sink = new RecordingSink();
	const logger = new ConsoleLogger({ color: false, ...options }, sink);
	return { sink, logger };
}

describe('ConsoleLogger', () => {
	it('writes info and success to stdout', () => {
		const { sink, logger } = setup();
		logger.info('hello');
		logger.success('done');
		expect(sink.stdout).toEqual(['hello', '✓ done']);
		expect(sink.stderr).toEqual([]);
	});

	it('writes warnings and errors to stderr with a prefix', () => {
		const { sink, logger } = setup();
		logger.warn('careful');
		logger.error('broken');
		expect(sink.stderr).toEqual(['warning: careful', 'error: broken']);
	});

	it('hides debug output unless verbose', () => {
		const quietDebug = setup();
		quietDebug.logger.debug('hidden');
		expect(quietDebug.sink.stderr).toEqual([]);

		const verbose = setup({ verbose: true });
		verbose.logger.debug('shown');
		expect(verbose.sink.stderr).toEqual(['[debug] shown']);
	});

	it('shows only errors when quiet', () => {
		const { sink, logger } = setup({ quiet: true, verbose: true });
		logger.debug('d');
		logger.info('i');
		logger.success('s');
		logger.warn('w');
		logger.error('e');
		expect(sink.stdout).toEqual([]);
		expect(sink.stderr).toEqual(['error: e']);
	});

	it('can be reconfigured after construction', () => {
		const { sink, logger } = setup();
		logger.configure({ quiet: true });
		logger.info('hidden');
		expect(sink.stdout).toEqual([]);
	});

	it('emits no escape codes with color off', () => {
		const { logger } = setup();
		expect(logger.chalk.red('x')).toBe('x');
	});
});
