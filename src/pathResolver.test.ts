import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { normalizeGitPath, sanitizePath, sanitizePaths, toAbsolute, toCallerRelative } from './pathResolver';

const everything = () => true;

describe('sanitizePath', () => {
	it('converts a root-relative path to storage form', () => {
		expect(sanitizePath('src/a.ts', '/repo', { exists: everything })).toEqual({
			ok: true,
			input: 'src/a.ts',
			path: 'src/a.ts',
			exists: true,
		});
	});

	it('resolves relative paths against the caller directory', () => {
		const result = sanitizePath('a.ts', '/repo', { cwd: '/repo/src', exists: everything });
		expect(result).toMatchObject({ ok: true, path: 'src/a.ts' });
	});

	it('allows walking up as long as the path stays inside the repository', () => {
		const result = sanitizePath('../README.md', '/repo', { cwd: '/repo/src', exists: everything });
		expect(result).toMatchObject({ ok: true, path: 'README.md' });
	});

	it('accepts absolute paths inside the repository', () => {
		expect(sanitizePath('/repo/docs/guide.md', '/repo', { exists: everything })).toMatchObject({
			ok: true,
			path: 'docs/guide.md',
		});
	});

	it('collapses redundant segments', () => {
		expect(sanitizePath('./src//lib/../a.ts', '/repo', { exists: everything })).toMatchObject({
			ok: true,
			path: 'src/a.ts',
		});
	});

	it('rejects an empty path', () => {
		expect(sanitizePath('', '/repo')).toEqual({
			ok: false,
			input: '',
			reason: 'empty',
			message: 'File path cannot be empty',
		});
	});

	it('rejects paths that escape the repository', () => {
		expect(sanitizePath('../outside.txt', '/repo', { exists: everything })).toMatchObject({
			ok: false,
			reason: 'outside-repo',
			message: 'Path is outside the repository: ../outside.txt',
		});
		expect(sanitizePath('/etc/passwd', '/repo', { exists: everything })).toMatchObject({ ok: false, reason: 'outside-repo' });
	});

	it('rejects a sibling directory sharing the root prefix', () => {
		expect(sanitizePath('/repo-other/a.ts', '/repo', { exists: everything })).toMatchObject({ ok: false, reason: 'outside-repo' });
	});

	it('rejects the repository root itself', () => {
		expect(sanitizePath('.', '/repo', { exists: everything })).toMatchObject({ ok: false, reason: 'outside-repo' });
	});

	it('rejects paths inside the git directory', () => {
		expect(sanitizePath('.git/config', '/repo', { exists: everything })).toMatchObject({
			ok: false,
			reason: 'outside-repo',
			message: 'Path is inside the git directory: .git/config',
		});
	});

	it('does not confuse .gitignore with the git directory', () => {
		expect(sanitizePath('.gitignore', '/repo', { exists: everything })).toMatchObject({ ok: true, path: '.gitignore' });
	});

	it('rejects control characters and shell metacharacters', () => {
		for (const bad of ['a;b', 'a|b', 'a&b', 'a`b', '$HOME', 'line\nbreak']) {
			expect(sanitizePath(bad, '/repo', { exists: everything })).toMatchObject({ ok: false, reason: 'dangerous-character' });
		}
	});

	it('reports missing files without rejecting them by default', () => {
		expect(sanitizePath('gone.ts', '/repo', { exists: () => false })).toMatchObject({ ok: true, exists: false });
	});

	it('rejects missing files when existence is required', () => {
		expect(sanitizePath('gone.ts', '/repo', { exists: () => false, requireExists: true })).toMatchObject({
			ok: false,
			reason: 'nonexistent',
			message: 'Path does not exist: gone.ts',
		});
	});

	it('probes existence with the absolute path', () => {
		const probed: string[] = [];
		sanitizePath('a.ts', '/repo', {
			cwd: 'src',
			exists: p => {
				probed.push(p);
				return true;
			},
		});
		expect(probed).toEqual(['/repo/src/a.ts']);
	});
});

describe('sanitizePath with symbolic links', () => {
	let tmpDir: string;
	let repo: string;
	let outside: string;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cl-paths-'));
		repo = path.join(tmpDir, 'repo');
		outside = path.join(tmpDir, 'outside');
		fs.mkdirSync(path.join(repo, 'real'), { recursive: true });
		fs.mkdirSync(outside);
		fs.writeFileSync(path.join(outside, 'secret'), 'x');
	});

	afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	it('rejects a path that leaves the repository through a linked directory', () => {
		fs.symlinkSync(outside, path.join(repo, 'link'), 'dir');
		expect(sanitizePath('link/secret', repo)).toMatchObject({
			ok: false,
			reason: 'outside-repo',
			message: 'Path leads outside the repository through a symbolic link: link/secret',
		});
	});

	it('stores the real location of a path under a linked directory inside the repository', () => {
		fs.symlinkSync(path.join(repo, 'real'), path.join(repo, 'alias'), 'dir');
		expect(sanitizePath('alias/a.ts', repo)).toMatchObject({ ok: true, path: 'real/a.ts', exists: false });
	});

	it('keeps a linked file as the link itself', () => {
		fs.symlinkSync(path.join(outside, 'secret'), path.join(repo, 'shortcut'));
		expect(sanitizePath('shortcut', repo)).toMatchObject({ ok: true, path: 'shortcut', exists: true });
	});
});

describe('sanitizePaths', () => {
	it('separates accepted, rejected and missing paths', () => {
		const result = sanitizePaths(['a.ts', '../x', 'b.ts', 'a.ts'], '/repo', { exists: p => p !== '/repo/b.ts' });
		expect(result.accepted).toEqual(['a.ts', 'b.ts']);
		expect(result.missing).toEqual(['b.ts']);
		expect(result.rejected.map(r => r.input)).toEqual(['../x']);
	});

	it('deduplicates different spellings of the same file', () => {
		const result = sanitizePaths(['src/a.ts', './src/a.ts', '/repo/src/a.ts'], '/repo', { exists: everything });
		expect(result.accepted).toEqual(['src/a.ts']);
	});
});

describe('toAbsolute / toCallerRelative', () => {
	it('joins the storage path onto the root', () => {
		expect(toAbsolute('src/a.ts', '/repo')).toBe('/repo/src/a.ts');
	});

	it('renders paths relative to the caller directory', () => {
		expect(toCallerRelative('src/a.ts', '/repo/src', '/repo')).toBe('a.ts');
		expect(toCallerRelative('README.md', '/repo/src/lib', '/repo')).toBe('../../README.md');
		expect(toCallerRelative('src/a.ts', '/repo', '/repo')).toBe('src/a.ts');
	});

	it('renders the caller directory itself as a dot', () => {
		expect(toCallerRelative('src', '/repo/src', '/repo')).toBe('.');
	});

	it('returns to the same storage path from any working directory', () => {
		for (const cwd of ['/repo', '/repo/src', '/repo/docs/deep']) {
			const shown = toCallerRelative('src/lib/util.ts', cwd, '/repo');
			expect(sanitizePath(shown, '/repo', { cwd, exists: everything })).toMatchObject({ ok: true, path: 'src/lib/util.ts' });
		}
	});
});

describe('normalizeGitPath', () => {
	it('strips trailing slashes and redundant segments', () => {
		expect(normalizeGitPath('dir/')).toBe('dir');
		expect(normalizeGitPath('a/./b')).toBe('a/b');
		expect(normalizeGitPath('src/a.ts')).toBe('src/a.ts');
	});
});
