import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ChangelistData, Changelists, changelistCodec, createChangelistStore, validateChangelistName } from './changelistStore';
import { DocumentStore } from './documentStore';
import { ConsistencyError } from './errors';

// ── validateChangelistName ──────────────────────────────────────────────────

describe('validateChangelistName', () => {
	it('accepts valid names', () => {
		expect(validateChangelistName('my-feature')).toBeNull();
		expect(validateChangelistName('bugfix_123')).toBeNull();
		expect(validateChangelistName('v1.0.0')).toBeNull();
		expect(validateChangelistName('a')).toBeNull();
		expect(validateChangelistName('A-Z_0.9')).toBeNull();
	});

	it('rejects empty name', () => {
		expect(validateChangelistName('')).toBe('Changelist name cannot be empty');
	});

	it('rejects name exceeding max length', () => {
		const longName = 'a'.repeat(101);
		expect(validateChangelistName(longName)).toContain('at most 100 characters');
	});

	it('accepts name at max length', () => {
		const exactName = 'a'.repeat(100);
		expect(validateChangelistName(exactName)).toBeNull();
	});

	it('rejects names with spaces', () => {
		expect(validateChangelistName('my feature')).toContain('alphanumeric');
	});

	it('rejects names with special characters', () => {
		expect(validateChangelistName('feat/branch')).toContain('alphanumeric');
		expect(validateChangelistName('feat@2')).toContain('alphanumeric');
		expect(validateChangelistName('a b')).toContain('alphanumeric');
		expect(validateChangelistName('foo!bar')).toContain('alphanumeric');
		expect(validateChangelistName('a~b')).toContain('alphanumeric');
	});

	it('rejects git reserved words', () => {
		expect(validateChangelistName('HEAD')).toContain('reserved git name');
		expect(validateChangelistName('FETCH_HEAD')).toContain('reserved git name');
		expect(validateChangelistName('ORIG_HEAD')).toContain('reserved git name');
		expect(validateChangelistName('MERGE_HEAD')).toContain('reserved git name');
		expect(validateChangelistName('CHERRY_PICK_HEAD')).toContain('reserved git name');
		expect(validateChangelistName('REVERT_HEAD')).toContain('reserved git name');
		expect(validateChangelistName('BISECT_HEAD')).toContain('reserved git name');
		expect(validateChangelistName('stash')).toContain('reserved git name');
		expect(validateChangelistName('refs')).toContain('reserved git name');
		expect(validateChangelistName('objects')).toContain('reserved git name');
		expect(validateChangelistName('packed-refs')).toContain('reserved git name');
	});

	it('accepts names similar to but not exactly reserved words', () => {
		expect(validateChangelistName('head')).toBeNull(); // case-sensitive
		expect(validateChangelistName('HEAD2')).toBeNull();
		expect(validateChangelistName('my-stash')).toBeNull();
	});

	it('rejects dots-only names', () => {
		expect(validateChangelistName('.')).toContain('only dots');
		expect(validateChangelistName('..')).toContain('only dots');
		expect(validateChangelistName('...')).toContain('only dots');
	});

	it('accepts dot-prefixed (hidden-style) names', () => {
		expect(validateChangelistName('.hidden')).toBeNull();
		expect(validateChangelistName('.config')).toBeNull();
	});

	it('does not reserve common branch names', () => {
		expect(validateChangelistName('main')).toBeNull();
		expect(validateChangelistName('master')).toBeNull();
		expect(validateChangelistName('status')).toBeNull();
		expect(validateChangelistName('add')).toBeNull();
	});

	it('rejects additional special characters', () => {
		expect(validateChangelistName('a^b')).toContain('alphanumeric');
		expect(validateChangelistName('a*b')).toContain('alphanumeric');
		expect(validateChangelistName('a:b')).toContain('alphanumeric');
	});

	it('rejects very long names (200 chars)', () => {
		const longName = 'a'.repeat(200);
		expect(validateChangelistName(longName)).toContain('at most 100 characters');
	});

	it('accepts moderate-length names (50 chars)', () => {
		const name = 'a'.repeat(50);
		expect(validateChangelistName(name)).toBeNull();
	});
});

// ── changelistCodec ─────────────────────────────────────────────────────────

describe('changelistCodec', () => {
	it('keeps valid entries', () => {
		const data = { feature: ['src/a.ts', 'src/b.ts'], bugfix: ['fix.ts'] };
		expect(changelistCodec.parse(data, 'cl.json')).toEqual(data);
	});

	it('filters out invalid entries (non-string-array values)', () => {
		const data = { valid: ['a.ts'], invalid: 'not-array', mixed: [1, 'b.ts'] };
		expect(changelistCodec.parse(data, 'cl.json')).toEqual({ valid: ['a.ts'] });
	});

	it('keeps only the first owner of a path listed twice', () => {
		const data = { first: ['shared.ts', 'a.ts'], second: ['shared.ts', 'b.ts'] };
		expect(changelistCodec.parse(data, 'cl.json')).toEqual({ first: ['shared.ts', 'a.ts'], second: ['b.ts'] });
	});

	it('rejects non-object JSON (array)', () => {
		expect(() => changelistCodec.parse(['a', 'b'], 'cl.json')).toThrow(ConsistencyError);
	});

	it('rejects null JSON', () => {
		expect(() => changelistCodec.parse(null, 'cl.json')).toThrow('does not contain a JSON object: cl.json');
	});

	it('reads and writes a changelist named __proto__', () => {
		const parsed = changelistCodec.parse(JSON.parse('{"__proto__": ["a.ts"]}'), 'cl.json');
		expect(Object.keys(parsed)).toEqual(['__proto__']);
		expect(JSON.stringify(changelistCodec.serialize(parsed))).toBe('{"__proto__":["a.ts"]}');
	});

	it('prunes empty changelists on serialize', () => {
		expect(changelistCodec.serialize({ empty: [], filled: ['a.ts'] })).toEqual({ filled: ['a.ts'] });
	});
});

// ── file-backed store ───────────────────────────────────────────────────────

describe('createChangelistStore', () => {
	let tmpDir: string;
	let gitDir: string;
	let store: DocumentStore<ChangelistData>;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cl-test-'));
		gitDir = path.join(tmpDir, '.git');
		fs.mkdirSync(gitDir);
		store = createChangelistStore(gitDir, { timeoutMs: 100 });
	});

	afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	it('stores cl.json inside the git directory', () => {
		expect(store.location).toBe(path.join(gitDir, 'cl.json'));
	});

	it('loads empty data when file does not exist', () => {
		expect(store.load()).toEqual({});
	});

	it('loads valid cl.json', () => {
		const data = { feature: ['src/a.ts', 'src/b.ts'], bugfix: ['fix.ts'] };
		fs.writeFileSync(path.join(gitDir, 'cl.json'), JSON.stringify(data));
		expect(store.load()).toEqual(data);
		expect(Object.keys(store.load())).toEqual(['feature', 'bugfix']);
	});

	it('refuses malformed JSON and leaves the file alone', () => {
		fs.writeFileSync(path.join(gitDir, 'cl.json'), 'not json!');
		expect(() => store.load()).toThrow(ConsistencyError);
		expect(fs.readFileSync(path.join(gitDir, 'cl.json'), 'utf-8')).toBe('not json!');
	});

	it('saves pretty-printed JSON without empty changelists', () => {
		store.save({ empty: [], filled: ['src/a.ts'] });
		const raw = fs.readFileSync(path.join(gitDir, 'cl.json'), 'utf-8');
		expect(raw).toBe('{\n  "filled": [\n    "src/a.ts"\n  ]\n}\n');
	});

	it('honours a custom file name', () => {
		const custom = createChangelistStore(gitDir, { timeoutMs: 100 }, 'groups.json');
		custom.save({ a: ['1.ts'] });
		expect(fs.existsSync(path.join(gitDir, 'groups.json'))).toBe(true);
	});

	it('preserves data through save and reload', () => {
		const changelists = new Changelists();
		changelists.addFiles('feature', ['src/a.ts', 'src/b.ts']);
		changelists.addFiles('bugfix', ['fix.ts']);
		store.save(changelists.toData());

		const reloaded = new Changelists(createChangelistStore(gitDir, { timeoutMs: 100 }).load());
		expect(reloaded.getFiles('feature')).toEqual(['src/a.ts', 'src/b.ts']);
		expect(reloaded.getFiles('bugfix')).toEqual(['fix.ts']);
	});
});

// ── Changelists ─────────────────────────────────────────────────────────────

describe('Changelists', () => {
	let changelists: Changelists;

	beforeEach(() => {
		changelists = new Changelists();
	});

	describe('addFiles', () => {
		it('adds files to a new changelist', () => {
			changelists.addFiles('feature', ['src/a.ts', 'src/b.ts']);
			expect(changelists.getFiles('feature')).toEqual(['src/a.ts', 'src/b.ts']);
		});

		it('adds files to an existing changelist', () => {
			changelists.addFiles('feature', ['src/a.ts']);
			changelists.addFiles('feature', ['src/b.ts']);
			expect(changelists.getFiles('feature')).toEqual(['src/a.ts', 'src/b.ts']);
		});

		it('does not duplicate files already in the changelist', () => {
			changelists.addFiles('feature', ['src/a.ts']);
			changelists.addFiles('feature', ['src/a.ts']);
			expect(changelists.getFiles('feature')).toEqual(['src/a.ts']);
		});

		it('deduplicates files within a single add call', () => {
			changelists.addFiles('feat', ['src/a.ts', 'src/a.ts', 'src/a.ts']);
			expect(changelists.getFiles('feat')).toEqual(['src/a.ts']);
		});

		it('moves files from one changelist to another and reports where from', () => {
			changelists.addFiles('cl-a', ['src/shared.ts', 'src/other.ts']);
			const moved = changelists.addFiles('cl-b', ['src/shared.ts']);
			expect(changelists.getFiles('cl-a')).toEqual(['src/other.ts']);
			expect(changelists.getFiles('cl-b')).toEqual(['src/shared.ts']);
			expect([...moved]).toEqual([['src/shared.ts', 'cl-a']]);
		});

		it('handles rapid reassignment across multiple changelists', () => {
			changelists.addFiles('cl-a', ['shared.ts']);
			changelists.addFiles('cl-b', ['shared.ts']);
			changelists.addFiles('cl-c', ['shared.ts']);
			expect(changelists.findChangelist('shared.ts')).toBe('cl-c');
			expect(changelists.getFiles('cl-a')).toEqual([]);
			expect(changelists.getFiles('cl-b')).toEqual([]);
			expect(changelists.toData()).toEqual({ 'cl-a': [], 'cl-b': [], 'cl-c': ['shared.ts'] });
		});

		it('rejects invalid changelist name', () => {
			expect(() => changelists.addFiles('', ['a.ts'])).toThrow('cannot be empty');
			expect(() => changelists.addFiles('HEAD', ['a.ts'])).toThrow('reserved');
			expect(() => changelists.addFiles('a b', ['a.ts'])).toThrow('alphanumeric');
		});

		it('keeps every path in at most one changelist', () => {
			const ops: [string, string[]][] = [
				['a', ['1', '2', '3']],
				['b', ['2', '4']],
				['c', ['3', '4', '5']],
				['a', ['5']],
			];
			for (const [name, files] of ops) {
				changelists.addFiles(name, files);
			}
			const owners = new Map<string, number>();
			for (const files of Object.values(changelists.getAll())) {
				for (const f of files) {
					owners.set(f, (owners.get(f) ?? 0) + 1);
				}
			}
			expect([...owners.values()].every(count => count === 1)).toBe(true);
			expect(changelists.findChangelist('5')).toBe('a');
		});
	});

	describe('removeFiles', () => {
		it('removes files from a changelist and returns them', () => {
			changelists.addFiles('feat', ['src/a.ts', 'src/b.ts']);
			expect(changelists.removeFiles('feat', ['src/a.ts', 'src/c.ts'])).toEqual(['src/a.ts']);
			expect(changelists.getFiles('feat')).toEqual(['src/b.ts']);
		});

		it('returns nothing for non-existent changelist', () => {
			expect(changelists.removeFiles('nonexistent', ['src/a.ts'])).toEqual([]);
		});
	});

	describe('deleteChangelist', () => {
		it('deletes a changelist and returns its files', () => {
			changelists.addFiles('feat', ['a.ts', 'b.ts']);
			expect(changelists.deleteChangelist('feat')).toEqual(['a.ts', 'b.ts']);
			expect(changelists.has('feat')).toBe(false);
		});

		it('returns empty array for non-existent changelist', () => {
			expect(changelists.deleteChangelist('nonexistent')).toEqual([]);
		});
	});

	it('deleteAll removes all changelists', () => {
		changelists.addFiles('a', ['1.ts']);
		changelists.addFiles('b', ['2.ts']);
		changelists.deleteAll();
		expect(changelists.getAll()).toEqual({});
		expect(changelists.getNames()).toEqual([]);
	});

	it('findChangelist returns the owner or null', () => {
		changelists.addFiles('feat', ['src/a.ts']);
		changelists.addFiles('bug', ['src/b.ts']);
		expect(changelists.findChangelist('src/a.ts')).toBe('feat');
		expect(changelists.findChangelist('src/b.ts')).toBe('bug');
		expect(changelists.findChangelist('unknown.ts')).toBeNull();
	});

	it('assignedFiles collects every member', () => {
		changelists.addFiles('feat', ['a.ts', 'b.ts']);
		changelists.addFiles('bug', ['c.ts']);
		expect([...changelists.assignedFiles()].sort()).toEqual(['a.ts', 'b.ts', 'c.ts']);
	});

	it('treats names of built-in object members as ordinary changelists', () => {
		expect(changelists.has('constructor')).toBe(false);
		expect(changelists.getFiles('toString')).toEqual([]);
		expect(changelists.removeFiles('valueOf', ['a.ts'])).toEqual([]);
		changelists.addFiles('constructor', ['a.ts']);
		changelists.addFiles('__proto__', ['b.ts']);
		expect(changelists.getNames()).toEqual(['constructor', '__proto__']);
		expect(changelists.getFiles('__proto__')).toEqual(['b.ts']);
		expect(changelists.findChangelist('b.ts')).toBe('__proto__');
		expect(changelists.deleteChangelist('constructor')).toEqual(['a.ts']);
		expect(changelists.getNames()).toEqual(['__proto__']);
	});

	it('does not share arrays with the data it was built from', () => {
		const data = { feat: ['a.ts'] };
		const copy = new Changelists(data);
		copy.addFiles('feat', ['b.ts']);
		expect(data).toEqual({ feat: ['a.ts'] });
		const out = copy.toData();
		out.feat.push('c.ts');
		expect(copy.getFiles('feat')).toEqual(['a.ts', 'b.ts']);
	});
});
