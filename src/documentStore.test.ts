import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { DocumentCodec, FileDocumentStore, MemoryDocumentStore, decodeDocument, encodeDocument } from './documentStore';
import { ConsistencyError } from './errors';

/** A list of words; non-strings are dropped on read. */
const wordsCodec: DocumentCodec<string[]> = {
	empty: () => [],
	parse(raw: unknown, location: string): string[] {
		if (!Array.isArray(raw)) {
			throw new ConsistencyError(`Not a list: ${location}`, 'Fix it.');
		}
		return raw.filter((w: unknown): w is string => typeof w === 'string');
	},
	serialize: data => data,
};

describe('encodeDocument / decodeDocument', () => {
	it('writes indented JSON with a trailing newline', () => {
		expect(encodeDocument(wordsCodec, ['a', 'b'])).toBe('[\n  "a",\n  "b"\n]\n');
	});

	it('raises ConsistencyError for text that is not JSON', () => {
		expect(() => decodeDocument(wordsCodec, '{oops', 'words.json')).toThrow('Metadata file is not valid JSON: words.json');
	});

	it('lets the codec drop malformed entries', () => {
		expect(decodeDocument(wordsCodec, '["a", 1, null, "b"]', 'words.json')).toEqual(['a', 'b']);
	});
});

describe('FileDocumentStore', () => {
	let tmpDir: string;
	let filePath: string;
	let store: FileDocumentStore<string[]>;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'doc-test-'));
		filePath = path.join(tmpDir, 'words.json');
		store = new FileDocumentStore(filePath, wordsCodec, { timeoutMs: 0 });
	});

	afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	it('reports its file as the location', () => {
		expect(store.location).toBe(filePath);
	});

	it('loads the empty document when the file is missing or blank', () => {
		expect(store.load()).toEqual([]);
		fs.writeFileSync(filePath, '  \n');
		expect(store.load()).toEqual([]);
	});

	it('saves and reloads', () => {
		store.save(['alpha', 'beta']);
		expect(store.load()).toEqual(['alpha', 'beta']);
		expect(fs.readFileSync(filePath, 'utf-8')).toBe('[\n  "alpha",\n  "beta"\n]\n');
	});

	it('leaves no temp file behind', () => {
		store.save(['alpha']);
		expect(fs.readdirSync(tmpDir)).toEqual(['words.json']);
	});

	it('keeps the previous document when the write fails', () => {
		store.save(['alpha']);
		const failing = new FileDocumentStore(filePath, {
			...wordsCodec,
			serialize: () => {
				throw new Error('encode failed');
			},
		}, { timeoutMs: 0 });
		expect(() => failing.save(['beta'])).toThrow('encode failed');
		expect(store.load()).toEqual(['alpha']);
		expect(fs.readdirSync(tmpDir)).toEqual(['words.json']);
	});

	it('never overwrites a corrupt file on load', () => {
		fs.writeFileSync(filePath, '[broken');
		expect(() => store.load()).toThrow(ConsistencyError);
		expect(fs.readFileSync(filePath, 'utf-8')).toBe('[broken');
	});

	it('holds the lock file only while the callback runs', async () => {
		const lockPath = `${filePath}.lock`;
		const seen = await store.withLock(() => fs.existsSync(lockPath));
		expect(seen).toBe(true);
		expect(fs.existsSync(lockPath)).toBe(false);
	});
});

describe('MemoryDocumentStore', () => {
	it('starts empty or from the initial document', () => {
		expect(new MemoryDocumentStore(wordsCodec).load()).toEqual([]);
		expect(new MemoryDocumentStore(wordsCodec, 'mem', ['x']).load()).toEqual(['x']);
	});

	it('never hands out the saved object', () => {
		const store = new MemoryDocumentStore(wordsCodec);
		const data = ['a'];
		store.save(data);
		data.push('b');
		expect(store.load()).toEqual(['a']);
		expect(store.load()).not.toBe(store.load());
	});

	it('keeps the encoded text and counts saves', () => {
		const store = new MemoryDocumentStore(wordsCodec);
		expect(store.raw).toBeUndefined();
		store.save(['a']);
		store.save(['b']);
		expect(store.raw).toBe('[\n  "b"\n]\n');
		expect(store.saveCount).toBe(2);
	});

	it('fails the next save once when asked to', () => {
		const store = new MemoryDocumentStore(wordsCodec, 'mem', ['a']);
		store.failNextSave = new Error('disk full');
		expect(() => store.save(['b'])).toThrow('disk full');
		expect(store.load()).toEqual(['a']);
		store.save(['c']);
		expect(store.load()).toEqual(['c']);
	});

	it('reports the lock as held inside withLock only', async () => {
		const store = new MemoryDocumentStore(wordsCodec);
		expect(await store.withLock(() => store.locked)).toBe(true);
		expect(store.locked).toBe(false);
	});
});
