import { describe, it, expect } from 'vitest';
import { StatusGateway, buildStatusMap, classifyStatus, hasUnstagedChange, isIndexOnly } from './statusGateway';
import { FakeVcs } from './testHelpers';

describe('classifyStatus', () => {
	it.each([
		['??', 'untracked'],
		[' D', 'deleted'],
		['D ', 'deleted'],
		['A ', 'added'],
		['AM', 'added'],
		[' M', 'modified'],
		['M ', 'modified'],
		['MM', 'modified'],
		['R ', 'modified'],
		[' T', 'modified'],
		['UU', 'unclassified'],
		['DU', 'unclassified'],
		['!!', 'unclassified'],
	])('%s → %s', (code, expected) => {
		expect(classifyStatus(code)).toBe(expected);
	});
});

describe('hasUnstagedChange / isIndexOnly', () => {
	it('looks at the worktree column', () => {
		expect(hasUnstagedChange(' M')).toBe(true);
		expect(hasUnstagedChange('MD')).toBe(true);
		expect(hasUnstagedChange('M ')).toBe(false);
		expect(hasUnstagedChange('??')).toBe(false);
	});

	it('detects changes staged with a clean worktree', () => {
		expect(isIndexOnly('M ')).toBe(true);
		expect(isIndexOnly('A ')).toBe(true);
		expect(isIndexOnly('MM')).toBe(false);
		expect(isIndexOnly(' M')).toBe(false);
	});
});

describe('buildStatusMap', () => {
	const raw = [
		{ code: ' M', path: 'a.ts' },
		{ code: 'UU', path: 'conflict.ts' },
		{ code: 'R ', path: 'new.ts', originalPath: 'old.ts' },
	];

	it('keys entries by path and suppresses unclassified codes by default', () => {
		const snapshot = buildStatusMap(raw);
		expect([...snapshot.entries.keys()]).toEqual(['a.ts', 'new.ts']);
		expect(snapshot.entries.get('new.ts')).toEqual({ path: 'new.ts', code: 'R ', statusClass: 'modified', originalPath: 'old.ts' });
		expect(snapshot.suppressed).toEqual([{ path: 'conflict.ts', code: 'UU', statusClass: 'unclassified' }]);
	});

	it('keeps everything with showAll', () => {
		const snapshot = buildStatusMap(raw, { showAll: true });
		expect(snapshot.entries.size).toBe(3);
		expect(snapshot.suppressed).toEqual([]);
	});
});

describe('StatusGateway', () => {
	it('queries the repository on every call', async () => {
		const vcs = new FakeVcs().setStatus('a.ts', ' M');
		const gateway = new StatusGateway(vcs);
		expect((await gateway.fullStatus()).size).toBe(1);
		vcs.setStatus('b.ts', '??');
		expect((await gateway.fullStatus()).size).toBe(2);
		expect(vcs.callsTo('status')).toHaveLength(2);
	});

	it('includes unclassified entries in the full status', async () => {
		const vcs = new FakeVcs().setStatus('c.ts', 'UU');
		const gateway = new StatusGateway(vcs);
		expect((await gateway.fullStatus()).get('c.ts')?.statusClass).toBe('unclassified');
		expect((await gateway.statusMap()).suppressed).toHaveLength(1);
	});

	it('can leave untracked files out', async () => {
		const vcs = new FakeVcs().setStatus('a.ts', ' M').setStatus('n.ts', '??');
		const gateway = new StatusGateway(vcs);
		const snapshot = await gateway.statusMap({ includeUntracked: false });
		expect([...snapshot.entries.keys()]).toEqual(['a.ts']);
	});
});
