import { describe, it, expect, beforeEach } from 'vitest';
import { TaskBoard } from '../../src/Client/TaskBoard';

let board: TaskBoard;

beforeEach(() => {
	board = new TaskBoard([
		{ id: 1, title: 'Buy milk', completed: false },
		{ id: 2, title: 'Write report', completed: true },
	]);
});

describe('counts', () => {
	it('counts the rendered rows', () => {
		expect(board.counts()).toEqual({ total: 2, completed: 1, active: 1 });
	});

	it('ignores pending-create and removed rows', () => {
		board.beginCreate('New');
		board.beginDelete(1);
		board.settleDelete(1);

		expect(board.counts()).toEqual({ total: 1, completed: 1, active: 0 });
	});

	it('keeps counting a toggled row under its previous state until it settles', () => {
		board.beginToggle(1);

		expect(board.counts()).toEqual({ total: 2, completed: 1, active: 1 });
	});

	it('keeps counting a pending-delete row under its previous state', () => {
		board.beginDelete(2);

		expect(board.counts()).toEqual({ total: 2, completed: 1, active: 1 });
	});
});

describe('toggle', () => {
	it('flips the row immediately and marks it in flight', () => {
		const snapshot = board.beginToggle(1);

		expect(snapshot).toEqual({ id: 1, state: 'active' });
		expect(board.get(1)).toMatchObject({ state: 'completed', inFlight: true });
	});

	it('settles to the state reported by the server', () => {
		board.beginToggle(1);
		board.settleToggle(1, true);

		expect(board.get(1)).toMatchObject({ state: 'completed', inFlight: false });
		expect(board.counts()).toEqual({ total: 2, completed: 2, active: 0 });
	});

	it('reverts to exactly the previous state', () => {
		const snapshot = board.beginToggle(2);
		if (!snapshot) {
			throw new Error('toggle refused');
		}

		board.revert(snapshot);

		expect(board.get(2)).toMatchObject({ state: 'completed', inFlight: false });
	});

	it('refuses a second toggle while one is in flight', () => {
		board.beginToggle(1);

		expect(board.beginToggle(1)).toBeUndefined();
		expect(board.beginDelete(1)).toBeUndefined();
	});

	it('refuses unknown rows', () => {
		expect(board.beginToggle(99)).toBeUndefined();
	});
});

describe('delete', () => {
	it('moves through pending-delete to removed', () => {
		board.beginDelete(1);
		expect(board.get(1)).toMatchObject({ state: 'pending-delete', previousState: 'active', inFlight: true });

		board.settleDelete(1);
		expect(board.get(1)).toMatchObject({ state: 'removed', inFlight: false });
		expect(board.visibleRows().map((row) => row.id)).toEqual([2]);
	});

	it('restores the previous state on failure', () => {
		const snapshot = board.beginDelete(2);
		if (!snapshot) {
			throw new Error('delete refused');
		}

		board.revert(snapshot);

		expect(board.get(2)).toEqual({
			id: 2,
			title: 'Write report',
			state: 'completed',
			inFlight: false,
			previousState: undefined,
		});
	});

	it('reports an empty board once every row is removed', () => {
		for (const id of [1, 2]) {
			board.beginDelete(id);
			board.settleDelete(id);
		}

		expect(board.isEmpty()).toBe(true);
	});
});

describe('create', () => {
	it('tracks a hidden pending row until the server assigns an id', () => {
		const pendingId = board.beginCreate('New');

		expect(pendingId).toBeLessThan(0);
		expect(board.visibleRows()).toHaveLength(2);

		board.settleCreate(pendingId, { id: 3, title: 'New', completed: false });

		expect(board.get(3)).toMatchObject({ state: 'active', inFlight: false });
		expect(board.counts().total).toBe(3);
	});

	it('drops the pending row on failure', () => {
		const pendingId = board.beginCreate('New');

		board.discardCreate(pendingId);

		expect(board.get(pendingId)).toBeUndefined();
	});
});
