import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { TaskBoard } from '../../src/Client/TaskBoard';
import { TaskApi, type FetchFn } from '../../src/Client/TaskApi';
import { MESSAGES, TaskController, type TaskView } from '../../src/Client/TaskController';
import type { TaskId } from '../../src/Entity/TaskEntity';

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

// 描画のたびに行の状態と集計値を記録する偽の画面
class FakeView implements TaskView {
	renders: Array<{ states: Record<number, string>; counts: ReturnType<TaskBoard['counts']> }> = [];
	alerts: string[] = [];
	removed: TaskId[] = [];
	confirmAnswer = true;
	confirmed = 0;
	reloaded = 0;
	submitted = 0;

	render(board: TaskBoard): void {
		const states: Record<number, string> = {};
		for (const row of board.visibleRows()) {
			states[row.id] = row.state;
		}
		this.renders.push({ states, counts: board.counts() });
	}

	confirm(): boolean {
		this.confirmed++;
		return this.confirmAnswer;
	}

	alert(message: string): void {
		this.alerts.push(message);
	}

	animateRemoval(id: TaskId): Promise<void> {
		this.removed.push(id);
		return Promise.resolve();
	}

	reload(): void {
		this.reloaded++;
	}

	submitForm(): void {
		this.submitted++;
	}
}

let board: TaskBoard;
let view: FakeView;
let fetchFn: Mock<FetchFn>;
let logger: { error: Mock<(...args: unknown[]) => void> };
let controller: TaskController;

beforeEach(() => {
	board = new TaskBoard([
		{ id: 42, title: 'Купить молоко', completed: false },
		{ id: 7, title: 'Write report', completed: false },
	]);
	view = new FakeView();
	fetchFn = vi.fn<FetchFn>();
	logger = { error: vi.fn<(...args: unknown[]) => void>() };
	controller = new TaskController(board, new TaskApi('test-token', '', fetchFn), view, logger);
});

describe('toggle', () => {
	it('flips the row before the request resolves', async () => {
		let respond: (response: Response) => void = () => undefined;
		fetchFn.mockReturnValue(new Promise((resolve) => (respond = resolve)));

		const pending = controller.toggle(42);

		expect(view.renders).toHaveLength(1);
		expect(view.renders[0].states[42]).toBe('completed');

		respond(jsonResponse({ success: true, completed: true, taskId: 42 }));
		expect(await pending).toBe(true);
		expect(board.get(42)).toMatchObject({ state: 'completed', inFlight: false });
	});

	it('moves one task from active to completed in the counts', async () => {
		fetchFn.mockResolvedValue(jsonResponse({ success: true, completed: true, taskId: 42 }));

		await controller.toggle(42);

		expect(view.renders.at(-1)?.counts).toEqual({ total: 2, completed: 1, active: 1 });
	});

	it('leaves the counts alone while the request is pending', async () => {
		let respond: (response: Response) => void = () => undefined;
		fetchFn.mockReturnValue(new Promise((resolve) => (respond = resolve)));

		const pending = controller.toggle(42);

		expect(view.renders[0].counts).toEqual({ total: 2, completed: 0, active: 2 });

		respond(jsonResponse({ success: true, completed: true, taskId: 42 }));
		await pending;
		expect(view.renders.at(-1)?.counts).toEqual({ total: 2, completed: 1, active: 1 });
	});

	it('reverts and logs when the backend is unreachable', async () => {
		fetchFn.mockRejectedValue(new TypeError('Failed to fetch'));

		await controller.toggle(42);

		expect(view.renders.map((render) => render.counts)).toEqual([
			{ total: 2, completed: 0, active: 2 },
			{ total: 2, completed: 0, active: 2 },
		]);

		expect(board.get(42)).toMatchObject({ state: 'active', inFlight: false });
		expect(view.renders.at(-1)?.counts).toEqual({ total: 2, completed: 0, active: 2 });
		expect(logger.error).toHaveBeenCalledTimes(1);
		expect(view.alerts).toEqual([]);
	});

	it('reverts and alerts on success:false', async () => {
		fetchFn.mockResolvedValue(jsonResponse({ success: false, error: 'Task not found' }, 404));

		await controller.toggle(42);

		expect(board.get(42)).toMatchObject({ state: 'active', inFlight: false });
		expect(view.alerts).toEqual([MESSAGES.toggleFailed]);
	});

	it('reverts when the response is not an envelope', async () => {
		fetchFn.mockResolvedValue(new Response('<html>Server Error</html>', { status: 500 }));

		await controller.toggle(42);

		expect(board.get(42)).toMatchObject({ state: 'active', inFlight: false });
		expect(logger.error).toHaveBeenCalledTimes(1);
	});

	it('ignores a second toggle while the first is in flight', async () => {
		let respond: (response: Response) => void = () => undefined;
		fetchFn.mockReturnValue(new Promise((resolve) => (respond = resolve)));

		const first = controller.toggle(42);
		const second = await controller.toggle(42);

		expect(second).toBe(false);
		expect(fetchFn).toHaveBeenCalledTimes(1);

		respond(jsonResponse({ success: true, completed: true, taskId: 42 }));
		await first;
	});
});

describe('remove', () => {
	it('sends nothing when the user does not confirm', async () => {
		view.confirmAnswer = false;

		expect(await controller.remove(42)).toBe(false);
		expect(fetchFn).not.toHaveBeenCalled();
		expect(board.get(42)?.state).toBe('active');
	});

	it('dims the row, then removes it and recounts', async () => {
		let respond: (response: Response) => void = () => undefined;
		fetchFn.mockReturnValue(new Promise((resolve) => (respond = resolve)));

		const pending = controller.remove(42);

		expect(view.confirmed).toBe(1);
		expect(view.renders[0].states[42]).toBe('pending-delete');

		respond(jsonResponse({ success: true }));
		await pending;

		expect(view.removed).toEqual([42]);
		expect(board.get(42)?.state).toBe('removed');
		expect(view.renders.at(-1)?.counts).toEqual({ total: 1, completed: 0, active: 1 });
		expect(view.reloaded).toBe(0);
	});

	it('reloads once the last row is gone', async () => {
		fetchFn.mockImplementation(async () => jsonResponse({ success: true }));

		await controller.remove(42);
		await controller.remove(7);

		expect(view.reloaded).toBe(1);
	});

	it('restores the row on failure', async () => {
		board.beginToggle(7);
		board.settleToggle(7, true);
		fetchFn.mockResolvedValue(jsonResponse({ success: false, error: 'Permission denied' }, 403));

		await controller.remove(7);

		expect(board.get(7)).toMatchObject({ state: 'completed', inFlight: false });
		expect(view.alerts).toEqual([MESSAGES.deleteFailed]);
		expect(view.removed).toEqual([]);
	});

	it('restores the row and logs when the backend is unreachable', async () => {
		fetchFn.mockRejectedValue(new TypeError('Failed to fetch'));

		await controller.remove(42);

		expect(board.get(42)).toMatchObject({ state: 'active', inFlight: false });
		expect(logger.error).toHaveBeenCalledTimes(1);
	});
});

describe('create', () => {
	it('ignores a blank title', async () => {
		await controller.create({ title: '   ' });

		expect(fetchFn).not.toHaveBeenCalled();
	});

	it('reloads the page after a successful create', async () => {
		fetchFn.mockResolvedValue(jsonResponse({ success: true, task: { id: 43, title: 'Buy bread', completed: false } }));

		await controller.create({ title: ' Buy bread ', dueDate: '2025-12-30' });

		const init = fetchFn.mock.calls[0][1];
		expect(String(init?.body)).toBe('title=Buy+bread&due_date=2025-12-30');
		expect(view.reloaded).toBe(1);
		expect(board.get(43)?.state).toBe('active');
	});

	it('alerts on success:false', async () => {
		fetchFn.mockResolvedValue(jsonResponse({ success: false, errors: { title: ['Title must not be empty'] } }, 400));

		await controller.create({ title: 'x' });

		expect(view.alerts).toEqual([MESSAGES.createFailed]);
		expect(view.reloaded).toBe(0);
	});

	it('falls back to a normal form submission when the request fails', async () => {
		fetchFn.mockRejectedValue(new TypeError('Failed to fetch'));

		await controller.create({ title: 'Buy bread' });

		expect(view.submitted).toBe(1);
		expect(logger.error).toHaveBeenCalledTimes(1);
		expect(board.visibleRows()).toHaveLength(2);
	});
});
