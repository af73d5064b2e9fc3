import type { TaskId } from '../Entity/TaskEntity';
import { TaskBoard } from './TaskBoard';
import type { TaskView } from './TaskController';

// 削除アニメーションの時間（ミリ秒）
export const REMOVAL_DURATION_MS = 300;

function taskIdOf(element: Element): TaskId | undefined {
	const id = Number(element instanceof HTMLElement ? element.dataset.taskId : undefined);
	return Number.isInteger(id) && id > 0 ? id : undefined;
}

// サーバーが描画した行からボードを作る
export function readBoard(document: Document): TaskBoard {
	const rows: Array<{ id: TaskId; title: string; completed: boolean }> = [];

	for (const item of document.querySelectorAll('.task-item')) {
		const id = taskIdOf(item);
		if (id === undefined) {
			continue;
		}

		rows.push({
			id,
			title: item.querySelector('.task-title')?.textContent?.trim() ?? '',
			completed: item.classList.contains('completed'),
		});
	}

	return new TaskBoard(rows);
}

// TaskView の DOM 実装
export class DomTaskView implements TaskView {
	constructor(
		private readonly document: Document,
		private readonly window: Window
	) {}

	private item(id: TaskId): HTMLElement | null {
		return this.document.querySelector<HTMLElement>(`.task-item[data-task-id="${id}"]`);
	}

	render(board: TaskBoard): void {
		const activeList = this.document.getElementById('active-tasks');
		const completedList = this.document.getElementById('completed-tasks');

		for (const row of board.visibleRows()) {
			const item = this.item(row.id);
			if (!item) {
				continue;
			}

			const pendingDelete = row.state === 'pending-delete';
			const completed = pendingDelete ? row.previousState === 'completed' : row.state === 'completed';

			item.classList.toggle('completed', completed);
			item.classList.toggle('pending-delete', pendingDelete);
			item.style.opacity = pendingDelete ? '0.5' : '';
			item.style.pointerEvents = pendingDelete ? 'none' : '';

			const checkbox = item.querySelector<HTMLInputElement>('.task-checkbox-input');
			if (checkbox) {
				checkbox.checked = completed;
				checkbox.disabled = row.inFlight;
			}

			const deleteButton = item.querySelector<HTMLButtonElement>('.delete-btn');
			if (deleteButton) {
				deleteButton.disabled = row.inFlight;
			}

			// 確定した行を正しいリストへ移す
			if (!row.inFlight) {
				const target = completed ? completedList : activeList;
				if (target && item.parentElement !== target) {
					target.appendChild(item);
				}
			}
		}

		// 集計値（total / completed / active の順）
		const counts = board.counts();
		const statValues = this.document.querySelectorAll('.stat-value');
		if (statValues.length >= 3) {
			statValues[0].textContent = String(counts.total);
			statValues[1].textContent = String(counts.completed);
			statValues[2].textContent = String(counts.active);
		}
	}

	confirm(message: string): boolean {
		return this.window.confirm(message);
	}

	alert(message: string): void {
		this.window.alert(message);
	}

	animateRemoval(id: TaskId): Promise<void> {
		const item = this.item(id);
		if (!item) {
			return Promise.resolve();
		}

		item.style.transition = `all ${REMOVAL_DURATION_MS / 1000}s`;
		item.style.transform = 'translateX(-100%)';
		item.style.opacity = '0';

		return new Promise((resolve) => {
			this.window.setTimeout(() => {
				item.remove();
				resolve();
			}, REMOVAL_DURATION_MS);
		});
	}

	reload(): void {
		this.window.location.reload();
	}

	submitForm(): void {
		const form = this.document.getElementById('task-form');
		if (form instanceof HTMLFormElement) {
			form.submit();
		}
	}
}
