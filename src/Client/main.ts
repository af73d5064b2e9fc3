import { TaskApi } from './TaskApi';
import { TaskController } from './TaskController';
import { DomTaskView, readBoard } from './DomTaskView';

function logUnexpected(error: unknown): void {
	console.error('Unexpected error:', error);
}

// ページ上のフォーム・チェックボックス・削除ボタンにイベントを登録する
export function bootstrap(document: Document, window: Window): TaskController {
	const csrfToken = document.querySelector<HTMLMetaElement>('meta[name="csrf-token"]')?.content ?? '';

	const board = readBoard(document);
	const view = new DomTaskView(document, window);
	const controller = new TaskController(board, new TaskApi(csrfToken), view);

	// 作成フォーム
	const form = document.getElementById('task-form');
	if (form instanceof HTMLFormElement) {
		form.addEventListener('submit', (event) => {
			event.preventDefault();

			const data = new FormData(form);
			const title = data.get('title');
			const dueDate = data.get('due_date');

			controller
				.create({
					title: typeof title === 'string' ? title : '',
					dueDate: typeof dueDate === 'string' ? dueDate : undefined,
				})
				.catch(logUnexpected);
		});
	}

	// チェックボックスと削除ボタンは各リストにまとめて登録する（行はリスト間を移動する）
	const lists = ['active-tasks', 'completed-tasks'].map((id) => document.getElementById(id));

	for (const list of lists) {
		if (!list) {
			continue;
		}

		list.addEventListener('change', (event) => {
			const target = event.target;
			if (!(target instanceof HTMLInputElement) || !target.classList.contains('task-checkbox-input')) {
				return;
			}

			const id = Number(target.dataset.taskId);
			controller
				.toggle(id)
				.then((accepted) => {
					// 受け付けなかった操作はチェック状態を元に戻す
					if (!accepted) {
						view.render(board);
					}
				})
				.catch(logUnexpected);
		});

		list.addEventListener('click', (event) => {
			const target = event.target;
			if (!(target instanceof HTMLElement)) {
				return;
			}

			const button = target.closest<HTMLButtonElement>('.delete-btn');
			if (!button) {
				return;
			}

			event.preventDefault();
			controller.remove(Number(button.dataset.taskId)).catch(logUnexpected);
		});
	}

	return controller;
}

if (typeof document !== 'undefined' && typeof window !== 'undefined') {
	document.addEventListener('DOMContentLoaded', () => {
		bootstrap(document, window);
	});
}
