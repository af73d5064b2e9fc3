import type { TaskId } from '../Entity/TaskEntity';
import type { TaskBoard } from './TaskBoard';
import { TransportError, type NewTaskInput, type TaskApi } from './TaskApi';

// 画面操作の窓口（DOM 実装とテスト用の偽物を差し替えられるようにする）
export interface TaskView {
	// ボードの状態を画面に反映する（同期的に行う）
	render(board: TaskBoard): void;
	confirm(message: string): boolean;
	alert(message: string): void;
	// 行を消すアニメーション
	animateRemoval(id: TaskId): Promise<void>;
	reload(): void;
	// AJAX が使えないときの通常のフォーム送信
	submitForm(): void;
}

export interface ControllerLogger {
	error(...args: unknown[]): void;
}

export const MESSAGES = {
	createFailed: 'Could not add the task',
	toggleFailed: 'Could not update the task',
	deleteFailed: 'Could not delete the task',
	confirmDelete: 'Are you sure you want to delete this task?',
} as const;

// 作成・完了切り替え・削除の画面側の制御
// - 切り替えと削除はリクエスト前に画面を変え（楽観的更新）、失敗したら元に戻す
// - 同じ行へのリクエストは同時に 1 つまで（リクエスト中の操作は無視する）
export class TaskController {
	constructor(
		private readonly board: TaskBoard,
		private readonly api: TaskApi,
		private readonly view: TaskView,
		private readonly logger: ControllerLogger = console
	) {}

	async create(input: NewTaskInput): Promise<void> {
		const title = input.title.trim();

		// 空のタイトルは送信しない
		if (!title) {
			return;
		}

		const pendingId = this.board.beginCreate(title);

		try {
			const envelope = await this.api.create({ ...input, title });

			if (envelope.success) {
				// 新しいタスクを表示するためにページを読み直す
				this.board.settleCreate(pendingId, envelope.task);
				this.view.reload();
				return;
			}

			this.board.discardCreate(pendingId);
			this.view.alert(MESSAGES.createFailed);
		} catch (error) {
			this.board.discardCreate(pendingId);
			this.logger.error('Failed to create task:', error);

			// AJAX が使えなければ通常のフォーム送信に切り替える
			this.view.submitForm();
		}
	}

	// 戻り値は操作を受け付けたかどうか
	async toggle(id: TaskId): Promise<boolean> {
		// 先に画面を切り替える
		const snapshot = this.board.beginToggle(id);
		if (!snapshot) {
			return false;
		}
		this.view.render(this.board);

		try {
			const envelope = await this.api.toggle(id);

			if (envelope.success) {
				this.board.settleToggle(id, envelope.completed);
				this.view.render(this.board);
				return true;
			}

			// 失敗したら操作前の状態に戻す
			this.board.revert(snapshot);
			this.view.render(this.board);
			this.view.alert(MESSAGES.toggleFailed);
		} catch (error) {
			this.board.revert(snapshot);
			this.view.render(this.board);
			this.logError('Failed to toggle task:', error);
		}

		return true;
	}

	// 戻り値は操作を受け付けたかどうか
	async remove(id: TaskId): Promise<boolean> {
		const row = this.board.get(id);
		if (!row || row.inFlight) {
			return false;
		}

		// 確認してからリクエストする
		if (!this.view.confirm(MESSAGES.confirmDelete)) {
			return false;
		}

		const snapshot = this.board.beginDelete(id);
		if (!snapshot) {
			return false;
		}
		this.view.render(this.board);

		try {
			const envelope = await this.api.remove(id);

			if (envelope.success) {
				await this.view.animateRemoval(id);
				this.board.settleDelete(id);
				this.view.render(this.board);

				// すべて消えたら空の状態を表示するために読み直す
				if (this.board.isEmpty()) {
					this.view.reload();
				}
				return true;
			}

			this.board.revert(snapshot);
			this.view.render(this.board);
			this.view.alert(MESSAGES.deleteFailed);
		} catch (error) {
			this.board.revert(snapshot);
			this.view.render(this.board);
			this.logError('Failed to delete task:', error);
		}

		return true;
	}

	private logError(message: string, error: unknown): void {
		// 通信エラー以外は想定外なので呼び出し元にも伝える
		this.logger.error(message, error);
		if (!(error instanceof TransportError)) {
			throw error;
		}
	}
}
