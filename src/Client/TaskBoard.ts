import type { TaskCounts, TaskId } from '../Entity/TaskEntity';

// 行の状態
// - pending-create: 作成リクエスト中（まだ表示しない）
// - pending-delete: 削除リクエスト中（薄く表示して操作不可）
// - removed: 削除済み（表示しない）
export type RowState = 'pending-create' | 'active' | 'completed' | 'pending-delete' | 'removed';

// 表示中の状態（取り消し時に戻す先）
export type SettledState = 'active' | 'completed';

export interface TaskRow {
	id: TaskId;
	title: string;
	state: RowState;
	// リクエスト中はチェックボックスや削除ボタンを無効にする
	inFlight: boolean;
	// リクエスト中の行の操作前の状態（集計と取り消しに使う）
	previousState?: SettledState;
}

// 楽観的更新を取り消すための控え
export interface RowSnapshot {
	id: TaskId;
	state: RowState;
}

// ページに表示しているタスク行の一覧
// - DOM ではなくこのリストを正として扱い、描画はこのリストから行う
export class TaskBoard {
	private rows: TaskRow[];
	// 作成中の行の仮 id（負の数）
	private nextPendingId = -1;

	constructor(rows: Array<Pick<TaskRow, 'id' | 'title'> & { completed: boolean }> = []) {
		this.rows = rows.map((row) => ({
			id: row.id,
			title: row.title,
			state: row.completed ? 'completed' : 'active',
			inFlight: false,
		}));
	}

	get(id: TaskId): TaskRow | undefined {
		return this.rows.find((row) => row.id === id);
	}

	// 描画対象の行（作成中・削除済みは含まない）
	visibleRows(): TaskRow[] {
		return this.rows.filter((row) => row.state !== 'pending-create' && row.state !== 'removed');
	}

	// 集計値は常に表示中の行から数え直す
	// - リクエスト中の行は操作前の状態で数える（サーバーが確定するまで集計値を変えない）
	counts(): TaskCounts {
		let active = 0;
		let completed = 0;

		for (const row of this.visibleRows()) {
			const state = row.previousState ?? row.state;
			if (state === 'completed') {
				completed++;
			} else {
				active++;
			}
		}

		return { total: active + completed, completed, active };
	}

	isEmpty(): boolean {
		return this.visibleRows().length === 0;
	}

	// 作成リクエストの開始（仮 id を返す）
	beginCreate(title: string): TaskId {
		const id = this.nextPendingId--;
		this.rows.push({ id, title, state: 'pending-create', inFlight: true });
		return id;
	}

	// 作成の確定（サーバーが採番した id に置き換える）
	settleCreate(pendingId: TaskId, task: { id: TaskId; title: string; completed: boolean }): void {
		const row = this.get(pendingId);
		if (!row || row.state !== 'pending-create') {
			return;
		}

		row.id = task.id;
		row.title = task.title;
		row.state = task.completed ? 'completed' : 'active';
		row.inFlight = false;
	}

	// 作成の失敗（仮の行を捨てる）
	discardCreate(pendingId: TaskId): void {
		this.rows = this.rows.filter((row) => !(row.id === pendingId && row.state === 'pending-create'));
	}

	// 完了状態を即座に反転する（楽観的更新）
	// - 操作できない行（リクエスト中など）なら undefined
	beginToggle(id: TaskId): RowSnapshot | undefined {
		const row = this.get(id);
		if (!row || row.inFlight || (row.state !== 'active' && row.state !== 'completed')) {
			return undefined;
		}

		const snapshot = { id, state: row.state };
		row.previousState = row.state;
		row.state = row.state === 'active' ? 'completed' : 'active';
		row.inFlight = true;

		return snapshot;
	}

	// サーバーが返した完了状態に合わせる
	settleToggle(id: TaskId, completed: boolean): void {
		const row = this.get(id);
		if (!row) {
			return;
		}

		row.state = completed ? 'completed' : 'active';
		row.previousState = undefined;
		row.inFlight = false;
	}

	// 操作前の状態にそのまま戻す
	revert(snapshot: RowSnapshot): void {
		const row = this.get(snapshot.id);
		if (!row) {
			return;
		}

		row.state = snapshot.state;
		row.previousState = undefined;
		row.inFlight = false;
	}

	// 削除リクエストの開始（薄く表示して操作不可にする）
	beginDelete(id: TaskId): RowSnapshot | undefined {
		const row = this.get(id);
		if (!row || row.inFlight || (row.state !== 'active' && row.state !== 'completed')) {
			return undefined;
		}

		const snapshot = { id, state: row.state };
		row.previousState = row.state;
		row.state = 'pending-delete';
		row.inFlight = true;

		return snapshot;
	}

	// 削除の確定
	settleDelete(id: TaskId): void {
		const row = this.get(id);
		if (!row) {
			return;
		}

		row.state = 'removed';
		row.previousState = undefined;
		row.inFlight = false;
	}
}
