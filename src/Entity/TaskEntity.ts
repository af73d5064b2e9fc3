// タスクの id（ストアが採番する正の整数）
export type TaskId = number;

// タスクを所有するユーザーの id（null は匿名・デモ用のタスク）
export type OwnerId = string | null;

export interface TaskEntity {
	id: TaskId;
	title: string;
	completed: boolean;
	// YYYY-MM-DD 形式の期限日
	dueDate: string | null;
	ownerId: OwnerId;
	// ISO-8601 形式のタイムスタンプ
	createdAt: string;
	updatedAt: string;
}

// タイトルの最大長（UTF-16 のコードユニット数）
export const TITLE_MAX_LENGTH = 200;

// 一覧ページの集計値
export interface TaskCounts {
	total: number;
	completed: number;
	active: number;
}
