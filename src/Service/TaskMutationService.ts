import z from 'zod';
import { TITLE_MAX_LENGTH, type OwnerId, type TaskCounts, type TaskEntity, type TaskId } from '../Entity/TaskEntity';
import { forbidden, success, validationError, type FieldErrors, type Result } from '../Entity/Result';
import type { Clock, TaskStore } from '../Store/TaskStore';
import { buildCalendarMonth, daysInMonth, formatDate, isCalendarDate, resolveMonth, type CalendarMonth } from './calendar';

// タスク作成フォームの入力
// - フォーム送信では未入力の期限日が空文字で届くので null として扱う
const createTaskInput = z.object({
	title: z
		.string({ required_error: 'Title is required', invalid_type_error: 'Title must be text' })
		.trim()
		.min(1, 'Title must not be empty')
		.max(TITLE_MAX_LENGTH, `Title must be at most ${TITLE_MAX_LENGTH} characters`),
	due_date: z
		.string({ invalid_type_error: 'Due date must be text' })
		.nullish()
		.transform((value) => (value ? value : null))
		.refine((value) => value === null || isCalendarDate(value), 'Enter a valid date (YYYY-MM-DD)'),
});

// 完了切り替えの結果
export interface ToggleOutcome {
	taskId: TaskId;
	completed: boolean;
}

// 一覧ページの表示用データ
export interface TaskOverview {
	activeTasks: TaskEntity[];
	completedTasks: TaskEntity[];
	counts: TaskCounts;
	today: string;
}

// zod のエラーをフィールドごとのメッセージに変換
function toFieldErrors(error: z.ZodError): FieldErrors {
	const errors: FieldErrors = {};

	for (const issue of error.issues) {
		const field = issue.path.length > 0 ? issue.path.join('.') : 'form';
		errors[field] = [...(errors[field] ?? []), issue.message];
	}

	return errors;
}

// 操作できるタスクかどうか
// - ログイン中: 自分のタスクか所有者のいないタスク
// - 未ログイン: 所有者のいないタスクのみ
function canMutate(task: TaskEntity, ownerId: OwnerId): boolean {
	if (ownerId === null) {
		return task.ownerId === null;
	}

	return task.ownerId === null || task.ownerId === ownerId;
}

// タスクの作成・完了切り替え・削除を行うサービス
// - リクエストごとの状態は持たず、状態はすべて TaskStore にある
export class TaskMutationService {
	constructor(
		private readonly store: TaskStore,
		private readonly clock: Clock = () => new Date()
	) {}

	// 今日の日付（UTC の YYYY-MM-DD）
	today(): string {
		return this.clock().toISOString().slice(0, 10);
	}

	create(input: unknown, ownerId: OwnerId): Result<TaskEntity> {
		// 入力を検証
		const parsed = createTaskInput.safeParse(input);
		if (!parsed.success) {
			return validationError(toFieldErrors(parsed.error));
		}

		// 未完了のタスクとして保存
		return this.store.create({
			title: parsed.data.title,
			dueDate: parsed.data.due_date,
			ownerId,
		});
	}

	toggle(id: TaskId, ownerId: OwnerId): Result<ToggleOutcome> {
		// 対象のタスクを取得
		const found = this.store.get(id);
		if (found.type !== 'success') {
			return found;
		}

		// 他のユーザーのタスクは変更させない
		if (!canMutate(found.data, ownerId)) {
			return forbidden(id);
		}

		// 完了状態を反転して保存
		const updated = this.store.update(id, { completed: !found.data.completed });
		if (updated.type !== 'success') {
			return updated;
		}

		return success({ taskId: updated.data.id, completed: updated.data.completed });
	}

	delete(id: TaskId, ownerId: OwnerId): Result<void> {
		// 対象のタスクを取得
		const found = this.store.get(id);
		if (found.type !== 'success') {
			return found;
		}

		// 他のユーザーのタスクは削除させない
		if (!canMutate(found.data, ownerId)) {
			return forbidden(id);
		}

		return this.store.delete(id);
	}

	overview(ownerId: OwnerId): TaskOverview {
		const activeTasks = this.store.list({ ownerId, completed: false });
		const completedTasks = this.store.list({ ownerId, completed: true });

		return {
			activeTasks,
			completedTasks,
			counts: {
				total: this.store.count({ ownerId }),
				completed: completedTasks.length,
				active: activeTasks.length,
			},
			today: this.today(),
		};
	}

	calendar(ownerId: OwnerId, year: string | undefined, month: string | undefined): CalendarMonth {
		const today = this.today();
		const target = resolveMonth(year, month, today);

		// その月に期限があるタスクだけを取得
		const tasks = this.store.list({
			ownerId,
			dueFrom: formatDate(target.year, target.month, 1),
			dueTo: formatDate(target.year, target.month, daysInMonth(target.year, target.month)),
			order: 'due-date',
		});

		return buildCalendarMonth(target, tasks, today);
	}
}
