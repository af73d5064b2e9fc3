import { and, asc, count, desc, eq, gte, isNull, lte, type SQL } from 'drizzle-orm';
import type { TaskDb } from '../db';
import { tasks, type TaskRow } from '../Schema/tasks';
import { TITLE_MAX_LENGTH, type OwnerId, type TaskEntity, type TaskId } from '../Entity/TaskEntity';
import { notFound, success, validationError, type FieldErrors, type Result } from '../Entity/Result';

// 作成時に受け取る属性
export interface CreateTaskAttrs {
	title: string;
	dueDate?: string | null;
	ownerId?: OwnerId;
}

// 更新時に受け取る属性（渡されたものだけ更新）
export interface UpdateTaskAttrs {
	title?: string;
	completed?: boolean;
	dueDate?: string | null;
}

// 一覧取得の条件
export interface TaskFilter {
	// null なら匿名タスクのみ
	ownerId: OwnerId;
	completed?: boolean;
	// 期限日の範囲（両端を含む）
	dueFrom?: string;
	dueTo?: string;
	// 並び順（既定は作成日時の新しい順）
	order?: 'newest' | 'due-date';
}

// 時刻を返す関数（テストで差し替えられるようにする）
export type Clock = () => Date;

// 行を TaskEntity に変換
function toEntity(row: TaskRow): TaskEntity {
	return {
		id: row.id,
		title: row.title,
		completed: row.completed,
		dueDate: row.dueDate,
		ownerId: row.ownerId,
		createdAt: row.createdAt,
		updatedAt: row.updatedAt,
	};
}

// タイトルの不変条件を確認（空白のみ・長すぎるタイトルは保存しない）
function checkTitle(title: string): FieldErrors | undefined {
	const trimmed = title.trim();

	if (trimmed.length === 0) {
		return { title: ['Title must not be empty'] };
	}

	if (trimmed.length > TITLE_MAX_LENGTH) {
		return { title: [`Title must be at most ${TITLE_MAX_LENGTH} characters`] };
	}

	return undefined;
}

// タスクの永続化を担当するストア
// - 1 操作 = 1 行への書き込みで、better-sqlite3 の同期書き込みにより戻った時点で永続化済み
export class TaskStore {
	constructor(
		private readonly db: TaskDb,
		private readonly clock: Clock = () => new Date()
	) {}

	// 前回の値より必ず後になる更新日時を作る
	private nextTimestamp(previous?: string): string {
		const now = this.clock();

		if (previous && now.toISOString() <= previous) {
			return new Date(new Date(previous).getTime() + 1).toISOString();
		}

		return now.toISOString();
	}

	create(attrs: CreateTaskAttrs): Result<TaskEntity> {
		const errors = checkTitle(attrs.title);
		if (errors) {
			return validationError(errors);
		}

		const now = this.nextTimestamp();

		const row = this.db
			.insert(tasks)
			.values({
				title: attrs.title.trim(),
				completed: false,
				dueDate: attrs.dueDate ?? null,
				ownerId: attrs.ownerId ?? null,
				createdAt: now,
				updatedAt: now,
			})
			.returning()
			.get();

		return success(toEntity(row));
	}

	get(id: TaskId): Result<TaskEntity> {
		const row = this.db.select().from(tasks).where(eq(tasks.id, id)).get();

		if (!row) {
			return notFound(id);
		}

		return success(toEntity(row));
	}

	list(filter: TaskFilter): TaskEntity[] {
		const order =
			filter.order === 'due-date'
				? [asc(tasks.dueDate), desc(tasks.createdAt), desc(tasks.id)]
				: [desc(tasks.createdAt), desc(tasks.id)];

		const rows = this.db
			.select()
			.from(tasks)
			.where(this.conditions(filter))
			.orderBy(...order)
			.all();

		return rows.map(toEntity);
	}

	count(filter: TaskFilter): number {
		const row = this.db.select({ value: count() }).from(tasks).where(this.conditions(filter)).get();

		return row?.value ?? 0;
	}

	update(id: TaskId, attrs: UpdateTaskAttrs): Result<TaskEntity> {
		const existing = this.db.select().from(tasks).where(eq(tasks.id, id)).get();

		if (!existing) {
			return notFound(id);
		}

		if (attrs.title !== undefined) {
			const errors = checkTitle(attrs.title);
			if (errors) {
				return validationError(errors);
			}
		}

		const row = this.db
			.update(tasks)
			.set({
				title: attrs.title?.trim(),
				completed: attrs.completed,
				dueDate: attrs.dueDate,
				updatedAt: this.nextTimestamp(existing.updatedAt),
			})
			.where(eq(tasks.id, id))
			.returning()
			.get();

		// 同時に削除された場合
		if (!row) {
			return notFound(id);
		}

		return success(toEntity(row));
	}

	delete(id: TaskId): Result<void> {
		const row = this.db.delete(tasks).where(eq(tasks.id, id)).returning({ id: tasks.id }).get();

		if (!row) {
			return notFound(id);
		}

		return success(undefined);
	}

	// 一覧・件数取得で共通の WHERE 条件を組み立てる
	private conditions(filter: TaskFilter): SQL | undefined {
		const conditions: SQL[] = [filter.ownerId === null ? isNull(tasks.ownerId) : eq(tasks.ownerId, filter.ownerId)];

		if (filter.completed !== undefined) {
			conditions.push(eq(tasks.completed, filter.completed));
		}

		if (filter.dueFrom) {
			conditions.push(gte(tasks.dueDate, filter.dueFrom));
		}

		if (filter.dueTo) {
			conditions.push(lte(tasks.dueDate, filter.dueTo));
		}

		return and(...conditions);
	}
}
