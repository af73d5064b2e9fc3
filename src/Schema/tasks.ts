import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

// tasks テーブルの定義
export const tasks = sqliteTable(
	'tasks',
	{
		id: integer('id').primaryKey({ autoIncrement: true }),
		title: text('title').notNull(),
		completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
		dueDate: text('due_date'),
		ownerId: text('owner_id'),
		createdAt: text('created_at').notNull(),
		updatedAt: text('updated_at').notNull(),
	},
	(table) => [
		index('idx_tasks_owner_id').on(table.ownerId),
		index('idx_tasks_created_at').on(table.createdAt),
		index('idx_tasks_due_date').on(table.dueDate),
	]
);

export type TaskRow = typeof tasks.$inferSelect;
