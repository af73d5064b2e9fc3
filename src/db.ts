import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './Schema/tasks';

export type TaskDb = BetterSQLite3Database<typeof schema>;

// スキーマを作成する SQL（何度実行しても安全）
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
	id INTEGER PRIMARY KEY AUTOINCREMENT,
	title TEXT NOT NULL CHECK (length(trim(title)) > 0),
	completed INTEGER NOT NULL DEFAULT 0,
	due_date TEXT,
	owner_id TEXT,
	created_at TEXT NOT NULL,
	updated_at TEXT NOT NULL CHECK (updated_at >= created_at)
);

CREATE INDEX IF NOT EXISTS idx_tasks_owner_id ON tasks(owner_id);
CREATE INDEX IF NOT EXISTS idx_tasks_created_at ON tasks(created_at);
CREATE INDEX IF NOT EXISTS idx_tasks_due_date ON tasks(due_date);
`;

// SQLite に接続して Drizzle のインスタンスを作成
// - ':memory:' を渡すとインメモリ DB（テスト用）
export function createDb(path: string): TaskDb {
	// ファイル DB の場合は保存先ディレクトリを作成しておく
	if (path !== ':memory:') {
		mkdirSync(dirname(path), { recursive: true });
	}

	const sqlite = new Database(path);

	// 接続ごとに設定が必要なプラグマ
	sqlite.pragma('journal_mode = WAL');
	sqlite.pragma('busy_timeout = 5000');

	// テーブルが無ければ作成
	sqlite.exec(CREATE_SCHEMA_SQL);

	return drizzle(sqlite, { schema });
}

// テスト用のインメモリ DB
export function createTestDb(): TaskDb {
	return createDb(':memory:');
}
