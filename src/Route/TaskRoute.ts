import { Hono, type Context } from 'hono';
import { zValidator } from '@hono/zod-validator';
import z from 'zod';
import type { AppEnv } from '..';
import { failureOf } from './Responder';

// タスク系のルートをまとめるサブルーター
export const taskRoute = new Hono<AppEnv>();

// パスパラメーターの id を検証
// - 正の整数でなければ存在しないタスクとして扱う
const taskIdParam = zValidator(
	'param',
	z.object({
		id: z.coerce.number().int().positive(),
	}),
	(result, context: Context<AppEnv>) => {
		if (!result.success) {
			return context.get('responder').failure(context, { status: 404, error: 'Task not found' });
		}
	}
);

// リクエストボディを取得（JSON とフォーム送信の両方を受け付ける）
async function readBody(context: Context<AppEnv>): Promise<unknown> {
	const contentType = context.req.header('Content-Type') ?? '';

	if (contentType.startsWith('application/json')) {
		// 壊れた JSON は空の入力として検証エラーにする
		return context.req.json().catch(() => ({}));
	}

	return context.req.parseBody();
}

// フォームに戻す入力値（文字列だけ）
function formValues(body: unknown): Record<string, string> {
	const values: Record<string, string> = {};

	if (typeof body !== 'object' || body === null) {
		return values;
	}

	for (const field of ['title', 'due_date']) {
		const value: unknown = Reflect.get(body, field);
		if (typeof value === 'string') {
			values[field] = value;
		}
	}

	return values;
}

// タスク一覧
// - 未完了と完了済みに分け、それぞれ新しい順
taskRoute.get('', (context) => {
	// ログイン中なら自分のタスク、未ログインなら所有者のいないタスク
	const overview = context.get('service').overview(context.get('owner'));

	return context.get('responder').overview(context, overview);
});

// 期限日ごとのカレンダー
taskRoute.get('/calendar', (context) => {
	const calendar = context.get('service').calendar(context.get('owner'), context.req.query('year'), context.req.query('month'));

	return context.get('responder').calendar(context, calendar);
});

// タスク作成
taskRoute.post('', async (context) => {
	// リクエストボディを取得
	const body = await readBody(context);
	const responder = context.get('responder');

	// 検証してから保存
	const result = context.get('service').create(body, context.get('owner'));

	if (result.type !== 'success') {
		// 入力エラーはフォームに値を戻して再表示できるようにする
		return responder.failure(context, { ...failureOf(result), error: 'Could not add the task', values: formValues(body) });
	}

	const task = result.data;

	return responder.success(
		context,
		{
			task: {
				id: task.id,
				title: task.title,
				completed: task.completed,
			},
		},
		'Task added!'
	);
});

// 完了状態の切り替え
taskRoute.post('/:id/toggle', taskIdParam, (context) => {
	// パラメーターから id を取得
	const { id } = context.req.valid('param');
	const responder = context.get('responder');

	const result = context.get('service').toggle(id, context.get('owner'));

	if (result.type !== 'success') {
		return responder.failure(context, failureOf(result));
	}

	return responder.success(
		context,
		{ completed: result.data.completed, taskId: result.data.taskId },
		result.data.completed ? 'Task completed!' : 'Task reopened!'
	);
});

// タスク削除（元に戻せない）
taskRoute.post('/:id/delete', taskIdParam, (context) => {
	// パラメーターから id を取得
	const { id } = context.req.valid('param');
	const responder = context.get('responder');

	const result = context.get('service').delete(id, context.get('owner'));

	if (result.type !== 'success') {
		return responder.failure(context, failureOf(result));
	}

	return responder.success(context, {}, 'Task deleted!');
});
