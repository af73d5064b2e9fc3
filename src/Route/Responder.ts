import type { Context, HonoRequest } from 'hono';
import { deleteCookie, getCookie, setCookie } from 'hono/cookie';
import type { AppEnv } from '..';
import type { FieldErrors, Result } from '../Entity/Result';
import type { TaskOverview } from '../Service/TaskMutationService';
import type { CalendarMonth } from '../Service/calendar';
import { taskListPage } from '../View/TaskListPage';
import { calendarPage } from '../View/CalendarPage';

// 応答の形式（リクエストごとにミドルウェアで一度だけ決める）
export enum ResponseMode {
	Json = 'json',
	Page = 'page',
}

// 失敗時に返す内容
export interface Failure {
	status: 400 | 403 | 404;
	error: string;
	errors?: FieldErrors;
	// ページを再表示するときにフォームへ戻す入力値
	values?: Record<string, string>;
}

export type SuccessPayload = Record<string, unknown>;

const FLASH_COOKIE = 'flash';

// AJAX からのリクエストなら JSON、それ以外はページを返す
// - X-Requested-With: XMLHttpRequest か、Accept で JSON を要求しているか
export function detectResponseMode(req: HonoRequest): ResponseMode {
	if (req.header('X-Requested-With') === 'XMLHttpRequest') {
		return ResponseMode.Json;
	}

	const accept = req.header('Accept') ?? '';
	if (accept.includes('application/json') && !accept.includes('text/html')) {
		return ResponseMode.Json;
	}

	return ResponseMode.Page;
}

// 処理結果の失敗側を HTTP の失敗に変換
export function failureOf(result: Exclude<Result<unknown>, { type: 'success' }>): Failure {
	switch (result.type) {
		case 'validation-error':
			return { status: 400, error: 'Invalid input', errors: result.errors };
		case 'not-found':
			return { status: 404, error: 'Task not found' };
		case 'forbidden':
			return { status: 403, error: 'Permission denied' };
	}
}

// 結果の書き出し方
export interface Responder {
	readonly mode: ResponseMode;
	// タスク一覧
	overview(context: Context<AppEnv>, overview: TaskOverview): Response | Promise<Response>;
	// カレンダー
	calendar(context: Context<AppEnv>, calendar: CalendarMonth): Response | Promise<Response>;
	// 変更系 API の成功（flash はページ表示時のメッセージ）
	success(context: Context<AppEnv>, payload: SuccessPayload, flash: string): Response | Promise<Response>;
	// 変更系 API の失敗
	failure(context: Context<AppEnv>, failure: Failure): Response | Promise<Response>;
}

// JSON のエンベロープ {success, ...} で返す
export class JsonResult implements Responder {
	readonly mode = ResponseMode.Json;

	overview(context: Context<AppEnv>, overview: TaskOverview): Response {
		return context.json({
			success: true,
			activeTasks: overview.activeTasks,
			completedTasks: overview.completedTasks,
			counts: overview.counts,
		});
	}

	calendar(context: Context<AppEnv>, calendar: CalendarMonth): Response {
		return context.json({ success: true, calendar });
	}

	success(context: Context<AppEnv>, payload: SuccessPayload): Response {
		return context.json({ success: true, ...payload });
	}

	failure(context: Context<AppEnv>, failure: Failure): Response {
		return context.json(
			{
				success: false,
				error: failure.error,
				...(failure.errors ? { errors: failure.errors } : {}),
			},
			failure.status
		);
	}
}

// サーバー側でレンダリングしたページを返す
// - 成功時は一覧へリダイレクトし、次の表示でメッセージを出す
// - 失敗時は一覧ページをエラー付きで再表示する
export class RenderedPage implements Responder {
	readonly mode = ResponseMode.Page;

	overview(context: Context<AppEnv>, overview: TaskOverview): Response | Promise<Response> {
		// 一度だけ表示するメッセージを取り出して消す
		const flash = getCookie(context, FLASH_COOKIE);
		if (flash !== undefined) {
			deleteCookie(context, FLASH_COOKIE, { path: '/' });
		}

		return context.html(taskListPage({ overview, csrfToken: context.get('csrfToken'), flash }));
	}

	calendar(context: Context<AppEnv>, calendar: CalendarMonth): Response | Promise<Response> {
		return context.html(calendarPage(calendar, context.get('csrfToken')));
	}

	success(context: Context<AppEnv>, _payload: SuccessPayload, flash: string): Response {
		setCookie(context, FLASH_COOKIE, flash, { path: '/', httpOnly: true, sameSite: 'Lax' });

		return context.redirect('/tasks', 303);
	}

	failure(context: Context<AppEnv>, failure: Failure): Response | Promise<Response> {
		const overview = context.get('service').overview(context.get('owner'));

		return context.html(
			taskListPage({
				overview,
				csrfToken: context.get('csrfToken'),
				notice: failure.error,
				errors: failure.errors,
				values: failure.values,
			}),
			failure.status
		);
	}
}

const jsonResult = new JsonResult();
const renderedPage = new RenderedPage();

export function responderFor(mode: ResponseMode): Responder {
	return mode === ResponseMode.Json ? jsonResult : renderedPage;
}
