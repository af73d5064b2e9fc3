import { Hono, type Context } from 'hono';
import { logger } from 'hono/logger';
import { serveStatic } from '@hono/node-server/serve-static';
import { taskRoute } from './Route/TaskRoute';
import { detectResponseMode, responderFor, type Responder, ResponseMode } from './Route/Responder';
import { csrfProtection } from './csrf';
import type { TaskDb } from './db';
import type { OwnerId } from './Entity/TaskEntity';
import { TaskStore, type Clock } from './Store/TaskStore';
import { TaskMutationService } from './Service/TaskMutationService';

// Hono のコンテキストで使用する変数の型定義
export interface Variables {
	store: TaskStore;
	service: TaskMutationService;
	// 現在のユーザー（null は未ログイン）
	owner: OwnerId;
	responseMode: ResponseMode;
	responder: Responder;
	csrfToken: string;
}

export type AppEnv = { Variables: Variables };

// 現在のユーザーを判定する関数（認証は外部に任せる）
export type OwnerResolver = (context: Context<AppEnv>) => OwnerId | Promise<OwnerId>;

export interface AppOptions {
	db: TaskDb;
	csrfSecret: string;
	// リクエストログを出すかどうか
	logRequests?: boolean;
	// クライアントスクリプトなどの静的ファイルの置き場所
	staticRoot?: string;
	resolveOwner?: OwnerResolver;
	clock?: Clock;
}

export function createApp(options: AppOptions): Hono<AppEnv> {
	const store = new TaskStore(options.db, options.clock);
	const service = new TaskMutationService(store, options.clock);
	const resolveOwner = options.resolveOwner ?? (() => null);

	const app = new Hono<AppEnv>();

	// リクエストログ
	if (options.logRequests) {
		app.use('*', logger());
	}

	// 静的ファイル
	if (options.staticRoot) {
		app.use('/static/*', serveStatic({ root: options.staticRoot }));
	}

	// 応答形式を決めるミドルウェア
	// - 以降のハンドラーはヘッダーを見ずに responder だけを使う
	app.use('*', async (context, next) => {
		const mode = detectResponseMode(context.req);

		context.set('responseMode', mode);
		context.set('responder', responderFor(mode));

		await next();
	});

	// ストアとサービスを context に格納して使えるようにする
	app.use('*', async (context, next) => {
		context.set('store', store);
		context.set('service', service);

		await next();
	});

	// 現在のユーザーを判定して context に格納
	app.use('*', async (context, next) => {
		context.set('owner', await resolveOwner(context));

		await next();
	});

	// CSRF 対策
	app.use('*', csrfProtection(options.csrfSecret));

	// ルーティング
	app.get('/', (context) => context.redirect('/tasks'));
	app.route('/tasks', taskRoute);

	// 存在しないパス
	app.notFound((context) => {
		if (detectResponseMode(context.req) === ResponseMode.Json) {
			return context.json({ success: false, error: 'Not Found' }, 404);
		}

		return context.text('Not Found', 404);
	});

	// 想定外のエラー
	app.onError((error, context) => {
		console.error(`${context.req.method} ${context.req.path} failed:`, error);

		if (detectResponseMode(context.req) === ResponseMode.Json) {
			return context.json({ success: false, error: 'Internal Server Error' }, 500);
		}

		return context.text('Internal Server Error', 500);
	});

	return app;
}
