import { serve } from '@hono/node-server';
import { createApp } from '.';
import { loadConfig } from './config';
import { createDb } from './db';

// 設定を読み込む（不正なら起動しない）
const config = loadConfig();

// DB に接続してアプリを組み立てる
const app = createApp({
	db: createDb(config.databasePath),
	csrfSecret: config.csrfSecret,
	logRequests: config.logRequests,
	staticRoot: config.staticRoot,
});

// Node.js の HTTP サーバーで起動
// - リクエストごとに app.fetch が呼ばれ、ルーティング→処理→レスポンス生成を行う
serve({ fetch: app.fetch, port: config.port }, (info) => {
	console.log(`Task tracker listening on http://localhost:${info.port}`);
});
