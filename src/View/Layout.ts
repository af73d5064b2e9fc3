import { html } from 'hono/html';
import type { HtmlEscapedString } from 'hono/utils/html';

export type HtmlContent = HtmlEscapedString | Promise<HtmlEscapedString>;

export interface LayoutProps {
	title: string;
	csrfToken: string;
	// 前のリクエストからのメッセージ
	flash?: string;
	// エラー表示
	notice?: string;
	body: HtmlContent;
}

// 全ページ共通のレイアウト
// - クライアントスクリプトは meta タグから CSRF トークンを読む
export function layout({ title, csrfToken, flash, notice, body }: LayoutProps): HtmlContent {
	return html`<!doctype html>
<html lang="en">
	<head>
		<meta charset="utf-8" />
		<meta name="viewport" content="width=device-width, initial-scale=1" />
		<meta name="csrf-token" content="${csrfToken}" />
		<title>${title}</title>
		<link rel="stylesheet" href="/static/style.css" />
	</head>
	<body>
		<nav class="nav">
			<a href="/tasks">Tasks</a>
			<a href="/tasks/calendar">Calendar</a>
		</nav>
		${flash ? html`<div class="message message-success" role="status">${flash}</div>` : ''}
		${notice ? html`<div class="message message-error" role="alert">${notice}</div>` : ''}
		<main class="container">${body}</main>
		<script type="module" src="/static/main.js"></script>
	</body>
</html>`;
}
