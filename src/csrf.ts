import type { MiddlewareHandler } from 'hono';
import { getCookie, setCookie } from 'hono/cookie';
import { timingSafeEqual } from 'hono/utils/buffer';
import type { AppEnv } from '.';
import { hash } from './hash';

export const CSRF_COOKIE = 'csrf_nonce';
export const CSRF_HEADER = 'X-CSRF-Token';
export const CSRF_FIELD = 'csrf_token';

// 状態を変えないメソッドはトークンを確認しない
const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

// nonce とサーバーの秘密鍵からトークンを作る
export function csrfTokenFor(nonce: string, secret: string): Promise<string> {
	return hash(`${nonce}.${secret}`);
}

// CSRF 対策ミドルウェア
// - cookie の nonce が無ければ発行し、対応するトークンを context に入れてページに埋め込めるようにする
// - POST などはヘッダーかフォームの csrf_token に正しいトークンが無ければ 403
export function csrfProtection(secret: string): MiddlewareHandler<AppEnv> {
	return async (context, next) => {
		// nonce を取得（無ければ発行）
		let nonce = getCookie(context, CSRF_COOKIE);
		if (!nonce) {
			nonce = crypto.randomUUID();
			setCookie(context, CSRF_COOKIE, nonce, { path: '/', httpOnly: true, sameSite: 'Lax' });
		}

		const expected = await csrfTokenFor(nonce, secret);
		context.set('csrfToken', expected);

		if (SAFE_METHODS.has(context.req.method)) {
			return next();
		}

		// ヘッダー、無ければフォームのフィールドからトークンを取得
		let presented = context.req.header(CSRF_HEADER);
		if (!presented && isFormRequest(context.req.header('Content-Type'))) {
			const body = await context.req.parseBody();
			const field = body[CSRF_FIELD];
			presented = typeof field === 'string' ? field : undefined;
		}

		// トークンが無い・一致しなければ 403
		if (!presented || !(await timingSafeEqual(presented, expected))) {
			return context.get('responder').failure(context, { status: 403, error: 'CSRF token missing or incorrect' });
		}

		await next();
	};
}

function isFormRequest(contentType: string | undefined): boolean {
	if (!contentType) {
		return false;
	}

	return contentType.startsWith('application/x-www-form-urlencoded') || contentType.startsWith('multipart/form-data');
}
