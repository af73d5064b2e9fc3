import type { TaskId } from './TaskEntity';

// フィールド名ごとのエラーメッセージ
export type FieldErrors = Record<string, string[]>;

// ストア・サービスの処理結果（例外は投げずに結果の種類で返す）
export type Result<T> =
	| { readonly type: 'success'; readonly data: T }
	| { readonly type: 'validation-error'; readonly errors: FieldErrors }
	| { readonly type: 'not-found'; readonly taskId: TaskId }
	| { readonly type: 'forbidden'; readonly taskId: TaskId };

export function success<T>(data: T): Result<T> {
	return { type: 'success', data };
}

export function validationError<T>(errors: FieldErrors): Result<T> {
	return { type: 'validation-error', errors };
}

export function notFound<T>(taskId: TaskId): Result<T> {
	return { type: 'not-found', taskId };
}

export function forbidden<T>(taskId: TaskId): Result<T> {
	return { type: 'forbidden', taskId };
}
