import type { ZodType } from 'zod';
import type { TaskId } from '../Entity/TaskEntity';
import {
	createEnvelope,
	deleteEnvelope,
	toggleEnvelope,
	type CreateEnvelope,
	type DeleteEnvelope,
	type ToggleEnvelope,
} from '../Entity/Envelope';

// 通信エラー（サーバーに届かない・応答の形が不正）
export class TransportError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
		this.name = 'TransportError';
	}
}

export interface NewTaskInput {
	title: string;
	dueDate?: string;
}

export type FetchFn = typeof fetch;

// タスク API のクライアント
// - 失敗を表す {success:false} はそのまま返し、通信エラーだけ TransportError で投げる
export class TaskApi {
	constructor(
		private readonly csrfToken: string,
		private readonly baseUrl = '',
		private readonly fetchFn: FetchFn = (input, init) => fetch(input, init)
	) {}

	create(input: NewTaskInput): Promise<CreateEnvelope> {
		const body = new URLSearchParams({ title: input.title, due_date: input.dueDate ?? '' });

		return this.post('/tasks', createEnvelope, body);
	}

	toggle(id: TaskId): Promise<ToggleEnvelope> {
		return this.post(`/tasks/${id}/toggle`, toggleEnvelope);
	}

	remove(id: TaskId): Promise<DeleteEnvelope> {
		return this.post(`/tasks/${id}/delete`, deleteEnvelope);
	}

	private async post<T>(path: string, schema: ZodType<T>, body?: URLSearchParams): Promise<T> {
		let response: Response;
		try {
			response = await this.fetchFn(`${this.baseUrl}${path}`, {
				method: 'POST',
				headers: {
					'X-Requested-With': 'XMLHttpRequest',
					'X-CSRF-Token': this.csrfToken,
					Accept: 'application/json',
				},
				body,
			});
		} catch (error) {
			throw new TransportError(`POST ${path} failed`, error);
		}

		// 4xx でも {success:false} のエンベロープが返るので、状態コードではなく本文で判定する
		let payload: unknown;
		try {
			payload = await response.json();
		} catch (error) {
			throw new TransportError(`POST ${path} returned a non-JSON response (HTTP ${response.status})`, error);
		}

		const parsed = schema.safeParse(payload);
		if (!parsed.success) {
			throw new TransportError(`POST ${path} returned an unexpected response (HTTP ${response.status})`, parsed.error);
		}

		return parsed.data;
	}
}
