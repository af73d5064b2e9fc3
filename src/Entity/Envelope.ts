import z from 'zod';

// AJAX 応答の共通エンベロープ
// - サーバーは型付きで組み立て、クライアントは zod で形を検証してから使う

// 作成 API の応答
export const createEnvelope = z.discriminatedUnion('success', [
	z.object({
		success: z.literal(true),
		task: z.object({
			id: z.number().int().positive(),
			title: z.string(),
			completed: z.boolean(),
		}),
	}),
	z.object({
		success: z.literal(false),
		errors: z.record(z.array(z.string())).optional(),
		error: z.string().optional(),
	}),
]);

// 完了切り替え API の応答
export const toggleEnvelope = z.discriminatedUnion('success', [
	z.object({
		success: z.literal(true),
		completed: z.boolean(),
		taskId: z.number().int().positive(),
	}),
	z.object({
		success: z.literal(false),
		error: z.string().optional(),
	}),
]);

// 削除 API の応答
export const deleteEnvelope = z.discriminatedUnion('success', [
	z.object({
		success: z.literal(true),
	}),
	z.object({
		success: z.literal(false),
		error: z.string().optional(),
	}),
]);

export type CreateEnvelope = z.infer<typeof createEnvelope>;
export type ToggleEnvelope = z.infer<typeof toggleEnvelope>;
export type DeleteEnvelope = z.infer<typeof deleteEnvelope>;
