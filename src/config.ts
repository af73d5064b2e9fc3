import z from 'zod';

// 環境変数の定義
const configSchema = z.object({
	PORT: z.coerce.number().int().min(1).max(65535).default(8787),
	DATABASE_PATH: z.string().min(1).default('./data/tasks.db'),
	CSRF_SECRET: z.string({ required_error: 'CSRF_SECRET is required' }).min(1, 'CSRF_SECRET must not be empty'),
	LOG_REQUESTS: z
		.enum(['true', 'false'])
		.default('true')
		.transform((value) => value === 'true'),
	STATIC_ROOT: z.string().min(1).default('./public'),
});

export interface AppConfig {
	port: number;
	databasePath: string;
	csrfSecret: string;
	logRequests: boolean;
	staticRoot: string;
}

// 設定が不正なときのエラー（不正な変数をすべて並べる）
export class ConfigError extends Error {
	constructor(readonly issues: string[]) {
		super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
		this.name = 'ConfigError';
	}
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
	const parsed = configSchema.safeParse(env);

	if (!parsed.success) {
		throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
	}

	return {
		port: parsed.data.PORT,
		databasePath: parsed.data.DATABASE_PATH,
		csrfSecret: parsed.data.CSRF_SECRET,
		logRequests: parsed.data.LOG_REQUESTS,
		staticRoot: parsed.data.STATIC_ROOT,
	};
}
