// SHA-256 の 16 進文字列を返す（CSRF トークンの導出に使う）
export async function hash(message: string): Promise<string> {
	// ハッシュ計算するために数値に変換する
	const encodeMessage = new TextEncoder().encode(message);
	const digest = await crypto.subtle.digest('sha-256', encodeMessage);
	const hash = Array.from(new Uint8Array(digest))
		.map((b) => b.toString(16).padStart(2, '0'))
		.join('');

	return hash;
}
