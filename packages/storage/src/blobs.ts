import { createHash } from "node:crypto";
import { gunzipSync, gzipSync } from "node:zlib";

export type EncodedBlob = {
	hash: string;
	compressed: Buffer;
	originalSize: number;
};

export const hashContent = (content: string): string =>
	createHash("sha256").update(content, "utf8").digest("hex");

export const encodeBlob = (content: string): EncodedBlob => {
	const raw = Buffer.from(content, "utf8");
	return {
		hash: hashContent(content),
		compressed: gzipSync(raw),
		originalSize: raw.length,
	};
};

export const decodeBlob = (compressed: Buffer): string =>
	gunzipSync(compressed).toString("utf8");
