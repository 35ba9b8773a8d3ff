import { promises as fs } from "node:fs";
import path from "node:path";

export type WalkVisitor = (filePath: string) => Promise<boolean> | boolean;

/**
 * Depth-first walk over regular files. Symlinks are not followed. Returns
 * false once the visitor asked to stop.
 */
export const walkFiles = async (
	startDir: string,
	visitor: WalkVisitor,
	options: { skip?: (fullPath: string) => boolean; signal?: AbortSignal } = {},
): Promise<boolean> => {
	const entries = await fs.readdir(startDir, { withFileTypes: true });
	entries.sort((left, right) => left.name.localeCompare(right.name));
	for (const entry of entries) {
		if (options.signal?.aborted) return false;
		const fullPath = path.join(startDir, entry.name);
		if (options.skip?.(fullPath)) continue;
		if (entry.isDirectory()) {
			const shouldContinue = await walkFiles(fullPath, visitor, options);
			if (!shouldContinue) return false;
		} else if (entry.isFile()) {
			const shouldContinue = await visitor(fullPath);
			if (!shouldContinue) return false;
		}
	}
	return true;
};
