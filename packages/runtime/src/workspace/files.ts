import { promises as fs, type Stats } from "node:fs";
import path from "node:path";
import { debugLog } from "@tollgate/logger";
import type { SandboxContext } from "../sandbox/context";
import { type PathGateOptions, validatePath } from "../security/path-gate";
import { toFsToolError } from "../tools/errors";
import fileTypes from "./file-types.json";

export type FileNode = {
	name: string;
	path: string;
	is_dir: boolean;
	children?: FileNode[];
};

export type WorkspaceReadError =
	| "forbidden"
	| "not_found"
	| "not_a_file"
	| "unsupported"
	| "too_large";

export type WorkspaceReadResult =
	| { ok: true; path: string; content: string }
	| { ok: false; error: WorkspaceReadError; message: string };

const EXTENSIONS = new Set(fileTypes.extensions);
const EXCLUDED_DIRS = new Set(fileTypes.excludedDirs);
const EXCLUDED_FILES = new Set(fileTypes.excludedFiles);

/** Code and text files by extension, plus a few well-known bare names. */
export const isViewableFile = (name: string): boolean => {
	const extension = path.extname(name);
	if (extension) return EXTENSIONS.has(extension.slice(1).toLowerCase());
	return fileTypes.bareNames.some((prefix) => name.startsWith(prefix));
};

// Directories first, then case-insensitive by name.
const compareNodes = (left: FileNode, right: FileNode): number => {
	if (left.is_dir !== right.is_dir) return left.is_dir ? -1 : 1;
	const a = left.name.toLowerCase();
	const b = right.name.toLowerCase();
	return a < b ? -1 : a > b ? 1 : 0;
};

/**
 * Read-only view of the workspace for the browser UI. Listing skips hidden
 * entries, build output and ignored paths; reading goes through the same
 * path gate as the tools.
 */
export class WorkspaceFiles {
	private readonly sandbox: SandboxContext;
	private readonly gate: PathGateOptions;

	constructor(sandbox: SandboxContext, gate: PathGateOptions = {}) {
		this.sandbox = sandbox;
		this.gate = { ...gate, ignore: sandbox.ignore };
	}

	tree(): Promise<FileNode[]> {
		return this.listDir(this.sandbox.rootDir, "");
	}

	async read(relativePath: string): Promise<WorkspaceReadResult> {
		const verdict = validatePath(relativePath, this.sandbox.rootDir, this.gate);
		if (!verdict.allowed) {
			return { ok: false, error: "forbidden", message: verdict.message };
		}
		const target = verdict.resolvedPath;
		let stat: Stats;
		try {
			stat = await fs.stat(target);
		} catch (error) {
			const failure = toFsToolError(error, "reading", relativePath);
			if (failure.kind !== "not_found") throw failure;
			return { ok: false, error: "not_found", message: failure.message };
		}
		if (!stat.isFile()) {
			return {
				ok: false,
				error: "not_a_file",
				message: `Path is not a file: ${relativePath}`,
			};
		}
		if (!isViewableFile(path.basename(target))) {
			return {
				ok: false,
				error: "unsupported",
				message: `File type not supported for viewing: ${relativePath}`,
			};
		}
		const limit = this.sandbox.limits.readMaxBytes;
		if (stat.size > limit) {
			return {
				ok: false,
				error: "too_large",
				message: `File is too large to view (${stat.size} bytes, limit ${limit} bytes): ${relativePath}`,
			};
		}
		const content = await fs.readFile(target, "utf8");
		debugLog(`workspace read ${relativePath} bytes=${stat.size}`);
		return { ok: true, path: this.sandbox.relativePath(target), content };
	}

	private async listDir(dir: string, relativeDir: string): Promise<FileNode[]> {
		const entries = await fs.readdir(dir, { withFileTypes: true });
		const nodes: FileNode[] = [];
		for (const entry of entries) {
			if (entry.name.startsWith(".")) continue;
			const relativePath = relativeDir
				? `${relativeDir}/${entry.name}`
				: entry.name;
			if (this.sandbox.ignore.match(relativePath)) continue;
			if (entry.isDirectory()) {
				if (EXCLUDED_DIRS.has(entry.name)) continue;
				const children = await this.listDir(
					path.join(dir, entry.name),
					relativePath,
				);
				// Directories with nothing viewable are left out.
				if (children.length) {
					nodes.push({
						name: entry.name,
						path: relativePath,
						is_dir: true,
						children,
					});
				}
			} else if (entry.isFile()) {
				if (EXCLUDED_FILES.has(entry.name) || !isViewableFile(entry.name)) {
					continue;
				}
				nodes.push({ name: entry.name, path: relativePath, is_dir: false });
			}
		}
		return nodes.sort(compareNodes);
	}
}
