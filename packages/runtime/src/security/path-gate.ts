import { realpathSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_IGNORE_FILE } from "@tollgate/config";
import { debugLog, log } from "@tollgate/logger";
import { IgnoreMatcher } from "./ignore";
import sensitivePaths from "./sensitive-paths.json";

export type PathBlockReason = "sensitive_path" | "outside_workspace" | "ignored";

export type GateVerdict =
	| { allowed: true; resolvedPath: string }
	| { allowed: false; reason: PathBlockReason; message: string };

export type PathGateOptions = {
	ignore?: IgnoreMatcher;
	/** Overrides the ignore file's patterns. */
	ignorePatterns?: string[];
	ignoreFileName?: string;
	extraBlockedPaths?: string[];
	homeDir?: string;
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
	error instanceof Error && "code" in error;

const expandHome = (value: string, homeDir: string): string => {
	if (value === "~") return homeDir;
	if (value.startsWith("~/")) return path.join(homeDir, value.slice(2));
	return value;
};

/**
 * Follows symlinks for the longest existing prefix of `target` and re-appends
 * the part that does not exist yet.
 */
export const resolveRealPath = (target: string): string => {
	const absolute = path.resolve(target);
	const missing: string[] = [];
	let current = absolute;
	for (;;) {
		try {
			const real = realpathSync(current);
			return missing.length ? path.join(real, ...missing.reverse()) : real;
		} catch (error) {
			if (!isErrnoException(error)) throw error;
			if (error.code !== "ENOENT" && error.code !== "ENOTDIR") throw error;
		}
		const parent = path.dirname(current);
		if (parent === current) return absolute;
		missing.push(path.basename(current));
		current = parent;
	}
};

const isInside = (parent: string, child: string): boolean => {
	const relative = path.relative(parent, child);
	return (
		relative === "" ||
		(!relative.startsWith("..") && !path.isAbsolute(relative))
	);
};

const blockedPathEntries = (
	homeDir: string,
	extra: readonly string[],
): string[] => [
	...sensitivePaths.system,
	...sensitivePaths.home.map((entry) => path.join(homeDir, entry)),
	...extra.map((entry) => expandHome(entry, homeDir)),
];

const friendlyMessage = (
	reason: PathBlockReason,
	input: string,
	ignoreFileName: string,
): string => {
	switch (reason) {
		case "ignored":
			return `I cannot access '${input}' because it's protected by the project's ${ignoreFileName} file. Files listed there are kept out of reach on purpose.`;
		case "sensitive_path":
			return `I cannot access '${input}' because it's a protected system file or directory.`;
		case "outside_workspace":
			return `I cannot access '${input}' because it's outside the current project directory. I can only work with files inside the project folder.`;
	}
};

export const validatePath = (
	inputPath: string,
	workspaceRoot: string,
	options: PathGateOptions = {},
): GateVerdict => {
	const homeDir = options.homeDir ?? os.homedir();
	const ignoreFileName = options.ignoreFileName ?? DEFAULT_IGNORE_FILE;
	const root = resolveRealPath(workspaceRoot);
	const expanded = expandHome(inputPath.trim(), homeDir);
	const candidate = path.isAbsolute(expanded)
		? expanded
		: path.resolve(root, expanded);
	const resolved = resolveRealPath(candidate);

	const block = (reason: PathBlockReason): GateVerdict => {
		log(`gate blocked path reason=${reason} path=${inputPath}`);
		return {
			allowed: false,
			reason,
			message: friendlyMessage(reason, inputPath, ignoreFileName),
		};
	};

	for (const entry of blockedPathEntries(
		homeDir,
		options.extraBlockedPaths ?? [],
	)) {
		const blocked = resolveRealPath(entry);
		// An entry that contains the workspace would block the whole project.
		if (isInside(blocked, root)) continue;
		if (isInside(blocked, resolved)) return block("sensitive_path");
	}

	if (!isInside(root, resolved)) return block("outside_workspace");

	const ignore = options.ignorePatterns
		? IgnoreMatcher.fromLines(options.ignorePatterns)
		: options.ignore;
	const relative = path.relative(root, resolved);
	if (ignore && relative && ignore.ignores(relative)) return block("ignored");

	debugLog(`gate allowed path ${inputPath} -> ${resolved}`);
	return { allowed: true, resolvedPath: resolved };
};
