import { readFile } from "node:fs/promises";
import path from "node:path";
import { debugLog } from "@tollgate/logger";

const REGEX_SPECIAL_CHARS = /[\\^$+.()|{}[\]]/;

type CompiledPattern = {
	source: string;
	regex: RegExp;
	// Without a slash a pattern may match any single path segment.
	anchored: boolean;
};

const globToRegexBody = (glob: string): string => {
	let body = "";
	for (let index = 0; index < glob.length; index += 1) {
		const char = glob[index];
		if (char === "*" && glob[index + 1] === "*") {
			if (glob[index + 2] === "/") {
				body += "(?:.*/)?";
				index += 2;
			} else {
				body += ".*";
				index += 1;
			}
			continue;
		}
		if (char === "*") {
			body += "[^/]*";
			continue;
		}
		if (char === "?") {
			body += "[^/]";
			continue;
		}
		body += REGEX_SPECIAL_CHARS.test(char) ? `\\${char}` : char;
	}
	return body;
};

const compilePattern = (line: string): CompiledPattern | null => {
	let pattern = line.trim();
	if (!pattern || pattern.startsWith("#") || pattern.startsWith("!")) {
		return null;
	}
	pattern = pattern.replace(/\/+$/, "");
	const anchored = pattern.includes("/");
	pattern = pattern.replace(/^\/+/, "");
	if (!pattern) return null;
	const body = globToRegexBody(pattern);
	return {
		source: line.trim(),
		regex: anchored ? new RegExp(`^${body}(?:/.*)?$`) : new RegExp(`^${body}$`),
		anchored,
	};
};

/**
 * Project ignore-list with gitignore-like globs. Paths are matched relative
 * to the workspace root using forward slashes. Negated (`!`) lines are not
 * supported and are skipped.
 */
export class IgnoreMatcher {
	private readonly compiled: CompiledPattern[];

	private constructor(compiled: CompiledPattern[]) {
		this.compiled = compiled;
	}

	static fromLines(lines: Iterable<string>): IgnoreMatcher {
		const compiled: CompiledPattern[] = [];
		for (const line of lines) {
			const entry = compilePattern(line);
			if (entry) compiled.push(entry);
		}
		return new IgnoreMatcher(compiled);
	}

	static empty(): IgnoreMatcher {
		return new IgnoreMatcher([]);
	}

	get patterns(): string[] {
		return this.compiled.map((entry) => entry.source);
	}

	match(relativePath: string): string | null {
		const normalized = relativePath.split(path.sep).join("/");
		if (!normalized || normalized === ".") return null;
		const segments = normalized.split("/");
		for (const entry of this.compiled) {
			if (entry.anchored) {
				if (entry.regex.test(normalized)) return entry.source;
				continue;
			}
			if (segments.some((segment) => entry.regex.test(segment))) {
				return entry.source;
			}
		}
		return null;
	}

	ignores(relativePath: string): boolean {
		return this.match(relativePath) !== null;
	}
}

export const loadIgnoreFile = async (
	workspaceRoot: string,
	fileName: string,
): Promise<IgnoreMatcher> => {
	const filePath = path.join(workspaceRoot, fileName);
	let raw: string;
	try {
		raw = await readFile(filePath, "utf8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return IgnoreMatcher.empty();
		}
		throw error;
	}
	const matcher = IgnoreMatcher.fromLines(raw.split(/\r?\n/));
	debugLog(`ignore file ${filePath} patterns=${matcher.patterns.length}`);
	return matcher;
};
