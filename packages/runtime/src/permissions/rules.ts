import path from "node:path";
import type { PermissionRule } from "@tollgate/config";
import { scanShell } from "../utils/shell";

export const normalizeCommand = (value: string): string =>
	value.trim().replace(/\s+/g, " ");

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const parseRawArgsObject = (
	rawArgs: string,
): Record<string, unknown> | null => {
	try {
		const parsed: unknown = JSON.parse(rawArgs);
		return isRecord(parsed) ? parsed : null;
	} catch {
		return null;
	}
};

export const extractCommand = (rawArgs: string): string | null => {
	const command = parseRawArgsObject(rawArgs)?.command;
	return typeof command === "string" ? command : null;
};

const PATH_TOOLS: Record<string, { key: string; fallback?: string }> = {
	read: { key: "path" },
	write: { key: "path" },
	grep: { key: "path", fallback: "." },
};

/** The path a file tool acts on; undefined for tools that take none. */
export const pathArgument = (
	toolName: string,
	args: Record<string, unknown> | null,
): string | undefined => {
	const pathTool = PATH_TOOLS[toolName];
	if (!pathTool) return undefined;
	const value = args?.[pathTool.key];
	return typeof value === "string" ? value : pathTool.fallback;
};

/** Workspace-relative form used to compare paths against rule scopes. */
export const normalizeRulePath = (value: string): string => {
	const normalized = path.posix.normalize(value.trim().replace(/\\/g, "/"));
	return normalized.replace(/^\.\/+/, "").replace(/\/+$/, "") || ".";
};

/** Command segments of a compound command; redirect targets are dropped. */
export const splitCommandSegments = (command: string): string[] => {
	const segments: string[] = [];
	let current = "";
	let redirectTarget = false;
	const push = (): void => {
		const segment = normalizeCommand(current);
		if (segment) segments.push(segment);
		current = "";
	};
	for (const piece of scanShell(command)) {
		if (piece.kind === "text") {
			if (!redirectTarget) current += piece.text;
			continue;
		}
		push();
		redirectTarget = piece.kind === "redirect";
	}
	push();
	return segments;
};

const globPattern = (glob: string): RegExp => {
	const body = glob
		.replace(/[\\^$+.()|{}[\]]/g, "\\$&")
		.replace(/\*/g, ".*")
		.replace(/\?/g, ".");
	return new RegExp(`^${body}$`);
};

// `git push` covers `git push origin main` but not `git pull`.
const startsWithWords = (segment: string, command: string): boolean => {
	const expected = normalizeCommand(command);
	if (!expected) return false;
	const actual = segment.split(" ");
	return expected.split(" ").every((word, index) => actual[index] === word);
};

export const ruleHasScope = (rule: PermissionRule): boolean =>
	Boolean(rule.command || rule.command_glob);

/** Bare rule for a tool: no command or glob scope. */
export const matchToolRule = (
	rule: PermissionRule,
	toolName: string,
): boolean => rule.tool === toolName && !ruleHasScope(rule);

export const isSameRule = (
	left: PermissionRule,
	right: PermissionRule,
): boolean =>
	left.tool === right.tool &&
	left.command === right.command &&
	left.command_glob === right.command_glob;

/** A bash rule applies when every scope it names matches the segment. */
export const matchBashRule = (
	rule: PermissionRule,
	segment: string,
): boolean => {
	if (rule.tool !== "bash") return false;
	const normalized = normalizeCommand(segment);
	if (!normalized) return false;
	if (rule.command && !startsWithWords(normalized, rule.command)) return false;
	if (rule.command_glob && !globPattern(rule.command_glob).test(normalized)) {
		return false;
	}
	return true;
};

/** Glob rules are also tried against the whole command line. */
export const matchFullCommandRule = (
	rule: PermissionRule,
	command: string,
): boolean => Boolean(rule.command_glob) && matchBashRule(rule, command);

/**
 * A scoped rule for a file tool names a path: the exact path or a directory
 * above it for `command`, a glob for `command_glob`.
 */
export const matchPathRule = (
	rule: PermissionRule,
	toolName: string,
	target: string,
): boolean => {
	if (rule.tool !== toolName || !ruleHasScope(rule)) return false;
	const normalized = normalizeRulePath(target);
	if (rule.command) {
		const scope = normalizeRulePath(rule.command);
		if (normalized !== scope && !normalized.startsWith(`${scope}/`)) {
			return false;
		}
	}
	if (rule.command_glob && !globPattern(rule.command_glob).test(normalized)) {
		return false;
	}
	return true;
};
