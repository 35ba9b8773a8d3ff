import { promises as fs } from "node:fs";
import path from "node:path";
import type { DependencyKey, Tool } from "@tollgate/core";
import { defineTool, ToolExecutionError } from "@tollgate/core";
import { debugLog } from "@tollgate/logger";
import { z } from "zod";
import { getSandboxContext, type SandboxContext } from "../sandbox/context";
import { walkFiles } from "../utils/walk";
import { toFsToolError } from "./errors";

const DEFAULT_MAX_RESULTS = 50;
const MAX_MATCH_LINE_CHARS = 200;

const BINARY_EXTENSIONS = new Set([
	"jpg",
	"jpeg",
	"png",
	"gif",
	"bmp",
	"ico",
	"webp",
	"pdf",
	"zip",
	"tar",
	"gz",
	"rar",
	"7z",
	"exe",
	"dll",
	"so",
	"dylib",
	"bin",
	"dat",
	"mp4",
	"mov",
	"avi",
	"mkv",
	"iso",
	"db",
	"sqlite",
	"sqlite3",
	"wasm",
]);

const isBinaryPath = (filePath: string): boolean =>
	BINARY_EXTENSIONS.has(path.extname(filePath).slice(1).toLowerCase());

export const createGrepTool = (
	sandboxKey: DependencyKey<SandboxContext>,
): Tool =>
	defineTool({
		name: "grep",
		description:
			"Search workspace file contents with a regular expression. Returns `path:line: text` lines.",
		input: z.object({
			pattern: z.string().describe("Regex pattern (JavaScript syntax)."),
			path: z
				.string()
				.optional()
				.describe("File or directory to search. Defaults to the workspace root."),
			case_sensitive: z
				.boolean()
				.optional()
				.describe("Match case exactly. Default false."),
			max_results: z
				.number()
				.int()
				.positive()
				.optional()
				.describe(`Maximum number of matches. Default ${DEFAULT_MAX_RESULTS}.`),
		}),
		execute: async (input, ctx) => {
			const sandbox = await getSandboxContext(ctx, sandboxKey);
			const searchPath = sandbox.resolvePath(input.path ?? ".");
			const maxResults = Math.min(
				input.max_results ?? DEFAULT_MAX_RESULTS,
				sandbox.limits.searchMaxResults,
			);

			let regex: RegExp;
			try {
				regex = new RegExp(input.pattern, input.case_sensitive ? "" : "i");
			} catch (error) {
				throw new ToolExecutionError(
					"invalid_input",
					`Invalid regex: ${error instanceof Error ? error.message : String(error)}`,
				);
			}

			const results: string[] = [];
			const searchFile = async (filePath: string): Promise<boolean> => {
				let content: string;
				try {
					const stat = await fs.stat(filePath);
					if (stat.size === 0 || stat.size > sandbox.limits.readMaxBytes) {
						return true;
					}
					content = await fs.readFile(filePath, "utf8");
				} catch (error) {
					debugLog(`grep skipped ${filePath}: ${String(error)}`);
					return true;
				}
				const lines = content.split(/\r?\n/);
				for (let index = 0; index < lines.length; index += 1) {
					if (!regex.test(lines[index])) continue;
					results.push(
						`${sandbox.relativePath(filePath)}:${index + 1}: ${lines[index].slice(0, MAX_MATCH_LINE_CHARS)}`,
					);
					if (results.length >= maxResults) return false;
				}
				return true;
			};

			try {
				const stats = await fs.stat(searchPath);
				if (stats.isFile()) {
					await searchFile(searchPath);
				} else if (stats.isDirectory()) {
					await walkFiles(searchPath, searchFile, {
						signal: ctx.signal,
						skip: (fullPath) =>
							isBinaryPath(fullPath) ||
							sandbox.ignore.ignores(sandbox.relativePath(fullPath)),
					});
				} else {
					throw new ToolExecutionError(
						"invalid_input",
						`Path is not a file or directory: ${input.path ?? "."}`,
					);
				}
			} catch (error) {
				throw toFsToolError(error, "searching", input.path ?? ".");
			}

			if (!results.length) {
				return `No matches for: ${input.pattern}`;
			}
			return results.length >= maxResults
				? `${results.join("\n")}\n... (truncated at ${maxResults} results)`
				: results.join("\n");
		},
	});
