import { promises as fs } from "node:fs";
import type { DependencyKey, Tool } from "@tollgate/core";
import { defineTool, ToolExecutionError } from "@tollgate/core";
import { z } from "zod";
import { getSandboxContext, type SandboxContext } from "../sandbox/context";
import { toFsToolError } from "./errors";

const DEFAULT_READ_LIMIT = 2000;
const MAX_LINE_LENGTH = 2000;
const MAX_OUTPUT_BYTES = 50 * 1024;

type LineWindow = {
	lines: string[];
	/** 1-based number of the last line included. */
	lastLine: number;
	cutByBytes: boolean;
};

const clipLine = (line: string): string =>
	line.length > MAX_LINE_LENGTH ? `${line.slice(0, MAX_LINE_LENGTH)}...` : line;

const takeWindow = (all: string[], offset: number, limit: number): LineWindow => {
	const lines: string[] = [];
	let bytes = 0;
	for (const line of all.slice(offset, offset + limit).map(clipLine)) {
		bytes += Buffer.byteLength(line, "utf8") + (lines.length ? 1 : 0);
		if (bytes > MAX_OUTPUT_BYTES) {
			return { lines, lastLine: offset + lines.length, cutByBytes: true };
		}
		lines.push(line);
	}
	return { lines, lastLine: offset + lines.length, cutByBytes: false };
};

const readTextFile = async (
	sandbox: SandboxContext,
	requested: string,
): Promise<string> => {
	const resolved = sandbox.resolvePath(requested);
	try {
		const stat = await fs.stat(resolved);
		if (stat.isDirectory()) {
			throw new ToolExecutionError("invalid_input", `Path is a directory: ${requested}`);
		}
		const limit = sandbox.limits.readMaxBytes;
		if (stat.size > limit) {
			throw new ToolExecutionError(
				"too_large",
				`File is too large to read (${stat.size} bytes, limit ${limit} bytes): ${requested}`,
			);
		}
		return await fs.readFile(resolved, "utf8");
	} catch (error) {
		throw toFsToolError(error, "reading", requested);
	}
};

export const createReadTool = (
	sandboxKey: DependencyKey<SandboxContext>,
): Tool =>
	defineTool({
		name: "read",
		description:
			"Read a text file from the workspace with optional 0-based line offset and line limit.",
		input: z.object({
			path: z.string().describe("File path relative to the workspace root."),
			offset: z
				.number()
				.int()
				.nonnegative()
				.optional()
				.describe("0-based start line. Default 0."),
			limit: z
				.number()
				.int()
				.positive()
				.optional()
				.describe(`Max lines to read. Default ${DEFAULT_READ_LIMIT}.`),
		}),
		execute: async (input, ctx) => {
			const sandbox = await getSandboxContext(ctx, sandboxKey);
			const content = await readTextFile(sandbox, input.path);
			if (!content) return "(empty file)";

			const all = content.split(/\r?\n/);
			if (all.length > 1 && all.at(-1) === "") all.pop();
			const offset = input.offset ?? 0;
			if (offset >= all.length) {
				throw new ToolExecutionError(
					"invalid_input",
					`Offset ${offset} exceeds file length (${all.length} lines): ${input.path}`,
				);
			}

			const window = takeWindow(all, offset, input.limit ?? DEFAULT_READ_LIMIT);
			const body = window.lines
				.map((line, index) => `${String(offset + index + 1).padStart(5)}  ${line}`)
				.join("\n");
			if (!window.cutByBytes && window.lastLine >= all.length) return body;
			const note = window.cutByBytes
				? `Output truncated at ${MAX_OUTPUT_BYTES} bytes.`
				: "File has more lines.";
			return `${body}\n\n${note} Use offset to read beyond line ${window.lastLine}.`;
		},
	});
