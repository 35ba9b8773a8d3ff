import { promises as fs } from "node:fs";
import path from "node:path";
import type { DependencyKey, Tool } from "@tollgate/core";
import { defineTool } from "@tollgate/core";
import { z } from "zod";
import { getSandboxContext, type SandboxContext } from "../sandbox/context";
import { toFsToolError } from "./errors";

export const createWriteTool = (
	sandboxKey: DependencyKey<SandboxContext>,
): Tool =>
	defineTool({
		name: "write",
		description:
			"Write UTF-8 text to a workspace file, creating parent directories if needed. Existing files are overwritten.",
		input: z.object({
			path: z.string().describe("File path relative to the workspace root."),
			content: z.string().describe("UTF-8 text content to write."),
		}),
		execute: async (input, ctx) => {
			const sandbox = await getSandboxContext(ctx, sandboxKey);
			const resolved = sandbox.resolvePath(input.path);
			try {
				await fs.mkdir(path.dirname(resolved), { recursive: true });
				await fs.writeFile(resolved, input.content, "utf8");
			} catch (error) {
				throw toFsToolError(error, "writing", input.path);
			}
			return `File written successfully (${Buffer.byteLength(input.content, "utf8")} bytes)`;
		},
	});
