import type { DependencyKey, Tool } from "@tollgate/core";
import { defineTool, ToolExecutionError } from "@tollgate/core";
import { debugLog } from "@tollgate/logger";
import { z } from "zod";
import { getSandboxContext, type SandboxContext } from "../sandbox/context";
import {
	MAX_OUTPUT_BYTES,
	runShellCommand,
	summarizeCommand,
} from "./bash-utils";

export const createBashTool = (
	sandboxKey: DependencyKey<SandboxContext>,
): Tool =>
	defineTool({
		name: "bash",
		description:
			"Run a shell command in the workspace root and return its combined output.",
		input: z.object({
			command: z
				.string()
				.min(1)
				.describe("Shell command to execute in the workspace root."),
			timeout: z
				.number()
				.int()
				.positive()
				.optional()
				.describe(
					"Timeout in seconds (not milliseconds). Default 10, max 60.",
				),
		}),
		timeoutSeconds: (input) => input.timeout,
		execute: async (input, ctx) => {
			const sandbox = await getSandboxContext(ctx, sandboxKey);
			const timeoutSeconds = sandbox.clampTimeoutSeconds(input.timeout);
			const startedAt = Date.now();
			debugLog(
				`bash.start cwd=${sandbox.rootDir} timeout_s=${timeoutSeconds} command="${summarizeCommand(input.command)}"`,
			);
			const result = await runShellCommand(input.command, {
				cwd: sandbox.rootDir,
				timeoutMs: timeoutSeconds * 1000,
				maxOutputBytes: MAX_OUTPUT_BYTES,
				signal: ctx.signal,
			});
			debugLog(
				`bash.done duration_ms=${Date.now() - startedAt} exit=${result.exitCode ?? result.signal ?? "unknown"}`,
			);
			const output = result.output.trim();
			const note = result.truncated
				? `\n[output truncated at ${MAX_OUTPUT_BYTES} bytes]`
				: "";
			if (result.exitCode !== 0) {
				const status =
					result.exitCode === null
						? `signal ${result.signal ?? "unknown"}`
						: `exit code ${result.exitCode}`;
				throw new ToolExecutionError(
					"exit_code",
					output
						? `Command failed with ${status}:\n${output}${note}`
						: `Command failed with ${status}`,
				);
			}
			return output ? `${output}${note}` : "(no output)";
		},
	});
