import { spawn } from "node:child_process";
import { ToolExecutionError } from "@tollgate/core";
import { debugLog } from "@tollgate/logger";

export const DEBUG_MAX_COMMAND_CHARS = 200;
export const MAX_OUTPUT_BYTES = 64 * 1024;
const KILL_GRACE_MS = 2_000;

export type ShellExecutionResult = {
	output: string;
	exitCode: number | null;
	signal: NodeJS.Signals | null;
	truncated: boolean;
};

export const summarizeCommand = (command: string): string => {
	const normalized = command.trim().replace(/\s+/g, " ");
	if (normalized.length <= DEBUG_MAX_COMMAND_CHARS) {
		return normalized;
	}
	return `${normalized.slice(0, DEBUG_MAX_COMMAND_CHARS)}...[truncated]`;
};

/**
 * Runs `command` through the shell with stdout and stderr combined in arrival
 * order. Output past `maxOutputBytes` is dropped. A timeout sends SIGTERM and
 * then SIGKILL after a grace period.
 */
export const runShellCommand = (
	command: string,
	options: {
		cwd: string;
		timeoutMs: number;
		maxOutputBytes?: number;
		signal?: AbortSignal;
	},
): Promise<ShellExecutionResult> =>
	new Promise((resolve, reject) => {
		const maxOutputBytes = options.maxOutputBytes ?? MAX_OUTPUT_BYTES;
		if (options.signal?.aborted) {
			reject(new ToolExecutionError("cancelled", "Command cancelled"));
			return;
		}
		const child = spawn(command, {
			cwd: options.cwd,
			shell: true,
			stdio: ["ignore", "pipe", "pipe"],
			// Own process group, so a timeout reaches the shell's children too.
			detached: true,
		});

		const chunks: Buffer[] = [];
		let totalBytes = 0;
		let truncated = false;
		let settled = false;

		const finish = (handler: () => void): void => {
			if (settled) return;
			settled = true;
			clearTimeout(timeoutHandle);
			options.signal?.removeEventListener("abort", onAbort);
			handler();
		};

		const signalGroup = (signal: NodeJS.Signals): void => {
			if (child.pid === undefined) return;
			try {
				process.kill(-child.pid, signal);
			} catch (error) {
				debugLog(`shell signal ${signal} failed: ${String(error)}`);
			}
		};

		const terminate = (): void => {
			signalGroup("SIGTERM");
			setTimeout(() => signalGroup("SIGKILL"), KILL_GRACE_MS).unref();
		};

		const onAbort = (): void => {
			terminate();
			finish(() =>
				reject(new ToolExecutionError("cancelled", "Command cancelled")),
			);
		};

		const timeoutHandle = setTimeout(() => {
			terminate();
			finish(() =>
				reject(
					new ToolExecutionError(
						"timeout",
						`Command timed out after ${Math.trunc(options.timeoutMs / 1000)}s`,
					),
				),
			);
		}, options.timeoutMs);

		options.signal?.addEventListener("abort", onAbort, { once: true });

		const consumeChunk = (chunk: Buffer): void => {
			if (totalBytes >= maxOutputBytes) {
				truncated = true;
				return;
			}
			const room = maxOutputBytes - totalBytes;
			const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
			if (kept.length < chunk.length) truncated = true;
			chunks.push(kept);
			totalBytes += kept.length;
		};

		child.stdout.on("data", consumeChunk);
		child.stderr.on("data", consumeChunk);

		child.on("error", (error) => {
			finish(() =>
				reject(
					new ToolExecutionError(
						"io",
						`Failed to start command: ${error.message}`,
						{ cause: error },
					),
				),
			);
		});

		child.on("close", (code, signal) => {
			const output = Buffer.concat(chunks).toString("utf8");
			finish(() => resolve({ output, exitCode: code, signal, truncated }));
		});
	});
