import { promises as fs } from "node:fs";
import path from "node:path";
import type { DependencyKey, ToolContext } from "@tollgate/core";
import { IgnoreMatcher } from "../security/ignore";
import { resolveRealPath } from "../security/path-gate";

export type ExecutorLimits = {
	readMaxBytes: number;
	searchMaxResults: number;
	commandTimeoutSeconds: number;
	commandTimeoutMaxSeconds: number;
};

export const DEFAULT_EXECUTOR_LIMITS: ExecutorLimits = {
	readMaxBytes: 5 * 1024 * 1024,
	searchMaxResults: 200,
	commandTimeoutSeconds: 10,
	commandTimeoutMaxSeconds: 60,
};

type SandboxContextInit = {
	rootDir: string;
	ignore: IgnoreMatcher;
	limits: ExecutorLimits;
};

/**
 * Workspace facts shared by the executors. Paths reaching an executor have
 * already passed the security gate.
 */
export class SandboxContext {
	readonly rootDir: string;
	readonly ignore: IgnoreMatcher;
	readonly limits: ExecutorLimits;

	private constructor(init: SandboxContextInit) {
		this.rootDir = init.rootDir;
		this.ignore = init.ignore;
		this.limits = init.limits;
	}

	static async create(options: {
		rootDir: string;
		ignore?: IgnoreMatcher;
		limits?: Partial<ExecutorLimits>;
	}): Promise<SandboxContext> {
		await fs.mkdir(options.rootDir, { recursive: true });
		return new SandboxContext({
			rootDir: resolveRealPath(options.rootDir),
			ignore: options.ignore ?? IgnoreMatcher.empty(),
			limits: { ...DEFAULT_EXECUTOR_LIMITS, ...options.limits },
		});
	}

	resolvePath(targetPath: string): string {
		return path.isAbsolute(targetPath)
			? path.resolve(targetPath)
			: path.resolve(this.rootDir, targetPath);
	}

	relativePath(absolutePath: string): string {
		return path.relative(this.rootDir, absolutePath).split(path.sep).join("/");
	}

	clampTimeoutSeconds(requested: number | undefined): number {
		const seconds = requested ?? this.limits.commandTimeoutSeconds;
		return Math.max(1, Math.min(seconds, this.limits.commandTimeoutMaxSeconds));
	}
}

export const createSandboxKey = (
	ctx: SandboxContext,
): DependencyKey<SandboxContext> => ({
	id: "sandbox-context",
	create: () => ctx,
});

export const getSandboxContext = async (
	ctx: ToolContext,
	key: DependencyKey<SandboxContext>,
): Promise<SandboxContext> => ctx.resolve(key);
