export * from "./approvals";
export {
	DEFAULT_BASE_URL,
	DEFAULT_HOST,
	DEFAULT_MODEL_NAME,
	DEFAULT_PORT,
	type EnvSource,
	type PublicConfig,
	type ResolveRuntimeConfigOptions,
	type RuntimeConfig,
	readEnvValue,
	resolveProjectConfigPath,
	resolveRuntimeConfig,
	toPublicConfig,
} from "./config";
export * from "./exchange";
export * from "./permissions";
export {
	type CreateRuntimeOptions,
	createRuntime,
	type Runtime,
} from "./runtime";
export {
	createSandboxKey,
	DEFAULT_EXECUTOR_LIMITS,
	type ExecutorLimits,
	getSandboxContext,
	SandboxContext,
} from "./sandbox/context";
export * from "./security";
export { createTools, ToolRegistry } from "./tools";
export {
	type FileNode,
	isViewableFile,
	type WorkspaceReadError,
	type WorkspaceReadResult,
	WorkspaceFiles,
} from "./workspace/files";
