import path from "node:path";
import {
	ConfigError,
	configRegistry,
	DEFAULT_IGNORE_FILE,
	formatRuleSubject,
	PROJECT_CONFIG_FILENAME,
	type PermissionsConfig,
	type TollgateConfig,
} from "@tollgate/config";
import { loadConfig } from "@tollgate/config-loader";
import type { StoragePaths } from "@tollgate/core";
import { resolveStoragePaths } from "@tollgate/storage";
import type { PolicySnapshot } from "./permissions/service";
import {
	DEFAULT_EXECUTOR_LIMITS,
	type ExecutorLimits,
} from "./sandbox/context";

export const DEFAULT_BASE_URL = "http://127.0.0.1:1234/v1";
export const DEFAULT_MODEL_NAME = "local-model";
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 3000;
// Local OpenAI-compatible servers accept any key.
const FALLBACK_API_KEY = "not-needed";

configRegistry.registerDefaults({
	model: {
		provider: "openai",
		name: DEFAULT_MODEL_NAME,
		base_url: DEFAULT_BASE_URL,
	},
	security: { ignore_file: DEFAULT_IGNORE_FILE },
	executors: {
		read_max_bytes: DEFAULT_EXECUTOR_LIMITS.readMaxBytes,
		search_max_results: DEFAULT_EXECUTOR_LIMITS.searchMaxResults,
		command_timeout_seconds: DEFAULT_EXECUTOR_LIMITS.commandTimeoutSeconds,
		command_timeout_max_seconds: DEFAULT_EXECUTOR_LIMITS.commandTimeoutMaxSeconds,
	},
	server: { host: DEFAULT_HOST, port: DEFAULT_PORT },
});

export type EnvSource = Record<string, string | undefined>;

export type RuntimeConfig = {
	workspaceRoot: string;
	storage: StoragePaths;
	globalConfigPath: string;
	projectConfigPath: string;
	model: {
		provider: "openai";
		name: string;
		baseUrl: string;
		apiKey: string;
	};
	permissions: PermissionsConfig;
	security: {
		ignoreFile: string;
		extraBlockedPaths: string[];
	};
	executors: ExecutorLimits;
	server: {
		host: string;
		port: number;
	};
};

/** Effective settings as served to clients: no API key, live rule set. */
export type PublicConfig = {
	workspace_root: string;
	config_files: { global: string; project: string };
	model: { provider: "openai"; name: string; base_url: string };
	permissions: { version: number; allow: string[]; deny: string[] };
	security: { ignore_file: string; extra_blocked_paths: string[] };
	executors: {
		read_max_bytes: number;
		search_max_results: number;
		command_timeout_seconds: number;
		command_timeout_max_seconds: number;
	};
	server: { host: string; port: number };
};

export const toPublicConfig = (
	config: RuntimeConfig,
	rules: PolicySnapshot,
): PublicConfig => ({
	workspace_root: config.workspaceRoot,
	config_files: {
		global: config.globalConfigPath,
		project: config.projectConfigPath,
	},
	model: {
		provider: config.model.provider,
		name: config.model.name,
		base_url: config.model.baseUrl,
	},
	permissions: {
		version: rules.version,
		allow: rules.allow.map(formatRuleSubject),
		deny: rules.deny.map(formatRuleSubject),
	},
	security: {
		ignore_file: config.security.ignoreFile,
		extra_blocked_paths: [...config.security.extraBlockedPaths],
	},
	executors: {
		read_max_bytes: config.executors.readMaxBytes,
		search_max_results: config.executors.searchMaxResults,
		command_timeout_seconds: config.executors.commandTimeoutSeconds,
		command_timeout_max_seconds: config.executors.commandTimeoutMaxSeconds,
	},
	server: { ...config.server },
});

export type ResolveRuntimeConfigOptions = {
	workspaceRoot: string;
	env?: EnvSource;
	storageRoot?: string;
};

export const readEnvValue = (env: EnvSource, key: string): string | undefined => {
	const value = env[key];
	if (!value) return undefined;
	const trimmed = value.trim();
	return trimmed ? trimmed : undefined;
};

const readEnvPort = (env: EnvSource): number | undefined => {
	const raw = readEnvValue(env, "TOLLGATE_PORT");
	if (raw === undefined) return undefined;
	const port = Number(raw);
	if (!Number.isInteger(port) || port <= 0 || port > 65_535) {
		throw new ConfigError("TOLLGATE_PORT", `invalid port ${raw}`);
	}
	return port;
};

export const resolveProjectConfigPath = (workspaceRoot: string): string =>
	path.resolve(workspaceRoot, PROJECT_CONFIG_FILENAME);

const loadLayer = async (
	configPath: string,
	label: string,
): Promise<TollgateConfig | null> => {
	try {
		return await loadConfig(configPath);
	} catch (error) {
		if (error instanceof ConfigError) throw error;
		const message = error instanceof Error ? error.message : String(error);
		throw new ConfigError(configPath, `failed to load ${label}: ${message}`);
	}
};

/**
 * Effective settings: built-in defaults, then the global config, then the
 * project config, then environment overrides.
 */
export const resolveRuntimeConfig = async (
	options: ResolveRuntimeConfigOptions,
): Promise<RuntimeConfig> => {
	const env = options.env ?? process.env;
	const workspaceRoot = path.resolve(options.workspaceRoot);
	const storage = resolveStoragePaths(
		options.storageRoot ? { rootOverride: options.storageRoot } : { env },
	);
	const projectConfigPath = resolveProjectConfigPath(workspaceRoot);
	const globalConfig = await loadLayer(storage.configFile, "global config");
	const projectConfig = await loadLayer(projectConfigPath, "project config");
	const effective = configRegistry.resolve([globalConfig, projectConfig]);

	const provider = effective.model?.provider ?? "openai";
	if (provider !== "openai") {
		throw new ConfigError("model.provider", `unsupported provider ${provider}`);
	}
	const executors = effective.executors;

	return {
		workspaceRoot,
		storage,
		globalConfigPath: storage.configFile,
		projectConfigPath,
		model: {
			provider,
			name:
				readEnvValue(env, "TOLLGATE_MODEL") ??
				effective.model?.name ??
				DEFAULT_MODEL_NAME,
			baseUrl:
				readEnvValue(env, "TOLLGATE_API_URL") ??
				effective.model?.base_url ??
				DEFAULT_BASE_URL,
			apiKey:
				readEnvValue(env, "TOLLGATE_API_KEY") ??
				effective.model?.api_key ??
				readEnvValue(env, "OPENAI_API_KEY") ??
				FALLBACK_API_KEY,
		},
		permissions: effective.permissions ?? {},
		security: {
			ignoreFile: effective.security?.ignore_file ?? DEFAULT_IGNORE_FILE,
			extraBlockedPaths: effective.security?.extra_blocked_paths ?? [],
		},
		executors: {
			readMaxBytes:
				executors?.read_max_bytes ?? DEFAULT_EXECUTOR_LIMITS.readMaxBytes,
			searchMaxResults:
				executors?.search_max_results ??
				DEFAULT_EXECUTOR_LIMITS.searchMaxResults,
			commandTimeoutSeconds:
				executors?.command_timeout_seconds ??
				DEFAULT_EXECUTOR_LIMITS.commandTimeoutSeconds,
			commandTimeoutMaxSeconds:
				executors?.command_timeout_max_seconds ??
				DEFAULT_EXECUTOR_LIMITS.commandTimeoutMaxSeconds,
		},
		server: {
			host: effective.server?.host ?? DEFAULT_HOST,
			port: readEnvPort(env) ?? effective.server?.port ?? DEFAULT_PORT,
		},
	};
};
