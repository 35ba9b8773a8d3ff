export type ModelConfig = {
	provider?: string;
	name?: string;
	base_url?: string;
	api_key?: string;
};

export type PermissionRule = {
	tool: string;
	command?: string;
	command_glob?: string;
};

export type PermissionEffect = "allow" | "deny";

export type PermissionsConfig = {
	allow?: PermissionRule[];
	deny?: PermissionRule[];
};

export type SecurityConfig = {
	ignore_file?: string;
	extra_blocked_paths?: string[];
};

export type ExecutorsConfig = {
	read_max_bytes?: number;
	search_max_results?: number;
	command_timeout_seconds?: number;
	command_timeout_max_seconds?: number;
};

export type ServerConfig = {
	host?: string;
	port?: number;
};

export type TollgateConfig = {
	version: number;
	model?: ModelConfig;
	permissions?: PermissionsConfig;
	security?: SecurityConfig;
	executors?: ExecutorsConfig;
	server?: ServerConfig;
};

export const CONFIG_VERSION = 1;
export const PROJECT_CONFIG_FILENAME = "tollgate.config.json";
export const DEFAULT_IGNORE_FILE = ".tollgateignore";

export class ConfigError extends Error {
	readonly source: string;

	constructor(source: string, message: string, options?: ErrorOptions) {
		super(`${source}: ${message}`, options);
		this.name = "ConfigError";
		this.source = source;
	}
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const pickString = (value: unknown): string | undefined =>
	typeof value === "string" ? value : undefined;

const pickNumber = (value: unknown): number | undefined =>
	typeof value === "number" && Number.isFinite(value) ? value : undefined;

const pickPositiveInt = (value: unknown): number | undefined => {
	const num = pickNumber(value);
	if (num === undefined) return undefined;
	if (!Number.isInteger(num) || num <= 0) return undefined;
	return num;
};

const pickStringArray = (value: unknown): string[] | undefined => {
	if (!Array.isArray(value)) return undefined;
	const values = value.filter(
		(entry): entry is string => typeof entry === "string",
	);
	return values.length ? values : undefined;
};

// Drops undefined keys; an object with nothing left becomes undefined.
const compact = <T extends Record<string, unknown>>(value: T): T | undefined => {
	const next = { ...value };
	for (const key of Object.keys(next)) {
		if (next[key] === undefined) delete next[key];
	}
	return Object.keys(next).length ? next : undefined;
};

/**
 * Rule subjects are written either as a bare tool name ("bash") or as a
 * scoped "tool:scope" pair ("bash:git push", "write:secret.txt").
 */
export const parseRuleSubject = (subject: string): PermissionRule | null => {
	const trimmed = subject.trim();
	if (!trimmed) return null;
	const separator = trimmed.indexOf(":");
	if (separator < 0) return { tool: trimmed };
	const tool = trimmed.slice(0, separator).trim();
	const scope = trimmed.slice(separator + 1).trim();
	if (!tool) return null;
	if (!scope) return { tool };
	return /[*?]/.test(scope)
		? { tool, command_glob: scope }
		: { tool, command: scope };
};

export const formatRuleSubject = (rule: PermissionRule): string => {
	const scope = rule.command ?? rule.command_glob;
	return scope ? `${rule.tool}:${scope}` : rule.tool;
};

const parsePermissionRule = (value: unknown): PermissionRule | null => {
	if (typeof value === "string") return parseRuleSubject(value);
	if (!isRecord(value)) return null;
	const tool = pickString(value.tool);
	if (!tool) return null;
	const command = pickString(value.command);
	const commandGlob = pickString(value.command_glob);
	return {
		tool,
		...(command ? { command } : {}),
		...(commandGlob ? { command_glob: commandGlob } : {}),
	};
};

const parsePermissionRules = (value: unknown): PermissionRule[] | undefined => {
	if (!Array.isArray(value)) return undefined;
	const rules = value
		.map((entry) => parsePermissionRule(entry))
		.filter((entry): entry is PermissionRule => !!entry);
	return rules.length ? rules : undefined;
};

const parseModelConfig = (value: unknown): ModelConfig | undefined => {
	if (!isRecord(value)) return undefined;
	return compact({
		provider: pickString(value.provider),
		name: pickString(value.name),
		base_url: pickString(value.base_url),
		api_key: pickString(value.api_key),
	});
};

const parseSecurityConfig = (value: unknown): SecurityConfig | undefined => {
	if (!isRecord(value)) return undefined;
	return compact({
		ignore_file: pickString(value.ignore_file),
		extra_blocked_paths: pickStringArray(value.extra_blocked_paths),
	});
};

const parseExecutorsConfig = (value: unknown): ExecutorsConfig | undefined => {
	if (!isRecord(value)) return undefined;
	return compact({
		read_max_bytes: pickPositiveInt(value.read_max_bytes),
		search_max_results: pickPositiveInt(value.search_max_results),
		command_timeout_seconds: pickPositiveInt(value.command_timeout_seconds),
		command_timeout_max_seconds: pickPositiveInt(
			value.command_timeout_max_seconds,
		),
	});
};

const parseServerConfig = (value: unknown): ServerConfig | undefined => {
	if (!isRecord(value)) return undefined;
	return compact({
		host: pickString(value.host),
		port: pickPositiveInt(value.port),
	});
};

export const parseConfig = (
	value: unknown,
	sourceLabel: string,
): TollgateConfig => {
	if (!isRecord(value)) {
		throw new ConfigError(sourceLabel, "config must be an object");
	}
	const version = value.version;
	if (version !== CONFIG_VERSION) {
		throw new ConfigError(
			sourceLabel,
			`unsupported version ${String(version)}`,
		);
	}
	const result: TollgateConfig = { version };
	const model = parseModelConfig(value.model);
	if (model) result.model = model;
	if (isRecord(value.permissions)) {
		const allow = parsePermissionRules(value.permissions.allow);
		const deny = parsePermissionRules(value.permissions.deny);
		if (allow || deny) {
			result.permissions = {
				...(allow ? { allow } : {}),
				...(deny ? { deny } : {}),
			};
		}
	}
	const security = parseSecurityConfig(value.security);
	if (security) result.security = security;
	const executors = parseExecutorsConfig(value.executors);
	if (executors) result.executors = executors;
	const server = parseServerConfig(value.server);
	if (server) result.server = server;
	return result;
};

export type ConfigLayer = Omit<TollgateConfig, "version">;

export class ConfigRegistry {
	private readonly defaults: ConfigLayer[] = [];

	registerDefaults(layer: ConfigLayer): void {
		this.defaults.push(layer);
	}

	resolve(layers: Array<ConfigLayer | null | undefined>): TollgateConfig {
		const merged: TollgateConfig = { version: CONFIG_VERSION };
		for (const layer of [...this.defaults, ...layers]) {
			if (!layer) continue;
			if (layer.model) {
				merged.model = { ...merged.model, ...layer.model };
			}
			if (layer.permissions) {
				const nextAllow = layer.permissions.allow ?? [];
				const nextDeny = layer.permissions.deny ?? [];
				if (nextAllow.length > 0 || nextDeny.length > 0) {
					merged.permissions ??= {};
					if (nextAllow.length > 0) {
						merged.permissions.allow = [
							...(merged.permissions.allow ?? []),
							...nextAllow,
						];
					}
					if (nextDeny.length > 0) {
						merged.permissions.deny = [
							...(merged.permissions.deny ?? []),
							...nextDeny,
						];
					}
				}
			}
			if (layer.security) {
				const extra = [
					...(merged.security?.extra_blocked_paths ?? []),
					...(layer.security.extra_blocked_paths ?? []),
				];
				merged.security = {
					...merged.security,
					...layer.security,
					...(extra.length ? { extra_blocked_paths: extra } : {}),
				};
			}
			if (layer.executors) {
				merged.executors = { ...merged.executors, ...layer.executors };
			}
			if (layer.server) {
				merged.server = { ...merged.server, ...layer.server };
			}
		}
		return merged;
	}
}

export const configRegistry: ConfigRegistry = new ConfigRegistry();
