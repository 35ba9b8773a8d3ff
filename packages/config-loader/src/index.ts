import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import type {
	PermissionEffect,
	PermissionRule,
	TollgateConfig,
} from "@tollgate/config";
import { CONFIG_VERSION, ConfigError, parseConfig } from "@tollgate/config";
import { describeError } from "@tollgate/logger";
import { cosmiconfig } from "cosmiconfig";

const MODULE_NAME = "tollgate";

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isMissingFileError = (error: unknown): boolean =>
	isRecord(error) && error.code === "ENOENT";

const pickString = (value: unknown): string | undefined =>
	typeof value === "string" ? value : undefined;

type RawDocument = Record<string, unknown>;

// A missing file reads as an empty document; anything else must be a
// version-1 JSON object.
const readDocument = async (configPath: string): Promise<RawDocument> => {
	let text: string;
	try {
		text = await readFile(configPath, "utf8");
	} catch (error) {
		if (isMissingFileError(error)) return { version: CONFIG_VERSION };
		throw new ConfigError(configPath, `failed to read: ${describeError(error)}`, {
			cause: error,
		});
	}
	let document: unknown;
	try {
		document = JSON.parse(text);
	} catch (error) {
		throw new ConfigError(configPath, `failed to parse JSON: ${describeError(error)}`);
	}
	if (!isRecord(document)) {
		throw new ConfigError(configPath, "config must be a JSON object");
	}
	const version = document.version ?? CONFIG_VERSION;
	if (version !== CONFIG_VERSION) {
		throw new ConfigError(configPath, `unsupported version ${String(version)}`);
	}
	return { ...document, version };
};

// Written beside the target and renamed over it, so readers never see half a file.
const writeDocument = async (
	configPath: string,
	document: RawDocument,
): Promise<void> => {
	await mkdir(path.dirname(configPath), { recursive: true });
	const staging = `${configPath}.${randomUUID()}.tmp`;
	await writeFile(staging, `${JSON.stringify(document, null, 2)}\n`, "utf8");
	await rename(staging, configPath);
};

// Read-modify-write cycles on one file run one after another.
const writeQueues = new Map<string, Promise<unknown>>();

const enqueueWrite = <T>(configPath: string, task: () => Promise<T>): Promise<T> => {
	const key = path.resolve(configPath);
	const previous = writeQueues.get(key) ?? Promise.resolve();
	const queued = previous.then(task, task);
	const release = (): void => {
		if (writeQueues.get(key) === settled) writeQueues.delete(key);
	};
	const settled = queued.then(release, release);
	writeQueues.set(key, settled);
	return queued;
};

// Raw entries may be written as objects or as "tool:scope" strings.
const isSameRule = (entry: unknown, rule: PermissionRule): boolean => {
	if (typeof entry === "string") {
		const parsed = parseConfig(
			{ version: CONFIG_VERSION, permissions: { allow: [entry] } },
			"rule",
		).permissions?.allow?.[0];
		return parsed ? isSameRule(parsed, rule) : false;
	}
	if (!isRecord(entry)) return false;
	return (
		pickString(entry.tool) === rule.tool &&
		pickString(entry.command) === rule.command &&
		pickString(entry.command_glob) === rule.command_glob
	);
};

export const loadConfig = async (
	configPath: string,
): Promise<TollgateConfig | null> => {
	const explorer = cosmiconfig(MODULE_NAME);
	let result: { config: unknown; filepath: string } | null = null;
	try {
		result = await explorer.load(configPath);
	} catch (error) {
		if (isMissingFileError(error)) return null;
		throw error;
	}
	if (!result?.config) return null;
	return parseConfig(result.config, result.filepath);
};

/**
 * Appends rules to the `allow` or `deny` list of a config file, creating the
 * file when missing. Rules already present are skipped.
 */
export const appendPermissionRules = (
	configPath: string,
	effect: PermissionEffect,
	rules: PermissionRule[],
): Promise<TollgateConfig> =>
	enqueueWrite(configPath, async () => {
		const raw = await readDocument(configPath);
		const permissions = isRecord(raw.permissions) ? raw.permissions : {};
		const current = permissions[effect];
		const entries: unknown[] = Array.isArray(current) ? [...current] : [];
		for (const rule of rules) {
			if (!entries.some((entry) => isSameRule(entry, rule))) {
				entries.push(rule);
			}
		}
		const next: RawDocument = {
			...raw,
			permissions: { ...permissions, [effect]: entries },
		};
		await writeDocument(configPath, next);
		return parseConfig(next, configPath);
	});
