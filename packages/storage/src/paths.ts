import { mkdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type {
	ResolveStorageOptions,
	StorageLayout,
	StoragePaths,
} from "@tollgate/core";

const APP_DIR = "tollgate";
const LAYOUT_ENV = "TOLLGATE_LAYOUT";

type LayoutRoots = { configDir: string; stateDir: string };

const parseLayout = (value: string | undefined): StorageLayout =>
	value?.trim().toLowerCase() === "xdg" ? "xdg" : "home";

const layoutRoots = (
	layout: StorageLayout,
	env: Record<string, string | undefined>,
	home: string,
): LayoutRoots => {
	if (layout === "home") {
		const root = path.join(home, `.${APP_DIR}`);
		return { configDir: root, stateDir: root };
	}
	return {
		configDir: path.join(env.XDG_CONFIG_HOME || path.join(home, ".config"), APP_DIR),
		stateDir: path.join(
			env.XDG_STATE_HOME || path.join(home, ".local", "state"),
			APP_DIR,
		),
	};
};

/**
 * Home layout keeps everything under `~/.tollgate`; the xdg layout splits
 * config from state. `rootOverride` always uses a single directory.
 */
export function resolveStoragePaths(
	options: ResolveStorageOptions = {},
): StoragePaths {
	const env = options.env ?? process.env;
	const roots: LayoutRoots = options.rootOverride
		? { configDir: options.rootOverride, stateDir: options.rootOverride }
		: layoutRoots(
				options.layout ?? parseLayout(env[LAYOUT_ENV]),
				env,
				options.homeDir ?? os.homedir(),
			);
	const sessionsDir = path.join(roots.stateDir, "sessions");
	return {
		root: roots.stateDir,
		configDir: roots.configDir,
		configFile: path.join(roots.configDir, "config.json"),
		sessionsDir,
		databaseFile: path.join(sessionsDir, "sessions.db"),
	};
}

export async function ensureStorageDirs(paths: StoragePaths): Promise<void> {
	await mkdir(paths.configDir, { recursive: true });
	await mkdir(paths.sessionsDir, { recursive: true });
}
