export type StorageLayout = "home" | "xdg";

/** Where tollgate keeps its global config and the session database. */
export type StoragePaths = {
	root: string;
	configDir: string;
	configFile: string;
	sessionsDir: string;
	databaseFile: string;
};

export type ResolveStorageOptions = {
	layout?: StorageLayout;
	/** Uses the home layout rooted here, ignoring env and layout. */
	rootOverride?: string;
	env?: Record<string, string | undefined>;
	homeDir?: string;
};
