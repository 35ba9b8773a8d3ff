export type {
	ResolveStorageOptions,
	StorageLayout,
	StoragePaths,
} from "@tollgate/core";
export { decodeBlob, encodeBlob, hashContent } from "./blobs";
export { StorageError } from "./errors";
export { ensureStorageDirs, resolveStoragePaths } from "./paths";
export {
	deriveSessionTitle,
	SqliteSessionStore,
	type SqliteSessionStoreOptions,
} from "./session-store";
