export { type FileStoreConfig, loadFileStoreConfig } from "./config";
export { type IClock, systemClock } from "./domain/clock";
export {
	ErrorCode,
	StorageInitError,
	StorageIOError,
	StorageKeyError,
	StorageValueError,
	StoreError,
} from "./domain/errors";
export type { FileStat, IFileSystem } from "./domain/filesystem";
export type { IKVStore } from "./domain/kv-store";
export { DEFAULT_MARKER_NAME, FileStore, type FileStoreOptions } from "./file-store";
export { InMemoryFileSystem } from "./filesystem/in-memory";
export { NodeFileSystem } from "./filesystem/node";
export { expandPath } from "./utils/expand-path";
export { formatBytes } from "./utils/format-bytes";
export { validateStorageKey } from "./utils/validate-key";
