import * as path from "node:path";
import type { FileStoreConfig } from "../config";
import { type IClock, systemClock } from "../domain/clock";
import { StorageInitError, StorageIOError, StorageKeyError, StorageValueError, StoreError } from "../domain/errors";
import type { IFileSystem } from "../domain/filesystem";
import type { IKVStore } from "../domain/kv-store";
import { NodeFileSystem } from "../filesystem/node";
import { expandPath } from "../utils/expand-path";
import { formatBytes } from "../utils/format-bytes";
import { validateStorageKey } from "../utils/validate-key";

/**
 * Options for creating a FileStore instance.
 */
export type FileStoreOptions = FileStoreConfig & {
	/** Filesystem to use. Mainly for testing; defaults to the local filesystem. */
	fs?: IFileSystem;
	/** Clock used for expiration checks. */
	clock?: IClock;
	/** Name of the file that marks the directory as owned by a store. */
	markerName?: string;
};

type KeyPaths = {
	valuePath: string;
	expirePath: string;
};

/** The default name of the ownership marker file. */
export const DEFAULT_MARKER_NAME = ".will_settings";
/** Permission bits applied to the store directory. */
const DIRECTORY_MODE = 0o700;
const EXPIRE_SUFFIX = ".expires";
const LOG_PREFIX = "[keyfile-store]";

/**
 * An IKVStore that keeps each key in its own file inside a directory it owns.
 *
 * A key `k` is stored in `<dir>/k`. If it has an expiration, the epoch seconds
 * are stored in `<dir>/.k.expires`. Expiration is lazy: `load` deletes an
 * expired entry when it finds one.
 *
 * The store takes ownership of its directory by writing a marker file into it,
 * and refuses a directory that holds other files but no marker.
 */
export class FileStore implements IKVStore {
	private readonly fs: IFileSystem;
	private readonly clock: IClock;
	private readonly dirname: string;
	private readonly markerName: string;
	private readonly decoder = new TextDecoder();

	/**
	 * Claims the configured directory and returns a ready store.
	 * @throws {StorageInitError} if the directory holds foreign files or cannot be claimed.
	 */
	static async create(options: FileStoreOptions): Promise<FileStore> {
		const store = new FileStore(options);
		await store.initialize();
		return store;
	}

	private constructor(options: FileStoreOptions) {
		this.fs = options.fs ?? new NodeFileSystem();
		this.clock = options.clock ?? systemClock;
		this.dirname = expandPath(options.fileDir);
		this.markerName = options.markerName ?? DEFAULT_MARKER_NAME;

		try {
			validateStorageKey(this.markerName);
		} catch (error) {
			throw new StorageInitError(`Invalid marker name '${this.markerName}'`, error);
		}
	}

	/**
	 * Absolute path of the store directory.
	 */
	get directory(): string {
		return this.dirname;
	}

	/**
	 * Absolute path of the ownership marker file.
	 */
	get markerPath(): string {
		return path.join(this.dirname, this.markerName);
	}

	async save(key: string, value: string | Uint8Array, expireAt?: number): Promise<void> {
		const { valuePath, expirePath } = this.getKeyPaths(key);
		if (expireAt !== undefined && !Number.isSafeInteger(Math.trunc(expireAt))) {
			throw new StorageValueError(`Invalid expiration for '${key}': ${expireAt}`);
		}

		await this.io(`save '${key}'`, async () => {
			await this.fs.writeFile(valuePath, value);

			if (expireAt !== undefined) {
				await this.fs.writeFile(expirePath, Math.trunc(expireAt).toString());
			} else {
				await this.unlinkIfExists(expirePath);
			}
		});
	}

	async load(key: string): Promise<string | null> {
		const bytes = await this.loadBytes(key);
		return bytes === null ? null : this.decoder.decode(bytes);
	}

	async loadBytes(key: string): Promise<Uint8Array | null> {
		const { valuePath, expirePath } = this.getKeyPaths(key);

		return this.io(`load '${key}'`, async () => {
			if (await this.fs.stat(expirePath)) {
				const raw = this.decoder.decode(await this.fs.readFile(expirePath)).trim();
				if (!/^-?\d+$/.test(raw)) {
					console.warn(`${LOG_PREFIX} Corrupted expiration for '${key}', clearing it`);
					await this.removeEntry({ valuePath, expirePath });
					return null;
				}

				const nowSeconds = Math.floor(this.clock.now() / 1000);
				if (nowSeconds > Number.parseInt(raw, 10)) {
					await this.removeEntry({ valuePath, expirePath });
					return null;
				}
			}

			if (!(await this.fs.stat(valuePath))) return null;
			return this.fs.readFile(valuePath);
		});
	}

	async clear(key: string): Promise<void> {
		const paths = this.getKeyPaths(key);
		await this.io(`clear '${key}'`, () => this.removeEntry(paths));
	}

	async clearAll(): Promise<void> {
		await this.io("clear all keys", async () => {
			for (const filename of await this.listFiles()) {
				await this.fs.unlink(filename);
			}
		});
	}

	async size(): Promise<string> {
		return this.io("compute size", async () => {
			let total = 0;
			for (const filename of await this.listFiles()) {
				const stat = await this.fs.stat(filename);
				total += stat?.size ?? 0;
			}
			return formatBytes(total);
		});
	}

	/**
	 * Creates or claims the store directory and refreshes the marker.
	 */
	private async initialize(): Promise<void> {
		console.debug(`${LOG_PREFIX} Using ${this.dirname} for local setting storage`);

		try {
			const stat = await this.fs.stat(this.dirname);
			if (!stat) {
				await this.fs.mkdir(this.dirname, DIRECTORY_MODE);
			} else if (!stat.isDirectory) {
				throw new StorageInitError(`${this.dirname} is not a directory`);
			} else if (!(await this.fs.stat(this.markerPath))) {
				// An unmarked directory is only claimed while it holds no files.
				if ((await this.listFiles()).length > 0) {
					throw new StorageInitError(`${this.dirname} is not empty, an empty directory is needed for settings`);
				}
			}

			await this.fs.chmod(this.dirname, DIRECTORY_MODE);
			await this.fs.touch(this.markerPath);
		} catch (error) {
			if (error instanceof StoreError) throw error;
			throw new StorageInitError(`Failed to initialize storage in ${this.dirname}`, error);
		}
	}

	/**
	 * Lists the regular files directly inside the store directory.
	 */
	private async listFiles(): Promise<string[]> {
		const files: string[] = [];
		for (const name of await this.fs.readdir(this.dirname)) {
			const filename = path.join(this.dirname, name);
			const stat = await this.fs.stat(filename);
			if (stat?.isFile) files.push(filename);
		}
		return files;
	}

	private getKeyPaths(key: string): KeyPaths {
		validateStorageKey(key);
		if (key === this.markerName) {
			throw new StorageKeyError(`Invalid storage key: '${key}' is the store marker`);
		}
		return {
			valuePath: path.join(this.dirname, key),
			expirePath: path.join(this.dirname, `.${key}${EXPIRE_SUFFIX}`),
		};
	}

	private async removeEntry({ valuePath, expirePath }: KeyPaths): Promise<void> {
		await this.unlinkIfExists(valuePath);
		await this.unlinkIfExists(expirePath);
	}

	private async unlinkIfExists(filename: string): Promise<void> {
		if (await this.fs.stat(filename)) {
			await this.fs.unlink(filename);
		}
	}

	/**
	 * Runs a filesystem operation, wrapping unexpected failures in a StorageIOError.
	 */
	private async io<T>(action: string, fn: () => Promise<T>): Promise<T> {
		try {
			return await fn();
		} catch (error) {
			if (error instanceof StoreError) throw error;
			throw new StorageIOError(`Failed to ${action} in ${this.dirname}`, error);
		}
	}
}
