export type FileStat = {
	isFile: boolean;
	isDirectory: boolean;
	/** Size in bytes. */
	size: number;
};

/**
 * The filesystem operations the store depends on.
 * Implementations reject with an error carrying a Node-style `code` (`ENOENT`, `EACCES`, ...).
 */
export interface IFileSystem {
	/**
	 * @returns The entry's stat, or null if nothing exists at the path.
	 */
	stat(path: string): Promise<FileStat | null>;
	readFile(path: string): Promise<Uint8Array>;
	/** Truncates and writes. */
	writeFile(path: string, data: string | Uint8Array): Promise<void>;
	unlink(path: string): Promise<void>;
	/** Names of the entries directly inside a directory. */
	readdir(path: string): Promise<string[]>;
	/** Creates a directory and any missing parents. */
	mkdir(path: string, mode: number): Promise<void>;
	chmod(path: string, mode: number): Promise<void>;
	/** Creates an empty file if missing, otherwise updates its modification time. */
	touch(path: string): Promise<void>;
}
