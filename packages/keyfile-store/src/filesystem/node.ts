import * as fs from "node:fs/promises";
import type { FileStat, IFileSystem } from "../domain/filesystem";
import { hasErrorCode } from "../utils/fs-errors";

/**
 * IFileSystem implementation backed by `node:fs/promises`.
 */
export class NodeFileSystem implements IFileSystem {
	async stat(path: string): Promise<FileStat | null> {
		try {
			const stats = await fs.stat(path);
			return { isFile: stats.isFile(), isDirectory: stats.isDirectory(), size: stats.size };
		} catch (error) {
			if (hasErrorCode(error, "ENOENT")) return null;
			throw error;
		}
	}

	async readFile(path: string): Promise<Uint8Array> {
		const buffer = await fs.readFile(path);
		return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
	}

	async writeFile(path: string, data: string | Uint8Array): Promise<void> {
		await fs.writeFile(path, data);
	}

	async unlink(path: string): Promise<void> {
		await fs.unlink(path);
	}

	async readdir(path: string): Promise<string[]> {
		return fs.readdir(path);
	}

	async mkdir(path: string, mode: number): Promise<void> {
		await fs.mkdir(path, { recursive: true, mode });
	}

	async chmod(path: string, mode: number): Promise<void> {
		await fs.chmod(path, mode);
	}

	async touch(path: string): Promise<void> {
		const handle = await fs.open(path, "a");
		try {
			const now = new Date();
			await handle.utimes(now, now);
		} finally {
			await handle.close();
		}
	}
}
