import * as path from "node:path";
import { type IClock, systemClock } from "../domain/clock";
import type { FileStat, IFileSystem } from "../domain/filesystem";
import { createFsError } from "../utils/fs-errors";

type FileNode = {
	type: "file";
	data: Uint8Array;
	mode: number;
	mtimeMs: number;
};

type DirectoryNode = {
	type: "directory";
	mode: number;
	mtimeMs: number;
};

type FsNode = FileNode | DirectoryNode;

const DEFAULT_FILE_MODE = 0o644;
const ROOT_MODE = 0o755;
const OWNER_READ = 0o400;
const OWNER_WRITE = 0o200;

/**
 * An in-memory implementation of IFileSystem, primarily for testing purposes.
 * Paths are POSIX paths resolved against `/`. Owner read/write bits are enforced
 * so permission failures can be simulated with `chmod`.
 */
export class InMemoryFileSystem implements IFileSystem {
	private readonly nodes = new Map<string, FsNode>();
	private readonly clock: IClock;
	private readonly encoder = new TextEncoder();

	constructor(clock: IClock = systemClock) {
		this.clock = clock;
		this.nodes.set("/", { type: "directory", mode: ROOT_MODE, mtimeMs: clock.now() });
	}

	async stat(target: string): Promise<FileStat | null> {
		const node = this.nodes.get(this.normalize(target));
		if (!node) return null;
		return {
			isFile: node.type === "file",
			isDirectory: node.type === "directory",
			size: node.type === "file" ? node.data.byteLength : 0,
		};
	}

	async readFile(target: string): Promise<Uint8Array> {
		const file = this.getFile(target, "open");
		if (!(file.mode & OWNER_READ)) throw createFsError("EACCES", "open", target);
		return file.data.slice();
	}

	async writeFile(target: string, data: string | Uint8Array): Promise<void> {
		const key = this.normalize(target);
		const bytes = typeof data === "string" ? this.encoder.encode(data) : data.slice();
		const existing = this.nodes.get(key);
		if (existing?.type === "directory") throw createFsError("EISDIR", "open", target);
		if (existing) {
			if (!(existing.mode & OWNER_WRITE)) throw createFsError("EACCES", "open", target);
			existing.data = bytes;
			existing.mtimeMs = this.clock.now();
			return;
		}
		this.getWritableParent(key, "open");
		this.nodes.set(key, { type: "file", data: bytes, mode: DEFAULT_FILE_MODE, mtimeMs: this.clock.now() });
	}

	async unlink(target: string): Promise<void> {
		const key = this.normalize(target);
		this.getFile(key, "unlink");
		this.getWritableParent(key, "unlink");
		this.nodes.delete(key);
	}

	async readdir(target: string): Promise<string[]> {
		const key = this.normalize(target);
		const node = this.nodes.get(key);
		if (!node) throw createFsError("ENOENT", "scandir", target);
		if (node.type !== "directory") throw createFsError("ENOTDIR", "scandir", target);
		if (!(node.mode & OWNER_READ)) throw createFsError("EACCES", "scandir", target);

		const names: string[] = [];
		for (const candidate of this.nodes.keys()) {
			if (candidate !== "/" && path.posix.dirname(candidate) === key) {
				names.push(path.posix.basename(candidate));
			}
		}
		return names.sort();
	}

	async mkdir(target: string, mode: number): Promise<void> {
		const key = this.normalize(target);
		const missing: string[] = [];
		let current = key;
		while (!this.nodes.has(current)) {
			missing.unshift(current);
			current = path.posix.dirname(current);
		}

		const ancestor = this.nodes.get(current);
		if (ancestor?.type === "file") {
			throw createFsError(current === key ? "EEXIST" : "ENOTDIR", "mkdir", target);
		}
		if (missing.length === 0) return;

		this.getWritableParent(missing[0], "mkdir");
		for (const dir of missing) {
			this.nodes.set(dir, { type: "directory", mode, mtimeMs: this.clock.now() });
		}
	}

	async chmod(target: string, mode: number): Promise<void> {
		const node = this.nodes.get(this.normalize(target));
		if (!node) throw createFsError("ENOENT", "chmod", target);
		node.mode = mode;
	}

	async touch(target: string): Promise<void> {
		const key = this.normalize(target);
		const existing = this.nodes.get(key);
		if (existing) {
			existing.mtimeMs = this.clock.now();
			return;
		}
		this.getWritableParent(key, "open");
		this.nodes.set(key, { type: "file", data: new Uint8Array(0), mode: DEFAULT_FILE_MODE, mtimeMs: this.clock.now() });
	}

	// Helper methods for testing

	/**
	 * Returns the permission bits of an entry, or undefined if it does not exist.
	 */
	getMode(target: string): number | undefined {
		return this.nodes.get(this.normalize(target))?.mode;
	}

	/**
	 * Returns the modification time of an entry in epoch milliseconds, or undefined if it does not exist.
	 */
	getModifiedTime(target: string): number | undefined {
		return this.nodes.get(this.normalize(target))?.mtimeMs;
	}

	private normalize(target: string): string {
		return path.posix.resolve("/", target);
	}

	private getFile(target: string, syscall: string): FileNode {
		const node = this.nodes.get(this.normalize(target));
		if (!node) throw createFsError("ENOENT", syscall, target);
		if (node.type !== "file") throw createFsError("EISDIR", syscall, target);
		return node;
	}

	private getWritableParent(key: string, syscall: string): DirectoryNode {
		const parent = this.nodes.get(path.posix.dirname(key));
		if (!parent) throw createFsError("ENOENT", syscall, key);
		if (parent.type !== "directory") throw createFsError("ENOTDIR", syscall, key);
		if (!(parent.mode & OWNER_WRITE)) throw createFsError("EACCES", syscall, key);
		return parent;
	}
}
