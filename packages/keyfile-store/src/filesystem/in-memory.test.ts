import * as t from "vitest";
import { InMemoryFileSystem } from "./in-memory";

t.describe("InMemoryFileSystem", () => {
	let fs: InMemoryFileSystem;
	let now: number;

	t.beforeEach(() => {
		now = 1_000;
		fs = new InMemoryFileSystem({ now: () => now });
	});

	t.test("should start with an empty root directory", async () => {
		t.expect(await fs.stat("/")).toEqual({ isFile: false, isDirectory: true, size: 0 });
		t.expect(await fs.readdir("/")).toEqual([]);
	});

	t.test("should create directories recursively with the given mode", async () => {
		await fs.mkdir("/a/b/c", 0o700);

		t.expect(await fs.readdir("/a")).toEqual(["b"]);
		t.expect(fs.getMode("/a/b")).toBe(0o700);
		t.expect(fs.getMode("/a/b/c")).toBe(0o700);
	});

	t.test("should leave an existing directory alone on mkdir", async () => {
		await fs.mkdir("/a", 0o755);
		await fs.mkdir("/a", 0o700);
		t.expect(fs.getMode("/a")).toBe(0o755);
	});

	t.test("should write, overwrite and read files", async () => {
		await fs.mkdir("/a", 0o755);
		await fs.writeFile("/a/file", "first value");
		await fs.writeFile("/a/file", new Uint8Array([104, 105]));

		t.expect(await fs.readFile("/a/file")).toEqual(new Uint8Array([104, 105]));
		t.expect(await fs.stat("/a/file")).toEqual({ isFile: true, isDirectory: false, size: 2 });
	});

	t.test("should not share buffers with callers", async () => {
		const data = new Uint8Array([1, 2, 3]);
		await fs.writeFile("/file", data);
		data[0] = 9;

		const read = await fs.readFile("/file");
		read[1] = 9;

		t.expect(await fs.readFile("/file")).toEqual(new Uint8Array([1, 2, 3]));
	});

	t.test("should list only direct children in sorted order", async () => {
		await fs.mkdir("/a/nested", 0o755);
		await fs.writeFile("/a/zeta", "");
		await fs.writeFile("/a/.hidden", "");
		await fs.writeFile("/a/nested/deep", "");

		t.expect(await fs.readdir("/a")).toEqual([".hidden", "nested", "zeta"]);
	});

	t.test("should create and touch files", async () => {
		await fs.touch("/marker");
		t.expect(await fs.stat("/marker")).toEqual({ isFile: true, isDirectory: false, size: 0 });
		t.expect(fs.getModifiedTime("/marker")).toBe(1_000);

		await fs.writeFile("/marker", "content");
		now = 5_000;
		await fs.touch("/marker");

		t.expect(fs.getModifiedTime("/marker")).toBe(5_000);
		t.expect(new TextDecoder().decode(await fs.readFile("/marker"))).toBe("content");
	});

	t.test("should unlink files", async () => {
		await fs.writeFile("/file", "x");
		await fs.unlink("/file");
		t.expect(await fs.stat("/file")).toBeNull();
	});

	t.test("should report Node-style error codes", async () => {
		await fs.mkdir("/dir", 0o755);
		await fs.writeFile("/file", "x");

		await t.expect(fs.readFile("/missing")).rejects.toMatchObject({ code: "ENOENT", syscall: "open" });
		await t.expect(fs.unlink("/missing")).rejects.toMatchObject({ code: "ENOENT" });
		await t.expect(fs.readdir("/missing")).rejects.toMatchObject({ code: "ENOENT" });
		await t.expect(fs.readdir("/file")).rejects.toMatchObject({ code: "ENOTDIR" });
		await t.expect(fs.readFile("/dir")).rejects.toMatchObject({ code: "EISDIR" });
		await t.expect(fs.writeFile("/dir", "x")).rejects.toMatchObject({ code: "EISDIR" });
		await t.expect(fs.writeFile("/missing/file", "x")).rejects.toMatchObject({ code: "ENOENT" });
		await t.expect(fs.mkdir("/file", 0o755)).rejects.toMatchObject({ code: "EEXIST" });
		await t.expect(fs.mkdir("/file/child", 0o755)).rejects.toMatchObject({ code: "ENOTDIR" });
		await t.expect(fs.chmod("/missing", 0o700)).rejects.toMatchObject({ code: "ENOENT" });
	});

	t.test("should enforce owner permission bits", async () => {
		await fs.mkdir("/locked", 0o755);
		await fs.writeFile("/locked/file", "x");
		await fs.chmod("/locked", 0o500);

		await t.expect(fs.writeFile("/locked/new", "x")).rejects.toMatchObject({ code: "EACCES" });
		await t.expect(fs.unlink("/locked/file")).rejects.toMatchObject({ code: "EACCES" });
		await t.expect(fs.touch("/locked/marker")).rejects.toMatchObject({ code: "EACCES" });

		await fs.chmod("/locked/file", 0o000);
		await t.expect(fs.readFile("/locked/file")).rejects.toMatchObject({ code: "EACCES" });
		await t.expect(fs.writeFile("/locked/file", "y")).rejects.toMatchObject({ code: "EACCES" });
	});
});
