import * as t from "vitest";
import { formatBytes } from "./format-bytes";

t.describe("formatBytes", () => {
	t.test("should format zero bytes", () => {
		t.expect(formatBytes(0)).toBe("0.0B");
	});

	t.test("should keep values below 1024 in bytes", () => {
		t.expect(formatBytes(1023)).toBe("1023.0B");
	});

	t.test("should switch to binary prefixes at 1024", () => {
		t.expect(formatBytes(1024)).toBe("1.0KiB");
		t.expect(formatBytes(1536)).toBe("1.5KiB");
		t.expect(formatBytes(1024 * 1024)).toBe("1.0MiB");
		t.expect(formatBytes(5 * 1024 ** 3)).toBe("5.0GiB");
	});

	t.test("should round to one decimal place", () => {
		t.expect(formatBytes(2058)).toBe("2.0KiB");
		t.expect(formatBytes(1100)).toBe("1.1KiB");
	});

	t.test("should fall back to YiB past ZiB", () => {
		t.expect(formatBytes(1024 ** 8)).toBe("1.0YiB");
	});
});
