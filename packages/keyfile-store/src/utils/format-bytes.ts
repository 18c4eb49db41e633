const UNITS = ["B", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB", "ZiB"];

/**
 * Formats a byte count with binary prefixes and one decimal place, e.g. `1.5KiB`.
 */
export function formatBytes(bytes: number): string {
	let value = bytes;
	for (const unit of UNITS) {
		if (Math.abs(value) < 1024) {
			return `${value.toFixed(1)}${unit}`;
		}
		value /= 1024;
	}
	return `${value.toFixed(1)}YiB`;
}
