import * as os from "node:os";
import * as path from "node:path";

/**
 * Expands a leading `~` to the home directory and resolves the result to an absolute path.
 * `~user` forms are left as they are.
 */
export function expandPath(input: string, home: string = os.homedir()): string {
	const expanded = input === "~" || input.startsWith("~/") ? home + input.slice(1) : input;
	return path.resolve(expanded);
}
