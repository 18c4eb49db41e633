import { StorageKeyError } from "../domain/errors";

const FORBIDDEN_CHARACTERS = ["/", "\\", "\0"];
const RESERVED_NAMES = [".", ".."];

/**
 * Validates that a key can be used as a single file name inside the store directory.
 *
 * @throws {StorageKeyError} if the key is empty, is `.` or `..`, or contains a path separator or NUL byte.
 */
export function validateStorageKey(key: string): void {
	if (key.length === 0) {
		throw new StorageKeyError("Invalid storage key: key must not be empty");
	}
	if (RESERVED_NAMES.includes(key)) {
		throw new StorageKeyError(`Invalid storage key: '${key}' is reserved`);
	}
	const forbidden = FORBIDDEN_CHARACTERS.find((char) => key.includes(char));
	if (forbidden !== undefined) {
		throw new StorageKeyError(`Invalid storage key: contains forbidden character ${JSON.stringify(forbidden)}`);
	}
}
