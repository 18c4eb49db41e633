/**
 * Builds an error shaped like the ones `node:fs` rejects with.
 */
export function createFsError(code: string, syscall: string, path: string): NodeJS.ErrnoException {
	return Object.assign(new Error(`${code}: ${syscall} '${path}'`), { code, syscall, path });
}

/**
 * Checks whether an error carries the given Node-style error code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
	return error instanceof Error && "code" in error && error.code === code;
}
