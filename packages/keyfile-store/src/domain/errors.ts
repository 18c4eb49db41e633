export enum ErrorCode {
	// Initialization errors
	STORAGE_INIT_FAILED = "STORAGE_INIT_FAILED",

	// I/O errors
	STORAGE_IO_FAILED = "STORAGE_IO_FAILED",

	// Input errors
	INVALID_KEY = "INVALID_KEY",
	INVALID_EXPIRATION = "INVALID_EXPIRATION",

	// Generic fallback
	UNKNOWN = "UNKNOWN",
}

export class StoreError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message?: string,
		cause?: unknown,
	) {
		super(message || code, cause === undefined ? undefined : { cause });
		this.name = code;
	}
}

export class StorageInitError extends StoreError {
	constructor(message: string, cause?: unknown) {
		super(ErrorCode.STORAGE_INIT_FAILED, message, cause);
	}
}

export class StorageIOError extends StoreError {
	constructor(message: string, cause?: unknown) {
		super(ErrorCode.STORAGE_IO_FAILED, message, cause);
	}
}

export class StorageKeyError extends StoreError {
	constructor(message: string) {
		super(ErrorCode.INVALID_KEY, message);
	}
}

export class StorageValueError extends StoreError {
	constructor(message: string) {
		super(ErrorCode.INVALID_EXPIRATION, message);
	}
}
