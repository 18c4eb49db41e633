import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseDotenv } from "dotenv";
import { StorageInitError } from "../domain/errors";

/**
 * Settings a FileStore is created from.
 */
export type FileStoreConfig = {
	/** Directory to store settings in, e.g. `/var/run/app/settings/` or `~/.app/settings/`. */
	fileDir: string;
};

/**
 * Load the store configuration from environment variables.
 * Values from a `.env` file are used for variables the environment does not set.
 * Throws an error if FILE_DIR is missing.
 */
export function loadFileStoreConfig(
	env: NodeJS.ProcessEnv = process.env,
	envPath: string = path.resolve(process.cwd(), ".env"),
): FileStoreConfig {
	const fromFile = fs.existsSync(envPath) ? parseDotenv(fs.readFileSync(envPath)) : {};
	const fileDir = env.FILE_DIR ?? fromFile.FILE_DIR;

	if (!fileDir?.trim()) {
		throw new StorageInitError(
			"FILE_DIR is required.\n" +
			"Set it in a .env file or as an environment variable to the directory settings should be stored in.",
		);
	}

	return { fileDir: fileDir.trim() };
}
