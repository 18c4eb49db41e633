/**
 * Defines a persistent, asynchronous key-value storage interface with
 * optional per-key expiration.
 */
export interface IKVStore {
	/**
	 * Stores a value, replacing any previous one.
	 * @param key - The key to store the value under.
	 * @param value - Text (written as UTF-8) or raw bytes.
	 * @param expireAt - Absolute expiration in epoch seconds. Omitting it clears a previous expiration.
	 */
	save(key: string, value: string | Uint8Array, expireAt?: number): Promise<void>;

	/**
	 * Retrieves a value as UTF-8 text.
	 * An expired entry is deleted as part of the read.
	 * @returns The value if found and not expired, null otherwise
	 */
	load(key: string): Promise<string | null>;

	/**
	 * Same as `load`, without decoding the value.
	 */
	loadBytes(key: string): Promise<Uint8Array | null>;

	/**
	 * Deletes a value and its expiration. Deleting an absent key is a no-op.
	 */
	clear(key: string): Promise<void>;

	/**
	 * Deletes every stored value.
	 */
	clearAll(): Promise<void>;

	/**
	 * Returns the raw disk usage of the store as a human-readable string.
	 */
	size(): Promise<string>;
}
