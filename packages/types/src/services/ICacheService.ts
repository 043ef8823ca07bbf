/**
 * Key-value cache used for resolved extension payloads.
 *
 * Values are JSON-serialised, so Dates come back as ISO strings.
 */
export interface ICacheService {
    /**
     * @returns The cached value, or null when missing or expired
     */
    get<T>(key: string): Promise<T | null>;

    /**
     * Store a value, optionally expiring after `ttlSeconds`.
     */
    set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;

    /**
     * @returns Number of keys removed
     */
    del(key: string): Promise<number>;
}
