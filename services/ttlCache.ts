/**
 * TtlCache — Keyed values with an independent expiry per entry
 * ─────────────────────────────────────────────────────────────────────────
 * One instance per kind of value: the batcher's per-stop visits, the delta
 * feed's snapshot, trips and stop mappings, the schedule lookups. Entries
 * are replaced wholesale, never patched. `getOrLoad` keeps one in-flight load per key so concurrent
 * requests for the same key reuse it instead of fetching twice.
 */

export type Clock = () => number; // epoch milliseconds

interface Entry<V> {
    value: V;
    storedAt: number;
    expiresAt: number;
}

export interface CacheStats {
    hits: number;
    misses: number;
    loads: number;
}

export class TtlCache<V> {
    private readonly entries = new Map<string, Entry<V>>();
    private readonly inflight = new Map<string, Promise<V>>();
    private readonly counters: CacheStats = { hits: 0, misses: 0, loads: 0 };

    constructor(private readonly now: Clock = Date.now) { }

    get(key: string): V | undefined {
        const entry = this.lookup(key);
        if (entry) {
            this.counters.hits++;
            return entry.value;
        }
        this.counters.misses++;
        return undefined;
    }

    /** Epoch ms at which the live entry for `key` was stored */
    storedAt(key: string): number | undefined {
        return this.lookup(key)?.storedAt;
    }

    set(key: string, value: V, ttlSeconds: number): void {
        const now = this.now();
        this.entries.set(key, { value, storedAt: now, expiresAt: now + ttlSeconds * 1000 });
    }

    delete(key: string): void {
        this.entries.delete(key);
    }

    clear(): void {
        this.entries.clear();
        this.inflight.clear();
    }

    async getOrLoad(key: string, ttlSeconds: number, loader: () => Promise<V>): Promise<V> {
        const entry = this.lookup(key);
        if (entry) {
            this.counters.hits++;
            return entry.value;
        }
        this.counters.misses++;

        // Avoid duplicate in-flight loads
        const pending = this.inflight.get(key);
        if (pending) return pending;

        this.counters.loads++;
        const promise = loader()
            .then((value) => {
                this.set(key, value, ttlSeconds);
                return value;
            })
            .finally(() => {
                this.inflight.delete(key);
            });

        this.inflight.set(key, promise);
        return promise;
    }

    stats(): CacheStats {
        return { ...this.counters };
    }

    private lookup(key: string): Entry<V> | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (this.now() >= entry.expiresAt) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }
}
