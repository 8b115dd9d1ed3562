/**
 * RealtimeBatcher — Splits a multi-stop request into fetch groups behind a
 * short per-stop cache.
 * ─────────────────────────────────────────────────────────────────────────
 *  1. Stops with a live `realtime:{stop}` entry are served from cache.
 *  2. The rest are split into groups of `groupSize` and fetched concurrently.
 *  3. Group results are merged in dispatch order, whatever order they land in.
 *  4. Fetched stops are cached; cached stops are spliced in unchanged.
 *  5. A stop whose group is still in flight waits on that fetch instead of
 *     starting another one.
 *
 * The TTL only absorbs bursts against the same stop; it is not a stale-data store.
 */

import { realtimeCacheKey } from '../constants';
import type { Visit } from '../types';
import { TransportError } from '../utils/errors';
import { chunk } from '../utils/oneOrMany';
import { AggregatedResponse, mergeResponses } from './aggregatedResponse';
import type { TtlCache } from './ttlCache';

export interface CachedStopVisits {
    visits: readonly Visit[];
    timestamp: string | null; // response timestamp of the fetch that produced them
}

export type GroupFetcher = (stopCodes: string[], maxVisits: number) => Promise<AggregatedResponse>;

export interface RealtimeBatcherOptions {
    groupSize: number;
    cacheTtl: number; // seconds
    cache: TtlCache<CachedStopVisits>;
    fetchGroup: GroupFetcher;
    label?: string;
}

export interface RealtimeBatcher {
    request(stopCodes: readonly string[], maxVisits: number): Promise<AggregatedResponse>;
}

const oldestTimestamp = (timestamps: (string | null)[]): string | null => {
    let oldest: string | null = null;
    let oldestMs = Infinity;
    for (const ts of timestamps) {
        if (ts === null) continue;
        const ms = new Date(ts).getTime();
        if (ms < oldestMs) {
            oldestMs = ms;
            oldest = ts;
        }
    }
    return oldest;
};

/** One group fetch, shared by every request that asks for one of its stops meanwhile */
interface Flight {
    group: string[];
    promise: Promise<AggregatedResponse>;
}

export function createRealtimeBatcher({
    groupSize,
    cacheTtl,
    cache,
    fetchGroup,
    label = 'Batcher',
}: RealtimeBatcherOptions): RealtimeBatcher {
    const inflight = new Map<string, Flight>();

    const dispatch = (group: string[], maxVisits: number): Flight => {
        const flight: Flight = {
            group,
            promise: fetchGroup(group, maxVisits)
                .then((response) => {
                    // Partial deliveries stay uncached so their errors show up again
                    if (response.errors.length === 0) {
                        for (const stop of group) {
                            cache.set(realtimeCacheKey(stop), {
                                visits: [...response.visitsFor(stop)],
                                timestamp: response.timestamp,
                            }, cacheTtl);
                        }
                    }
                    return response;
                })
                .finally(() => {
                    for (const stop of group) {
                        if (inflight.get(stop) === flight) inflight.delete(stop);
                    }
                }),
        };
        for (const stop of group) inflight.set(stop, flight);
        return flight;
    };

    return {
        request: async (stopCodes, maxVisits) => {
            const requested = Array.from(new Set(stopCodes));

            // Partition into cached, already in flight and to-fetch
            const toFetch: string[] = [];
            const fromCache: [string, CachedStopVisits][] = [];
            const joined = new Map<Flight, string[]>();
            for (const stop of requested) {
                const cached = cache.get(realtimeCacheKey(stop));
                const flight = inflight.get(stop);
                if (cached !== undefined) fromCache.push([stop, cached]);
                else if (flight) joined.set(flight, [...(joined.get(flight) ?? []), stop]);
                else toFetch.push(stop);
            }

            if (toFetch.length === 0 && joined.size === 0) {
                const response = new AggregatedResponse(requested, oldestTimestamp(fromCache.map(([, c]) => c.timestamp)));
                for (const [stop, cached] of fromCache) {
                    response.setVisits(stop, cached.visits);
                }
                return response;
            }

            const flights = chunk(toFetch, groupSize).map((group) => dispatch(group, maxVisits));
            const shared = Array.from(joined);
            const [settled, sharedSettled] = await Promise.all([
                Promise.allSettled(flights.map((flight) => flight.promise)),
                Promise.allSettled(shared.map(([flight]) => flight.promise)),
            ]);

            const result = new AggregatedResponse(requested);
            const failures: TransportError[] = [];
            const recordFailure = (stops: string[], reason: unknown) => {
                if (!(reason instanceof TransportError)) throw reason;
                failures.push(reason);
                console.error(`[${label}] Fetch failed for stops ${stops.join(',')}: ${reason.message}`);
                result.errors.push(`Fetch failed for stops ${stops.join(',')}: ${reason.message}`);
            };

            // Merge in dispatch order
            settled.forEach((outcome, index) => {
                if (outcome.status === 'rejected') recordFailure(flights[index].group, outcome.reason);
                else mergeResponses(result, outcome.value);
            });

            // Groups dispatched by an earlier request; take only this request's stops
            sharedSettled.forEach((outcome, index) => {
                const stops = shared[index][1];
                if (outcome.status === 'rejected') {
                    recordFailure(stops, outcome.reason);
                    return;
                }
                for (const stop of stops) result.setVisits(stop, outcome.value.visitsFor(stop));
                if (result.timestamp === null) result.timestamp = outcome.value.timestamp;
            });

            if (failures.length === flights.length + shared.length && fromCache.length === 0) {
                throw failures[0];
            }

            for (const [stop, cached] of fromCache) {
                result.setVisits(stop, cached.visits);
            }
            if (result.timestamp === null) {
                result.timestamp = oldestTimestamp(fromCache.map(([, c]) => c.timestamp));
            }
            return result;
        },
    };
}
