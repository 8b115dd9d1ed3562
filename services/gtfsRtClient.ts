/**
 * GtfsRtClient — Polled delta feed behind a short snapshot cache
 * ─────────────────────────────────────────────────────────────────────────
 * One feed snapshot is shared by every request for `snapshotTtl` seconds.
 * Trip facts and stop mappings are looked up in batches and cached per id
 * for the static TTL.
 */

import { FEED_SNAPSHOT_TTL, STATIC_CACHE_TTL } from '../constants';
import type { TripRouteInfo } from '../types';
import { fetchWithTimeout, readBytes } from '../utils/http';
import type { FetchLike } from '../utils/http';
import type { AggregatedResponse } from './aggregatedResponse';
import { collectFeedReferences, decodeDeltaFeed, parseFeedSnapshot } from './gtfsRtCodec';
import type { FeedSnapshot } from './gtfsRtCodec';
import type { ScheduleStore } from './scheduleStore';
import { TtlCache } from './ttlCache';
import type { Clock } from './ttlCache';

export interface GtfsRtClientOptions {
    url: string;
    authKey: string;
    store: Pick<ScheduleStore, 'getMappedStopCodes'>;
    resolveTripsInfo(tripIds: readonly string[]): Promise<Map<string, TripRouteInfo>>;
    tripIdPrefix?: string;
    snapshotTtl?: number; // seconds
    staticTtl?: number; // seconds
    timeoutMs?: number;
    fetchImpl?: FetchLike;
    clock?: Clock;
}

export interface GtfsRtClient {
    fetchSnapshot(): Promise<FeedSnapshot>;
    request(stopCodes: readonly string[]): Promise<AggregatedResponse>;
}

const FEED_KEY = 'feed';

export function createGtfsRtClient({
    url,
    authKey,
    store,
    resolveTripsInfo,
    tripIdPrefix = 'ta',
    snapshotTtl = FEED_SNAPSHOT_TTL,
    staticTtl = STATIC_CACHE_TTL,
    timeoutMs = 10_000,
    fetchImpl,
    clock = Date.now,
}: GtfsRtClientOptions): GtfsRtClient {
    const snapshots = new TtlCache<FeedSnapshot>(clock);
    const tripCache = new TtlCache<TripRouteInfo>(clock);
    const stopCache = new TtlCache<string>(clock);

    const fetchSnapshot = () =>
        snapshots.getOrLoad(FEED_KEY, snapshotTtl, async () => {
            const res = await fetchWithTimeout(url, { headers: { authorization: authKey } }, timeoutMs, fetchImpl);
            const bytes = await readBytes(res);
            const snapshot = parseFeedSnapshot(bytes, new Date(clock()));
            console.log(`[DeltaFeed] Fetched ${snapshot.message.entity.length} entities`);
            return snapshot;
        });

    const resolveTrips = async (tripIds: string[]): Promise<Map<string, TripRouteInfo>> => {
        const trips = new Map<string, TripRouteInfo>();
        const missing: string[] = [];
        for (const id of tripIds) {
            const cached = tripCache.get(`trip:${id}`);
            if (cached) trips.set(id, cached);
            else missing.push(id);
        }
        if (missing.length > 0) {
            for (const [id, info] of await resolveTripsInfo(missing)) {
                trips.set(id, info);
                tripCache.set(`trip:${id}`, info, staticTtl);
            }
        }
        return trips;
    };

    const resolveStops = async (feedStopIds: string[]): Promise<Map<string, string>> => {
        const mapping = new Map<string, string>();
        const missing: string[] = [];
        for (const id of feedStopIds) {
            const cached = stopCache.get(`stop:${id}`);
            if (cached !== undefined) mapping.set(id, cached);
            else missing.push(id);
        }
        if (missing.length > 0) {
            for (const [id, stopCode] of await store.getMappedStopCodes(missing)) {
                mapping.set(id, stopCode);
                stopCache.set(`stop:${id}`, stopCode, staticTtl);
            }
        }
        return mapping;
    };

    const request = async (stopCodes: readonly string[]): Promise<AggregatedResponse> => {
        const snapshot = await fetchSnapshot();
        const { tripIds, feedStopIds } = collectFeedReferences(snapshot, tripIdPrefix);
        const [trips, stopMapping] = await Promise.all([resolveTrips(tripIds), resolveStops(feedStopIds)]);
        return decodeDeltaFeed(snapshot, Array.from(new Set(stopCodes)), { trips, stopMapping, tripIdPrefix });
    };

    return { fetchSnapshot, request };
}
