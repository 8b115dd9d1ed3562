import type { CachedStopVisits } from './services/realtimeBatcher';
import type { LiveConfig } from './services/config';
import { createCrossReferencer } from './services/crossReferencer';
import { createGtfsRtClient } from './services/gtfsRtClient';
import { createRealtimeService } from './services/realtimeService';
import { createScheduleQueries } from './services/scheduleQueries';
import type { ScheduleStore } from './services/scheduleStore';
import { createSiriClient } from './services/siriClient';
import { createTranslator } from './services/translations';
import { TtlCache } from './services/ttlCache';
import type { Clock } from './services/ttlCache';
import type { FetchLike } from './utils/http';

export * from './types';
export * from './constants';
export * from './utils/errors';
export { AggregatedResponse, mergeResponses, visitsEqual, visitToDict } from './services/aggregatedResponse';
export type { AggregatedResponseDict, VisitDict } from './services/aggregatedResponse';
export { loadConfig, parseConfig } from './services/config';
export type { LiveConfig } from './services/config';
export { createCrossReferencer } from './services/crossReferencer';
export type { CrossReferencer } from './services/crossReferencer';
export { parseAddress, parseStopAddress } from './services/address';
export { cleanStopName, matchFeedStops } from './services/feedStopMatcher';
export type { FeedStopMatchResult, FeedStopRow } from './services/feedStopMatcher';
export { collectFeedReferences, decodeDeltaFeed, parseFeedSnapshot } from './services/gtfsRtCodec';
export type { FeedSnapshot } from './services/gtfsRtCodec';
export { createGtfsRtClient } from './services/gtfsRtClient';
export type { GtfsRtClient } from './services/gtfsRtClient';
export { createRealtimeBatcher } from './services/realtimeBatcher';
export type { CachedStopVisits, GroupFetcher } from './services/realtimeBatcher';
export { createRealtimeService } from './services/realtimeService';
export type { EnrichedRealtime, RealtimeService } from './services/realtimeService';
export { createScheduleQueries } from './services/scheduleQueries';
export type { NearbyStop, RouteStop, ScheduleQueries, Station, StopInfo } from './services/scheduleQueries';
export { InMemoryScheduleStore } from './services/scheduleStore';
export type { ScheduleSnapshot, ScheduleStore } from './services/scheduleStore';
export { createSiriClient } from './services/siriClient';
export type { SiriClient, SiriFormat } from './services/siriClient';
export {
    decodeStopMonitoringResponse,
    discoverSiriPrefix,
    encodeStopMonitoringRequest,
    encodeStopMonitoringUrl,
} from './services/siriCodec';
export { createTranslator } from './services/translations';
export type { Translator } from './services/translations';
export { TtlCache } from './services/ttlCache';

export interface LiveStopOptions {
    config: LiveConfig;
    store: ScheduleStore;
    fetchImpl?: FetchLike;
    clock?: Clock;
}

/** Wires every service from one configuration and schedule store */
export function createLiveStop({ config, store, fetchImpl, clock = Date.now }: LiveStopOptions) {
    const translator = createTranslator({
        store,
        defaultLanguage: config.defaultLanguage,
        ttl: config.staticCacheTtl,
        clock,
    });
    const queries = createScheduleQueries({ store, translator, ttl: config.staticCacheTtl, clock });
    const crossReferencer = createCrossReferencer({ store, translator, defaultLanguage: config.defaultLanguage });

    const siri = createSiriClient({
        url: config.siri.url,
        requestorRef: config.siri.requestorRef,
        format: config.siri.format,
        groupSize: config.siri.groupSize,
        cacheTtl: config.siri.cacheTtl,
        timeoutMs: config.requestTimeoutMs,
        cache: new TtlCache<CachedStopVisits>(clock),
        fetchImpl,
        now: () => new Date(clock()),
    });

    const deltaFeed = config.deltaFeed
        ? createGtfsRtClient({
            url: config.deltaFeed.url,
            authKey: config.deltaFeed.authKey,
            store,
            resolveTripsInfo: queries.resolveTripsInfo,
            tripIdPrefix: config.deltaFeed.tripIdPrefix,
            snapshotTtl: config.deltaFeed.snapshotTtl,
            staticTtl: config.staticCacheTtl,
            timeoutMs: config.requestTimeoutMs,
            fetchImpl,
            clock,
        })
        : undefined;

    const realtime = createRealtimeService({
        siri,
        deltaFeed,
        crossReferencer,
        deltaFeedDays: config.deltaFeed?.days,
        now: () => new Date(clock()),
    });

    return {
        realtime,
        queries,
        translator,
        crossReferencer,
        siri,
        deltaFeed,
        /** Arrivals for the stops, capped at the configured visit count */
        request: (stopCodes: readonly string[], lineNames?: readonly string[]) =>
            realtime.request(stopCodes, { lineNames, maxVisits: config.siri.maxVisits }),
    };
}

export type LiveStop = ReturnType<typeof createLiveStop>;
