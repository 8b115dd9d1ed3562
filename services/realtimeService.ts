/**
 * RealtimeService — Arrivals for a set of stops, from every live source
 * ─────────────────────────────────────────────────────────────────────────
 * Stop monitoring answers every day. The municipal delta feed only runs on
 * its service days; on those days both are queried and merged, and a stop
 * monitoring failure still leaves the delta feed's answer.
 */

import { getISODay } from 'date-fns';
import type { StaticInfo, Visit } from '../types';
import { LiveDataError, TransportError } from '../utils/errors';
import type { AggregatedResponse, AggregatedResponseDict } from './aggregatedResponse';
import type { CrossReferencer } from './crossReferencer';
import type { GtfsRtClient } from './gtfsRtClient';
import type { SiriClient } from './siriClient';

export interface RealtimeRequestOptions {
    /** Keep only visits whose published line name is in this list */
    lineNames?: readonly string[];
    maxVisits?: number;
}

export interface EnrichedRealtime {
    response: AggregatedResponse;
    staticInfo: Map<Visit, StaticInfo>;
    toDict(): AggregatedResponseDict;
}

export interface RealtimeServiceOptions {
    siri: SiriClient;
    deltaFeed?: GtfsRtClient;
    crossReferencer: CrossReferencer;
    /** ISO weekdays (1 = Monday) on which the delta feed runs */
    deltaFeedDays?: readonly number[];
    now?: () => Date;
}

export interface RealtimeService {
    request(stopCodes: readonly string[], options?: RealtimeRequestOptions): Promise<EnrichedRealtime>;
}

export const DEFAULT_DELTA_FEED_DAYS = [5, 6];

const errorMessage = (e: unknown) => (e instanceof Error ? e.message : String(e));

export function createRealtimeService({
    siri,
    deltaFeed,
    crossReferencer,
    deltaFeedDays = DEFAULT_DELTA_FEED_DAYS,
    now = () => new Date(),
}: RealtimeServiceOptions): RealtimeService {
    const fetchLive = async (stopCodes: readonly string[], maxVisits?: number): Promise<AggregatedResponse> => {
        const feedDay = deltaFeed !== undefined && deltaFeedDays.includes(getISODay(now()));
        if (!deltaFeed || !feedDay) return siri.request(stopCodes, maxVisits);

        let response: AggregatedResponse | null = null;
        try {
            response = await siri.request(stopCodes, maxVisits);
        } catch (e) {
            if (!(e instanceof LiveDataError)) throw e;
            console.error(`[Realtime] Stop monitoring failed, using the delta feed alone: ${errorMessage(e)}`);
        }

        if (!response) return deltaFeed.request(stopCodes);

        try {
            return response.append(await deltaFeed.request(stopCodes));
        } catch (e) {
            if (!(e instanceof TransportError)) throw e;
            console.error(`[Realtime] Delta feed failed: ${e.message}`);
            response.errors.push(`Delta feed unavailable: ${e.message}`);
            return response;
        }
    };

    return {
        request: async (stopCodes, { lineNames, maxVisits } = {}) => {
            let response = await fetchLive(stopCodes, maxVisits);

            if (lineNames && lineNames.length > 0) {
                const wanted = new Set(lineNames);
                response = response.filterVisits((visit) => visit.lineName !== null && wanted.has(visit.lineName));
            }

            const staticInfo = await crossReferencer.resolveAll(response.allVisits());
            const enriched = response;
            return {
                response: enriched,
                staticInfo,
                toDict: () => enriched.toDict(staticInfo),
            };
        },
    };
}
