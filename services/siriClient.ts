import { DEFAULT_MAX_VISITS, REALTIME_CACHE_TTL, SIRI_JSON_GROUP_SIZE, SIRI_XML_GROUP_SIZE } from '../constants';
import { fetchWithTimeout, readText } from '../utils/http';
import type { FetchLike } from '../utils/http';
import type { AggregatedResponse } from './aggregatedResponse';
import { createRealtimeBatcher } from './realtimeBatcher';
import type { CachedStopVisits } from './realtimeBatcher';
import { decodeStopMonitoringResponse, encodeStopMonitoringRequest, encodeStopMonitoringUrl } from './siriCodec';
import { TtlCache } from './ttlCache';

export type SiriFormat = 'xml' | 'json';

export interface SiriClientOptions {
    url: string;
    requestorRef: string;
    format?: SiriFormat;
    groupSize?: number;
    cacheTtl?: number; // seconds
    timeoutMs?: number;
    cache?: TtlCache<CachedStopVisits>;
    fetchImpl?: FetchLike;
    now?: () => Date;
}

export interface SiriClient {
    request(stopCodes: readonly string[], maxVisits?: number): Promise<AggregatedResponse>;
}

const XML_HEADERS = {
    'content-type': 'text/xml; charset=utf-8',
    accept: 'text/xml,multipart/related',
};

export function createSiriClient({
    url,
    requestorRef,
    format = 'xml',
    groupSize,
    cacheTtl = REALTIME_CACHE_TTL,
    timeoutMs = 10_000,
    cache = new TtlCache<CachedStopVisits>(),
    fetchImpl,
    now = () => new Date(),
}: SiriClientOptions): SiriClient {
    const fetchGroup = async (group: string[], maxVisits: number): Promise<AggregatedResponse> => {
        const res = format === 'json'
            ? await fetchWithTimeout(
                encodeStopMonitoringUrl(url, group, maxVisits, requestorRef),
                { headers: { accept: 'application/json' } },
                timeoutMs,
                fetchImpl
            )
            : await fetchWithTimeout(
                url,
                {
                    method: 'POST',
                    headers: XML_HEADERS,
                    body: encodeStopMonitoringRequest(group, maxVisits, { requestorRef, now: now() }),
                },
                timeoutMs,
                fetchImpl
            );

        const response = await decodeStopMonitoringResponse(await readText(res), group);
        if (response.errors.length > 0) {
            console.warn(`[Siri] Partial delivery for ${group.join(',')}:`, response.errors);
        }
        return response;
    };

    const batcher = createRealtimeBatcher({
        groupSize: groupSize ?? (format === 'json' ? SIRI_JSON_GROUP_SIZE : SIRI_XML_GROUP_SIZE),
        cacheTtl,
        cache,
        fetchGroup,
        label: 'Siri',
    });

    return {
        request: (stopCodes, maxVisits = DEFAULT_MAX_VISITS) => batcher.request(stopCodes, maxVisits),
    };
}
