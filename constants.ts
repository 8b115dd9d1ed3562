export const APP_NAME = 'livestop';
export const APP_VERSION = '0.1.0';

export const SIRI_NAMESPACE_URI = 'http://www.siri.org.uk/siri';
// Works for most IL2.71 responses when discovery finds nothing
export const DEFAULT_SIRI_PREFIX = 'ns3:';

// 2.71 accepts 25 stops per SOAP request, 2.8 lowers it to 10
export const SIRI_XML_GROUP_SIZE = 25;
export const SIRI_JSON_GROUP_SIZE = 100;

export const REALTIME_CACHE_TTL = 30; // seconds
export const FEED_SNAPSHOT_TTL = 30; // seconds
export const STATIC_CACHE_TTL = 30 * 60; // seconds
export const STOP_INFO_CACHE_TTL = 15 * 60; // seconds

export const DEFAULT_LANGUAGE = 'HE';
export const RAIL_AGENCY_ID = '2';
export const DEFAULT_MAX_VISITS = 50;

export const realtimeCacheKey = (stopCode: string) => `realtime:${stopCode}`;
