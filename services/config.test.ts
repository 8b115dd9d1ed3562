import { describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../utils/errors';
import { loadConfig, parseConfig } from './config';

const required = { SIRI_URL: 'http://siri.test/sm', SIRI_REQUESTOR_REF: 'TEST' };

const issuesOf = (env: Record<string, string | undefined>): string[] => {
    try {
        parseConfig(env);
    } catch (e) {
        if (e instanceof ConfigError) return e.issues;
        throw e;
    }
    return [];
};

describe('parseConfig', () => {
    it('fills in defaults around the required keys', () => {
        expect(parseConfig(required)).toEqual({
            siri: {
                url: 'http://siri.test/sm',
                requestorRef: 'TEST',
                format: 'xml',
                groupSize: 25,
                cacheTtl: 30,
                maxVisits: 50,
            },
            deltaFeed: null,
            staticCacheTtl: 1800,
            requestTimeoutMs: 10_000,
            defaultLanguage: 'HE',
        });
    });

    it('uses the larger group size for the JSON endpoint', () => {
        expect(parseConfig({ ...required, SIRI_FORMAT: 'json' }).siri.groupSize).toBe(100);
        expect(parseConfig({ ...required, SIRI_FORMAT: 'json', SIRI_GROUP_SIZE: '40' }).siri.groupSize).toBe(40);
    });

    it('configures the delta feed only when its URL is set', () => {
        const config = parseConfig({
            ...required,
            DELTA_FEED_URL: 'http://feed.test/gtfsrt',
            DELTA_FEED_AUTH: 'test-secret',
            DELTA_FEED_DAYS: '6, 7',
        });

        expect(config.deltaFeed).toEqual({
            url: 'http://feed.test/gtfsrt',
            authKey: 'test-secret',
            snapshotTtl: 30,
            tripIdPrefix: 'ta',
            days: [6, 7],
        });
    });

    it('reads durations in ms syntax', () => {
        const config = parseConfig({ ...required, STATIC_CACHE_TTL: '2h', REQUEST_TIMEOUT: '1500' });
        expect(config.staticCacheTtl).toBe(7200);
        expect(config.requestTimeoutMs).toBe(1500);
    });

    it('treats blank values as unset', () => {
        const config = parseConfig({ ...required, SIRI_CACHE_TTL: '  ', DEFAULT_LANGUAGE: 'en' });
        expect(config.siri.cacheTtl).toBe(30);
        expect(config.defaultLanguage).toBe('EN');
    });

    it('reports every invalid key at once', () => {
        expect(issuesOf({ SIRI_REQUESTOR_REF: 'TEST', SIRI_FORMAT: 'soap' })).toEqual([
            'SIRI_URL is required',
            'SIRI_FORMAT must be xml or json',
        ]);
    });

    it('rejects values out of range', () => {
        expect(issuesOf({ ...required, SIRI_GROUP_SIZE: '0' })).toEqual(['SIRI_GROUP_SIZE must be at least 1']);
        expect(issuesOf({ ...required, REQUEST_TIMEOUT: 'soon' })).toEqual([
            'REQUEST_TIMEOUT must be a positive duration such as 30s or 10m',
        ]);
        expect(issuesOf({ ...required, DELTA_FEED_DAYS: '5,8' })).toEqual(['DELTA_FEED_DAYS must list ISO weekdays 1-7']);
        expect(issuesOf({ ...required, SIRI_URL: 'not a url' })).toEqual(['SIRI_URL must be a URL']);
    });

    it('names the keys in the error message', () => {
        expect(() => parseConfig({ ...required, SIRI_MAX_VISITS: '2.5' })).toThrow(
            'Invalid configuration: SIRI_MAX_VISITS must be an integer'
        );
    });
});

describe('loadConfig', () => {
    it('reads the process environment when there is no .env file', () => {
        vi.stubEnv('SIRI_URL', 'http://siri.test/env');
        vi.stubEnv('SIRI_REQUESTOR_REF', 'FROM_ENV');

        const config = loadConfig('fixtures/missing.env');

        expect(config.siri.url).toBe('http://siri.test/env');
        expect(config.siri.requestorRef).toBe('FROM_ENV');
    });
});
