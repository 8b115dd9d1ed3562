/**
 * Config — Endpoints, credentials and tuning from the environment
 * ─────────────────────────────────────────────────────────────────────────
 * Read from process.env (a .env file is loaded first), validated in one pass
 * so every bad key is reported together. Durations accept `ms` syntax
 * ("30m", "10s", "1500").
 */

import dotenv from 'dotenv';
import ms from 'ms';
import * as v from 'valibot';
import {
    DEFAULT_LANGUAGE,
    DEFAULT_MAX_VISITS,
    FEED_SNAPSHOT_TTL,
    REALTIME_CACHE_TTL,
    SIRI_JSON_GROUP_SIZE,
    SIRI_XML_GROUP_SIZE,
} from '../constants';
import { ConfigError } from '../utils/errors';
import type { SiriFormat } from './siriClient';

export interface LiveConfig {
    siri: {
        url: string;
        requestorRef: string;
        format: SiriFormat;
        groupSize: number;
        cacheTtl: number; // seconds
        maxVisits: number;
    };
    deltaFeed: {
        url: string;
        authKey: string;
        snapshotTtl: number; // seconds
        tripIdPrefix: string;
        days: number[]; // ISO weekdays
    } | null;
    staticCacheTtl: number; // seconds
    requestTimeoutMs: number;
    defaultLanguage: string;
}

const PositiveInt = v.pipe(
    v.string(),
    v.transform(Number),
    v.number('must be a number'),
    v.integer('must be an integer'),
    v.minValue(1, 'must be at least 1')
);

const positiveInt = (fallback: number) => v.optional(PositiveInt, String(fallback));

const duration = (fallback: string) =>
    v.pipe(
        v.optional(v.string(), fallback),
        v.transform((text) => ms(text)),
        v.check((value) => Number.isFinite(value) && value > 0, 'must be a positive duration such as 30s or 10m')
    );

const isoWeekdays = v.pipe(
    v.optional(v.string(), '5,6'),
    v.transform((text) => text.split(',').map((day) => Number(day.trim()))),
    v.check((days) => days.every((day) => Number.isInteger(day) && day >= 1 && day <= 7), 'must list ISO weekdays 1-7')
);

export const EnvSchema = v.object({
    SIRI_URL: v.pipe(v.string('is required'), v.url('must be a URL')),
    SIRI_REQUESTOR_REF: v.pipe(v.string('is required'), v.nonEmpty('is required')),
    SIRI_FORMAT: v.optional(v.picklist(['xml', 'json'], 'must be xml or json'), 'xml'),
    SIRI_GROUP_SIZE: v.optional(PositiveInt),
    SIRI_CACHE_TTL: positiveInt(REALTIME_CACHE_TTL),
    SIRI_MAX_VISITS: positiveInt(DEFAULT_MAX_VISITS),
    DELTA_FEED_URL: v.optional(v.pipe(v.string(), v.url('must be a URL'))),
    DELTA_FEED_AUTH: v.optional(v.string(), ''),
    DELTA_FEED_TTL: positiveInt(FEED_SNAPSHOT_TTL),
    DELTA_FEED_TRIP_PREFIX: v.optional(v.string(), 'ta'),
    DELTA_FEED_DAYS: isoWeekdays,
    STATIC_CACHE_TTL: duration('30m'),
    REQUEST_TIMEOUT: duration('10s'),
    DEFAULT_LANGUAGE: v.pipe(v.optional(v.string(), DEFAULT_LANGUAGE), v.toUpperCase()),
}, 'is required');

/** Blank variables count as unset */
const withoutBlanks = (env: Record<string, string | undefined>) =>
    Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));

export const parseConfig = (env: Record<string, string | undefined>): LiveConfig => {
    const result = v.safeParse(EnvSchema, withoutBlanks(env));
    if (!result.success) {
        throw new ConfigError(result.issues.map((issue) => `${v.getDotPath(issue) ?? 'env'} ${issue.message}`));
    }
    const e = result.output;
    return {
        siri: {
            url: e.SIRI_URL,
            requestorRef: e.SIRI_REQUESTOR_REF,
            format: e.SIRI_FORMAT,
            groupSize: e.SIRI_GROUP_SIZE ?? (e.SIRI_FORMAT === 'json' ? SIRI_JSON_GROUP_SIZE : SIRI_XML_GROUP_SIZE),
            cacheTtl: e.SIRI_CACHE_TTL,
            maxVisits: e.SIRI_MAX_VISITS,
        },
        deltaFeed: e.DELTA_FEED_URL
            ? {
                url: e.DELTA_FEED_URL,
                authKey: e.DELTA_FEED_AUTH,
                snapshotTtl: e.DELTA_FEED_TTL,
                tripIdPrefix: e.DELTA_FEED_TRIP_PREFIX,
                days: e.DELTA_FEED_DAYS,
            }
            : null,
        staticCacheTtl: Math.round(e.STATIC_CACHE_TTL / 1000),
        requestTimeoutMs: e.REQUEST_TIMEOUT,
        defaultLanguage: e.DEFAULT_LANGUAGE,
    };
};

/** Loads .env into process.env (existing variables win) and parses the result */
export const loadConfig = (path?: string): LiveConfig => {
    dotenv.config(path ? { path } : undefined);
    return parseConfig(process.env);
};
