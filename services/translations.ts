/**
 * Translations — Multilingual names for stops, towns and routes
 * ─────────────────────────────────────────────────────────────────────────
 * Schedule strings sometimes quote with two apostrophes where the translation
 * table uses a double quote (ת''א vs ת"א), so every lookup tries both.
 *
 * Route long names look like
 *   "רדינג-תל אביב יפו<->ת. מרכזית ת''א ק. 4/הורדה-תל אביב יפו-10"
 * i.e. "{stop}-{town}[-{platform}]" on each side of a separator. Each side is
 * translated whole when possible, otherwise stop and town separately, and the
 * town is dropped when the stop name already names it.
 */

import { DEFAULT_LANGUAGE, STATIC_CACHE_TTL } from '../constants';
import townSynonymPatterns from '../data/townSynonyms.json';
import type { Route, Stop, StopAddress, TranslatedName } from '../types';
import { parseStopAddress } from './address';
import type { ScheduleStore } from './scheduleStore';
import { TtlCache } from './ttlCache';
import type { Clock } from './ttlCache';

export const ROUTE_NAME_SEPARATORS = ['<->', '<=>'] as const;

const ENGLISH = 'EN';

export interface TranslatorOptions {
    store: ScheduleStore;
    defaultLanguage?: string;
    /** Separator candidates for route long names, tried in order */
    separators?: readonly string[];
    /** English town name → pattern matching stop names that already name the town */
    townSynonyms?: ReadonlyMap<string, RegExp>;
    ttl?: number; // seconds
    clock?: Clock;
}

export interface Translator {
    getTranslation(source: string): Promise<TranslatedName>;
    getTranslationFor(source: string, lang: string): Promise<string | null>;
    translateCityName(city: string): Promise<string | null>;
    getTranslatedAddress(stop: Stop): Promise<StopAddress>;
    translateRouteName(route: Pick<Route, 'routeLongName'>): Promise<string>;
}

export const normalizeQuotes = (source: string) => source.replaceAll("''", '"');

export const loadTownSynonyms = (patterns: Record<string, string> = townSynonymPatterns): Map<string, RegExp> =>
    new Map(Object.entries(patterns).map(([town, pattern]) => [town, new RegExp(pattern)]));

/** First separator present in the name, or null when the name has a single side */
export const findRouteSeparator = (name: string, separators: readonly string[] = ROUTE_NAME_SEPARATORS): string | null =>
    separators.find((sep) => name.includes(sep)) ?? null;

/** Drop the town when the stop name already carries it */
export const combineStopAndTown = (
    stopName: string,
    town: string | null,
    townSynonyms: ReadonlyMap<string, RegExp>
): string => {
    if (!town) return stopName;
    if (stopName.includes(town.replaceAll('-', '')) || stopName.includes(town)) return stopName;
    if (townSynonyms.get(town)?.test(stopName)) return stopName;
    return `${stopName}-${town}`;
};

export function createTranslator({
    store,
    defaultLanguage = DEFAULT_LANGUAGE,
    separators = ROUTE_NAME_SEPARATORS,
    townSynonyms = loadTownSynonyms(),
    ttl = STATIC_CACHE_TTL,
    clock,
}: TranslatorOptions): Translator {
    const names = new TtlCache<TranslatedName>(clock);
    const cities = new TtlCache<string | null>(clock);

    const getTranslation = (source: string): Promise<TranslatedName> =>
        names.getOrLoad(source, ttl, async () => {
            const normalized = normalizeQuotes(source);
            const rows = await store.getTranslations([source, normalized]);
            if (rows.length === 0) return { [defaultLanguage]: normalized };
            const result: TranslatedName = {};
            for (const row of rows) result[row.lang] = row.translation;
            return result;
        });

    const getTranslationFor = async (source: string, lang: string): Promise<string | null> => {
        const rows = await store.getTranslations([source, normalizeQuotes(source)], lang);
        return rows[0]?.translation ?? null;
    };

    const translateCityName = (city: string): Promise<string | null> =>
        cities.getOrLoad(city, ttl, async () => {
            // the schedule's own translation table first, then the settlement registry
            const translated = await getTranslationFor(city, ENGLISH);
            if (translated) return translated;
            const row = await store.getCity(city);
            return row?.englishName || null;
        });

    const getTranslatedAddress = async (stop: Stop): Promise<StopAddress> => {
        const address = { ...parseStopAddress(stop) };
        if (address.city) {
            const city = await translateCityName(address.city);
            if (city) address.city = city;
        }
        return address;
    };

    const translatePart = async (part: string): Promise<string> => {
        const whole = await getTranslationFor(part, ENGLISH);
        if (whole) return whole;

        const [rawStop = '', rawTown] = part.split('-');
        const stopSource = rawStop.trim();
        const stopName = (await getTranslationFor(stopSource, ENGLISH)) ?? stopSource;
        if (rawTown === undefined) return stopName;

        const townSource = rawTown.trim();
        const town = (await translateCityName(townSource)) ?? townSource;
        return combineStopAndTown(stopName, town, townSynonyms);
    };

    const translateRouteName = async ({ routeLongName }: Pick<Route, 'routeLongName'>): Promise<string> => {
        const separator = findRouteSeparator(routeLongName, separators);
        if (separator === null) return translatePart(routeLongName);
        const parts = await Promise.all(routeLongName.split(separator).map(translatePart));
        return parts.join(separator);
    };

    return { getTranslation, getTranslationFor, translateCityName, getTranslatedAddress, translateRouteName };
}
