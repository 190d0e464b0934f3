import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { Coordinate, CoordinateKey, LocationRecord } from '@/shared/types/common.types';
import { cacheDocumentSchema, type CacheDocument } from '@/shared/utils/validators';
import { logCacheLoad, logCacheLookup, logCachePersist, logger } from '@/shared/utils/logger';
import {
    PROXIMITY_TOLERANCE_DEGREES,
    isWithinTolerance,
    parseCoordinateKey,
    toCoordinateKey,
} from './coordinate-math';

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Geocode Cache
 *
 * Maps rounded coordinate keys to resolved locations. Lookups try the exact
 * key first, then scan every entry in insertion order and return the first
 * one within the proximity tolerance. The scan returns the first tolerant
 * match, not necessarily the nearest one.
 */
export class GeocodeCache {
    private readonly entriesByKey = new Map<CoordinateKey, LocationRecord>();

    constructor(
        entries: Iterable<readonly [CoordinateKey, LocationRecord]> = [],
        private readonly tolerance: number = PROXIMITY_TOLERANCE_DEGREES
    ) {
        for (const [key, record] of entries) {
            this.entriesByKey.set(key, record);
        }
    }

    /**
     * Load a cache from its JSON document
     *
     * A missing or corrupt file yields an empty cache; this never throws.
     */
    static async loadFrom(filePath: string, tolerance?: number): Promise<GeocodeCache> {
        let raw: string;
        try {
            raw = await readFile(filePath, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                logCacheLoad({ filePath, entries: 0, missing: true });
            } else {
                logCacheLoad({ filePath, entries: 0, error: errorMessage(error) });
            }
            return new GeocodeCache([], tolerance);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            logCacheLoad({ filePath, entries: 0, error: `Invalid JSON: ${errorMessage(error)}` });
            return new GeocodeCache([], tolerance);
        }

        const validation = cacheDocumentSchema.safeParse(parsed);
        if (!validation.success) {
            logCacheLoad({
                filePath,
                entries: 0,
                error: `Unexpected cache document shape: ${validation.error.issues[0]?.message ?? 'unknown issue'}`,
            });
            return new GeocodeCache([], tolerance);
        }

        const cache = new GeocodeCache(
            Object.entries(validation.data).map(([key, entry]) => [
                key,
                {
                    city: entry.city,
                    state: entry.state,
                    country: entry.country,
                    displayName: entry.display_name,
                },
            ] as const),
            tolerance
        );

        logCacheLoad({ filePath, entries: cache.size });
        return cache;
    }

    /**
     * Number of cached coordinates
     */
    get size(): number {
        return this.entriesByKey.size;
    }

    /**
     * Find a cached location for a coordinate, exact key first, then by proximity
     */
    lookup(coordinate: Coordinate): LocationRecord | null {
        const key = toCoordinateKey(coordinate);
        const exact = this.entriesByKey.get(key);
        if (exact) {
            logCacheLookup({ coordinate, hit: true, matchedKey: key, proximity: false });
            return exact;
        }

        for (const [cachedKey, record] of this.entriesByKey) {
            const cached = parseCoordinateKey(cachedKey);
            if (!cached) continue;

            if (isWithinTolerance(coordinate, cached, this.tolerance)) {
                logCacheLookup({ coordinate, hit: true, matchedKey: cachedKey, proximity: true });
                return record;
            }
        }

        logCacheLookup({ coordinate, hit: false });
        return null;
    }

    /**
     * Store a location under the coordinate's exact key, replacing any previous entry
     */
    store(coordinate: Coordinate, record: LocationRecord): void {
        this.entriesByKey.set(toCoordinateKey(coordinate), record);
    }

    /**
     * Serialize to the persisted document format
     */
    toDocument(): CacheDocument {
        const document: CacheDocument = {};
        for (const [key, record] of this.entriesByKey) {
            document[key] = {
                city: record.city,
                state: record.state,
                country: record.country,
                display_name: record.displayName,
            };
        }
        return document;
    }

    /**
     * Overwrite the JSON document at `filePath` with the current cache
     *
     * A write failure is logged and reported as `false`; the in-memory cache stays usable.
     */
    async persistTo(filePath: string): Promise<boolean> {
        const tempPath = `${filePath}.tmp`;
        try {
            await mkdir(dirname(filePath), { recursive: true });
            await writeFile(tempPath, JSON.stringify(this.toDocument(), null, 2), 'utf-8');
            await rename(tempPath, filePath);

            logCachePersist({ filePath, entries: this.size });
            return true;
        } catch (error) {
            logCachePersist({ filePath, entries: this.size, error: errorMessage(error) });
            await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
                logger.debug({
                    event: 'geocode.cache.persist.cleanup_failed',
                    tempPath,
                    error: errorMessage(cleanupError),
                }, 'Could not remove temporary cache file');
            });
            return false;
        }
    }
}

/**
 * Run `fn` with a cache loaded from `filePath`, persisting it on every exit path
 *
 * @example
 * const records = await withGeocodeCache(cacheFile, (cache) => resolver(cache).processPhotos(photos));
 */
export async function withGeocodeCache<T>(
    filePath: string,
    fn: (cache: GeocodeCache) => Promise<T>,
    tolerance?: number
): Promise<T> {
    const cache = await GeocodeCache.loadFrom(filePath, tolerance);
    try {
        return await fn(cache);
    } finally {
        await cache.persistTo(filePath);
    }
}
