import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { LocationResolver } from '@/services/geocoding/location-resolver.service';
import { GeocodeCache } from '@/services/geocoding/geocode-cache.service';
import type { GeocodingAdapter } from '@/services/geocoding/adapters/geocoding/geocoding.interface';
import type { Coordinate, LocationRecord, ScannedPhoto } from '@/shared/types/common.types';

/**
 * Unit tests for the location resolver
 *
 * Tests the resolution flow:
 * - Cache hits never reach the geocoder
 * - Every live request is followed by exactly one rate-limit pause
 * - Failed lookups are not cached
 */

class MockGeocodingAdapter implements GeocodingAdapter {
    public requests: Coordinate[] = [];
    public responses = new Map<string, LocationRecord | null>();
    public fallback: LocationRecord | null = null;

    async reverseGeocode(coordinate: Coordinate): Promise<LocationRecord | null> {
        this.requests.push(coordinate);
        const key = `${coordinate.latitude},${coordinate.longitude}`;
        return this.responses.has(key) ? this.responses.get(key) ?? null : this.fallback;
    }
}

const paris: LocationRecord = { city: 'Paris', state: 'Île-de-France', country: 'France', displayName: 'Paris, France' };
const lyon: LocationRecord = { city: 'Lyon', state: 'Auvergne-Rhône-Alpes', country: 'France', displayName: 'Lyon, France' };

function photoAt(path: string, latitude: [number, number, number], longitude: [number, number, number]): ScannedPhoto {
    return {
        path,
        gpsTags: {
            GPSLatitude: latitude,
            GPSLatitudeRef: 'N',
            GPSLongitude: longitude,
            GPSLongitudeRef: 'E',
        },
    };
}

describe('LocationResolver', () => {
    let cache: GeocodeCache;
    let adapter: MockGeocodingAdapter;
    let sleep: Mock<(ms: number) => Promise<void>>;
    let resolver: LocationResolver;

    beforeEach(() => {
        cache = new GeocodeCache();
        adapter = new MockGeocodingAdapter();
        sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
        resolver = new LocationResolver(cache, adapter, { delayMs: 1000, sleep });
    });

    describe('locate', () => {
        it('should resolve a miss, cache it and pause once', async () => {
            adapter.fallback = paris;

            const outcome = await resolver.locate({ latitude: 48.8566, longitude: 2.3522 });

            expect(outcome).toEqual({ status: 'resolved', location: paris });
            expect(adapter.requests).toHaveLength(1);
            expect(sleep).toHaveBeenCalledTimes(1);
            expect(sleep).toHaveBeenCalledWith(1000);
            expect(cache.lookup({ latitude: 48.8566, longitude: 2.3522 })).toBe(paris);
        });

        it('should serve a nearby coordinate from cache without calling the geocoder', async () => {
            cache.store({ latitude: 48.8566, longitude: 2.3522 }, paris);

            const outcome = await resolver.locate({ latitude: 48.857, longitude: 2.3519 });

            expect(outcome).toEqual({ status: 'cache_hit', location: paris });
            expect(adapter.requests).toHaveLength(0);
            expect(sleep).not.toHaveBeenCalled();
        });

        it('should report unresolved, skip caching and still pause after a failed request', async () => {
            adapter.fallback = null;

            const outcome = await resolver.locate({ latitude: 10, longitude: 10 });

            expect(outcome).toEqual({ status: 'unresolved' });
            expect(cache.size).toBe(0);
            expect(sleep).toHaveBeenCalledTimes(1);
        });

        it('should retry nothing within a call and ask again on the next miss', async () => {
            adapter.fallback = null;

            await resolver.locate({ latitude: 10, longitude: 10 });
            await resolver.locate({ latitude: 10, longitude: 10 });

            expect(adapter.requests).toHaveLength(2);
            expect(resolver.liveRequestCount).toBe(2);
        });

        it('should default to a one second pause', async () => {
            const defaultResolver = new LocationResolver(cache, adapter, { sleep });
            adapter.fallback = lyon;

            await defaultResolver.locate({ latitude: 45.75, longitude: 4.85 });

            expect(sleep).toHaveBeenCalledWith(1000);
        });
    });

    describe('processPhotos', () => {
        it('should make N requests and N pauses for N distant misses', async () => {
            adapter.fallback = lyon;
            const photos = [
                photoAt('a.jpg', [10, 0, 0], [10, 0, 0]),
                photoAt('b.jpg', [20, 0, 0], [20, 0, 0]),
                photoAt('c.jpg', [30, 0, 0], [30, 0, 0]),
            ];

            const { stats } = await resolver.processPhotos(photos);

            expect(adapter.requests).toHaveLength(3);
            expect(sleep).toHaveBeenCalledTimes(3);
            expect(stats).toEqual({
                total: 3,
                withGps: 3,
                noGps: 0,
                cacheHits: 0,
                resolved: 3,
                unresolved: 0,
                liveRequests: 3,
            });
        });

        it('should only pause after misses in a mixed sequence', async () => {
            adapter.responses.set('48.85,2.35', paris);
            adapter.responses.set('45.75,4.85', lyon);
            const photos = [
                // 48.85, 2.35
                photoAt('paris-1.jpg', [48, 51, 0], [2, 21, 0]),
                // a few metres away
                photoAt('paris-2.jpg', [48, 51, 1], [2, 21, 1]),
                // 45.75, 4.85
                photoAt('lyon-1.jpg', [45, 45, 0], [4, 51, 0]),
                photoAt('paris-3.jpg', [48, 51, 0], [2, 21, 0]),
                { path: 'scan.png', gpsTags: null },
            ];

            const { records, stats } = await resolver.processPhotos(photos);

            expect(adapter.requests).toHaveLength(2);
            expect(sleep).toHaveBeenCalledTimes(2);
            expect(stats).toEqual({
                total: 5,
                withGps: 4,
                noGps: 1,
                cacheHits: 2,
                resolved: 2,
                unresolved: 0,
                liveRequests: 2,
            });
            expect(records.map((record) => record.location?.city ?? null)).toEqual([
                'Paris',
                'Paris',
                'Lyon',
                'Paris',
                null,
            ]);
            expect(records[4]).toEqual({ path: 'scan.png', coordinate: null, location: null });
        });

        it('should keep the coordinate of an unresolved photo', async () => {
            adapter.fallback = null;

            const { records, stats } = await resolver.processPhotos([
                photoAt('sea.jpg', [0, 30, 0], [0, 30, 0]),
            ]);

            expect(records).toEqual([{ path: 'sea.jpg', coordinate: { latitude: 0.5, longitude: 0.5 }, location: null }]);
            expect(stats.unresolved).toBe(1);
            expect(stats.liveRequests).toBe(1);
        });

        it('should accept an async stream of photos', async () => {
            adapter.fallback = paris;
            async function* stream(): AsyncGenerator<ScannedPhoto> {
                yield photoAt('a.jpg', [48, 51, 0], [2, 21, 0]);
                yield { path: 'b.jpg', gpsTags: { GPSLatitude: [48, 51, 0] } };
            }

            const { stats } = await resolver.processPhotos(stream());

            expect(stats.total).toBe(2);
            expect(stats.resolved).toBe(1);
            expect(stats.noGps).toBe(1);
        });
    });
});
