import { setTimeout as sleep } from 'timers/promises';
import type { GeocodingAdapter } from './adapters/geocoding/geocoding.interface';
import type { GeocodeCache } from './geocode-cache.service';
import { parseGpsTags } from './gps-extractor';
import type {
    Coordinate,
    PhotoRecord,
    PhotoState,
    ProcessingStats,
    ResolutionOutcome,
    ScannedPhoto,
} from '@/shared/types/common.types';
import { logger, logExtractionFailure, logProcessingSummary } from '@/shared/utils/logger';
import { withSpan, addSpanAttributes, setSpanStatus } from '@/shared/utils/tracing-utils';

/** Minimum pause after each request that reached the geocoding service */
export const DEFAULT_RATE_LIMIT_DELAY_MS = 1000;

export interface LocationResolverOptions {
    /** Pause applied after every live geocoding request */
    delayMs?: number | undefined;
    /** Sleep implementation used for the pause */
    sleep?: ((ms: number) => Promise<unknown>) | undefined;
}

export interface ProcessingResult {
    records: PhotoRecord[];
    stats: ProcessingStats;
}

function emptyStats(): ProcessingStats {
    return {
        total: 0,
        withGps: 0,
        noGps: 0,
        cacheHits: 0,
        resolved: 0,
        unresolved: 0,
        liveRequests: 0,
    };
}

/**
 * Location Resolver Service
 *
 * Resolves photo coordinates to places, one at a time:
 * 1. Extract - Read the coordinate from the photo's GPS tags
 * 2. Cache - Reuse a cached location for the same or a nearby coordinate
 * 3. Geocode - Otherwise ask the geocoding service once and cache a success
 * 4. Rate limit - Pause after every request that reached the service
 *
 * A failed resolution is final for the run; it is neither cached nor retried.
 */
export class LocationResolver {
    private readonly delayMs: number;
    private readonly sleep: (ms: number) => Promise<unknown>;
    private liveRequests = 0;

    constructor(
        private cache: GeocodeCache,
        private geocodingAdapter: GeocodingAdapter,
        options: LocationResolverOptions = {}
    ) {
        this.delayMs = options.delayMs ?? DEFAULT_RATE_LIMIT_DELAY_MS;
        this.sleep = options.sleep ?? ((ms: number) => sleep(ms));
    }

    /**
     * Number of requests that reached the geocoding service so far
     */
    get liveRequestCount(): number {
        return this.liveRequests;
    }

    /**
     * Resolve a coordinate, from cache when possible
     */
    async locate(coordinate: Coordinate): Promise<ResolutionOutcome> {
        return withSpan<ResolutionOutcome>('geocode.locate', async (span) => {
            const cached = this.cache.lookup(coordinate);
            if (cached) {
                addSpanAttributes(span, { 'geocode.outcome': 'cache_hit' });
                return { status: 'cache_hit', location: cached };
            }

            this.liveRequests += 1;
            try {
                const location = await this.geocodingAdapter.reverseGeocode(coordinate);
                if (!location) {
                    addSpanAttributes(span, { 'geocode.outcome': 'unresolved' });
                    setSpanStatus(span, false, 'Reverse geocoding failed');
                    return { status: 'unresolved' };
                }

                this.cache.store(coordinate, location);
                addSpanAttributes(span, { 'geocode.outcome': 'resolved' });
                return { status: 'resolved', location };
            } finally {
                await this.sleep(this.delayMs);
            }
        }, {
            'location.latitude': coordinate.latitude,
            'location.longitude': coordinate.longitude,
        });
    }

    /**
     * Extract and resolve the location of a single photo
     */
    async processPhoto(photo: ScannedPhoto): Promise<{ record: PhotoRecord; state: PhotoState }> {
        const extraction = parseGpsTags(photo.gpsTags);
        if (!extraction.ok) {
            logExtractionFailure({ photoPath: photo.path, reason: extraction.reason });
            return {
                record: { path: photo.path, coordinate: null, location: null },
                state: 'no_gps',
            };
        }

        const { coordinate } = extraction;
        const outcome = await this.locate(coordinate);

        logger.debug({
            event: 'photo.processed',
            photoPath: photo.path,
            state: outcome.status,
            city: outcome.status === 'unresolved' ? undefined : outcome.location.city,
        }, 'Photo processed');

        return {
            record: {
                path: photo.path,
                coordinate,
                location: outcome.status === 'unresolved' ? null : outcome.location,
            },
            state: outcome.status,
        };
    }

    /**
     * Process photos sequentially and collect per-state counters
     */
    async processPhotos(photos: Iterable<ScannedPhoto> | AsyncIterable<ScannedPhoto>): Promise<ProcessingResult> {
        const startTime = performance.now();
        const requestsBefore = this.liveRequests;
        const records: PhotoRecord[] = [];
        const stats = emptyStats();

        for await (const photo of photos) {
            const { record, state } = await this.processPhoto(photo);
            records.push(record);

            stats.total += 1;
            switch (state) {
                case 'no_gps':
                    stats.noGps += 1;
                    break;
                case 'cache_hit':
                    stats.cacheHits += 1;
                    break;
                case 'resolved':
                    stats.resolved += 1;
                    break;
                case 'unresolved':
                    stats.unresolved += 1;
                    break;
            }
            if (state !== 'no_gps') {
                stats.withGps += 1;
                logger.info({
                    event: 'photo.located',
                    progress: stats.withGps,
                    photoPath: record.path,
                    state,
                }, `Located photo ${stats.withGps}: ${record.path}`);
            }
        }

        stats.liveRequests = this.liveRequests - requestsBefore;

        const processingTime = (performance.now() - startTime) / 1000;
        logProcessingSummary({ ...stats, processingTime });

        return { records, stats };
    }
}
