import 'dotenv/config';

import { join } from 'path';
import { loadConfig, logConfigSummary } from './shared/config/config';
import { logger, logError } from './shared/utils/logger';
import { startTracing } from './shared/utils/tracing';
import { withGeocodeCache } from './services/geocoding/geocode-cache.service';
import { LocationResolver } from './services/geocoding/location-resolver.service';
import { NominatimAdapter } from './services/geocoding/adapters/geocoding/nominatim.adapter';
import {
    aggregateLocations,
    countPhotosByCity,
    formatLocation,
} from './services/geocoding/location-aggregator';
import { PhotoScanner } from './services/photo-scanner/photo-scanner.service';
import { ExifrReader } from './services/photo-scanner/adapters/exif/exifr.adapter';
import { writePhotoReport, writeUniqueLocationsReport } from './services/reporting/csv-exporter';

const PHOTO_REPORT_FILE = 'photos_gps_data.csv';
const UNIQUE_LOCATIONS_FILE = 'unique_locations.csv';

/**
 * Application entry point
 *
 * Usage: npm start -- [photosDirectory]
 */
async function main(): Promise<number> {
    let photosDirectory = process.argv[2];
    let stopTracing: (() => Promise<void>) | undefined;

    try {
        const config = loadConfig();
        photosDirectory ??= config.scan.photosDirectory;
        if (config.tracing.endpoint) {
            stopTracing = startTracing({ endpoint: config.tracing.endpoint, serviceName: config.tracing.serviceName });
        }

        logger.info({ directory: photosDirectory }, 'Starting photo location scan...');
        logConfigSummary(config);

        const geocodingAdapter = new NominatimAdapter({
            baseUrl: config.nominatim.baseUrl,
            userAgent: config.nominatim.userAgent,
            timeoutMs: config.nominatim.timeoutMs,
            email: config.nominatim.email,
            acceptLanguage: config.nominatim.acceptLanguage,
        });
        const scanner = new PhotoScanner(new ExifrReader());

        const scanDirectory = photosDirectory;
        const { records, stats, cacheSize } = await withGeocodeCache(config.cache.filePath, async (cache) => {
            const resolver = new LocationResolver(cache, geocodingAdapter, {
                delayMs: config.rateLimit.delayMs,
            });
            const result = await resolver.processPhotos(scanner.scan(scanDirectory));
            return { ...result, cacheSize: cache.size };
        });

        logger.info({
            event: 'scan.summary',
            photos: stats.total,
            withGps: stats.withGps,
        }, `Found ${stats.total} photos, ${stats.withGps} with GPS coordinates`);

        const locations = records.map((record) => record.location);

        if (stats.withGps > 0) {
            for (const { city, photos } of countPhotosByCity(locations)) {
                logger.info({ event: 'summary.city', city, photos }, `${city}: ${photos} photos`);
            }

            const uniqueLocations = aggregateLocations(locations);
            await writeUniqueLocationsReport(
                join(config.scan.outputDirectory, UNIQUE_LOCATIONS_FILE),
                uniqueLocations
            );
            for (const location of uniqueLocations) {
                logger.info({ event: 'summary.location', ...location }, formatLocation(location));
            }

            logger.info({
                event: 'summary.cache',
                cachedCoordinates: cacheSize,
                cacheHits: stats.cacheHits,
                liveRequests: stats.liveRequests,
            }, `Unique coordinates in cache: ${cacheSize}`);
        }

        await writePhotoReport(join(config.scan.outputDirectory, PHOTO_REPORT_FILE), records);

        return 0;
    } catch (error) {
        logError(error instanceof Error ? error : new Error(String(error)), {
            directory: photosDirectory,
        });
        return 1;
    } finally {
        await stopTracing?.();
    }
}

main()
    .then((exitCode) => {
        process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
        logger.fatal({ event: 'startup.error', error }, 'Photo location scan crashed');
        process.exitCode = 1;
    });
