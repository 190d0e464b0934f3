import pino from 'pino';
import { trace } from '@opentelemetry/api';
import type { Coordinate, LogContext, ProcessingStats } from '../types/common.types';

/**
 * Create a logger instance with appropriate configuration
 */
function createLogger() {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const logLevel = process.env.LOG_LEVEL || 'info';

    const baseConfig = {
        level: logLevel,
        // Base fields for all logs
        base: {
            env: process.env.NODE_ENV,
        },
        // Timestamp format
        timestamp: pino.stdTimeFunctions.isoTime,
        // Correlate log records with the active span
        mixin() {
            const spanContext = trace.getActiveSpan()?.spanContext();
            if (!spanContext) return {};
            return {
                trace_id: spanContext.traceId,
                span_id: spanContext.spanId,
                trace_flags: spanContext.traceFlags,
            };
        },
    };

    // Add pretty print transport only in development
    if (isDevelopment) {
        return pino({
            ...baseConfig,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return pino(baseConfig);
}

/**
 * Global logger instance
 */
export const logger = createLogger();

/**
 * Log a GPS extraction failure for a single photo
 */
export function logExtractionFailure(data: { photoPath: string; reason: string }) {
    logger.debug({
        event: 'gps.extraction.failed',
        photoPath: data.photoPath,
        reason: data.reason,
    }, 'No usable GPS coordinates');
}

/**
 * Log cache lookup result
 */
export function logCacheLookup(data: {
    coordinate: Coordinate;
    hit: boolean;
    matchedKey?: string | undefined;
    proximity?: boolean | undefined;
}) {
    if (data.hit) {
        logger.debug({
            event: 'geocode.cache.hit',
            latitude: data.coordinate.latitude,
            longitude: data.coordinate.longitude,
            matchedKey: data.matchedKey,
            proximity: data.proximity,
        }, 'Using cached location');
    } else {
        logger.debug({
            event: 'geocode.cache.miss',
            latitude: data.coordinate.latitude,
            longitude: data.coordinate.longitude,
        }, 'No cached location');
    }
}

/**
 * Log geocode cache load
 */
export function logCacheLoad(data: {
    filePath: string;
    entries: number;
    error?: string | undefined;
    missing?: boolean | undefined;
}) {
    if (data.error) {
        logger.warn({
            event: 'geocode.cache.load.failed',
            filePath: data.filePath,
            error: data.error,
        }, 'Failed to load geocode cache, starting with an empty cache');
    } else if (data.missing) {
        logger.info({
            event: 'geocode.cache.load.missing',
            filePath: data.filePath,
        }, 'No geocode cache file yet, starting with an empty cache');
    } else {
        logger.info({
            event: 'geocode.cache.load.success',
            filePath: data.filePath,
            entries: data.entries,
        }, 'Geocode cache loaded');
    }
}

/**
 * Log geocode cache persist
 */
export function logCachePersist(data: {
    filePath: string;
    entries: number;
    error?: string | undefined;
}) {
    if (data.error) {
        logger.error({
            event: 'geocode.cache.persist.failed',
            filePath: data.filePath,
            entries: data.entries,
            error: data.error,
        }, 'Failed to persist geocode cache');
    } else {
        logger.info({
            event: 'geocode.cache.persist.success',
            filePath: data.filePath,
            entries: data.entries,
        }, 'Geocode cache persisted');
    }
}

/**
 * Log location lookup against the geocoding service
 */
export function logLocationLookup(data: {
    latitude: number;
    longitude: number;
    location?: string | undefined;
    status?: number | undefined;
    error?: string | undefined;
}) {
    if (data.error) {
        logger.warn({
            event: 'location.lookup.failed',
            latitude: data.latitude,
            longitude: data.longitude,
            status: data.status,
            error: data.error,
        }, 'Location lookup failed');
    } else {
        logger.debug({
            event: 'location.lookup.success',
            latitude: data.latitude,
            longitude: data.longitude,
            location: data.location,
        }, 'Location lookup completed');
    }
}

/**
 * Log processing completion for a batch of photos
 */
export function logProcessingSummary(stats: ProcessingStats & { processingTime: number }) {
    logger.info({
        event: 'photos.processed',
        ...stats,
    }, 'Photo processing completed');
}

/**
 * Log error with context
 */
export function logError(error: Error, context?: LogContext) {
    logger.error({
        event: 'error',
        error: {
            message: error.message,
            name: error.name,
            stack: error.stack,
        },
        ...context,
    }, error.message);
}
