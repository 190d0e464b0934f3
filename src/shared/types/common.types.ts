/**
 * Common TypeScript types used across the photo location scanner
 */

/**
 * Signed decimal-degree GPS position
 */
export interface Coordinate {
    /** Latitude in [-90, 90] */
    readonly latitude: number;
    /** Longitude in [-180, 180] */
    readonly longitude: number;
}

/**
 * Canonical `"<lat>,<lon>"` string with both components rounded to 6 decimals
 */
export type CoordinateKey = string;

/**
 * Reverse-geocoded place for a coordinate
 */
export interface LocationRecord {
    readonly city: string | null;
    readonly state: string | null;
    readonly country: string | null;
    /** Full place description as returned by the geocoder */
    readonly displayName: string | null;
}

/**
 * Raw GPS tag map as produced by the EXIF reader
 * (GPSLatitude, GPSLatitudeRef, GPSLongitude, GPSLongitudeRef)
 */
export type GpsTags = Readonly<Record<string, unknown>>;

/**
 * A photo found on disk together with its raw GPS tags
 */
export interface ScannedPhoto {
    path: string;
    gpsTags: GpsTags | null;
}

/**
 * A photo with its extracted coordinate and resolved location
 */
export interface PhotoRecord {
    path: string;
    coordinate: Coordinate | null;
    location: LocationRecord | null;
}

/**
 * Deduplicated entry of the visited places report
 */
export interface UniqueLocation {
    city: string;
    state: string | null;
    country: string | null;
}

/**
 * Result of locating a single coordinate
 */
export type ResolutionOutcome =
    | { status: 'cache_hit'; location: LocationRecord }
    | { status: 'resolved'; location: LocationRecord }
    | { status: 'unresolved' };

/**
 * Terminal state of a photo after processing
 */
export type PhotoState = 'no_gps' | ResolutionOutcome['status'];

/**
 * Counters collected while processing a batch of photos
 */
export interface ProcessingStats {
    total: number;
    withGps: number;
    noGps: number;
    cacheHits: number;
    resolved: number;
    unresolved: number;
    /** Requests that reached the geocoding service */
    liveRequests: number;
}

/**
 * Log context for structured logging
 */
export interface LogContext {
    /** Photo file path */
    photoPath?: string;
    /** Additional context */
    [key: string]: unknown;
}
