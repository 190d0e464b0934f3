import type { Coordinate, GpsTags } from '@/shared/types/common.types';
import { isValidCoordinate } from '@/shared/utils/validators';
import { toDecimalDegrees } from './coordinate-math';

/**
 * Outcome of reading a coordinate from a GPS tag map
 */
export type GpsExtractionResult =
    | { ok: true; coordinate: Coordinate }
    | { ok: false; reason: string };

const LATITUDE_TAG = 'GPSLatitude';
const LONGITUDE_TAG = 'GPSLongitude';
const LATITUDE_REF_TAG = 'GPSLatitudeRef';
const LONGITUDE_REF_TAG = 'GPSLongitudeRef';

function failure(reason: string): GpsExtractionResult {
    return { ok: false, reason };
}

function isRational(value: unknown): value is { numerator: unknown; denominator: unknown } {
    return typeof value === 'object' && value !== null && 'numerator' in value && 'denominator' in value;
}

/**
 * Convert one component of a sexagesimal tuple.
 * Accepts numbers, numeric strings and EXIF rationals.
 */
function toComponent(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string') {
        if (value.trim() === '') return null;
        const n = Number(value);
        return Number.isFinite(n) ? n : null;
    }
    if (isRational(value)) {
        const numerator = Number(value.numerator);
        const denominator = Number(value.denominator);
        if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
            return null;
        }
        return numerator / denominator;
    }
    return null;
}

/**
 * Convert a `[degrees, minutes, seconds]` tuple to decimal degrees
 */
function sexagesimalToDegrees(value: unknown): number | null {
    if (!Array.isArray(value) || value.length !== 3) return null;

    const components = value.map(toComponent);
    const [degrees, minutes, seconds] = components;
    if (degrees == null || minutes == null || seconds == null) return null;

    return toDecimalDegrees(degrees, minutes, seconds);
}

function hemisphere(ref: unknown, fallback: string): string {
    if (typeof ref !== 'string' || ref.trim() === '') return fallback;
    return ref.trim().toUpperCase();
}

/**
 * Read a signed decimal coordinate from a raw GPS tag map
 *
 * Missing hemisphere references default to N / E.
 */
export function parseGpsTags(tags: GpsTags | null | undefined): GpsExtractionResult {
    if (!tags || Object.keys(tags).length === 0) {
        return failure('No GPS tags');
    }

    const latitudeTag = tags[LATITUDE_TAG];
    const longitudeTag = tags[LONGITUDE_TAG];
    if (latitudeTag == null || longitudeTag == null) {
        return failure('GPSLatitude and GPSLongitude are not both present');
    }

    let latitude = sexagesimalToDegrees(latitudeTag);
    if (latitude == null) return failure('Malformed GPSLatitude');

    let longitude = sexagesimalToDegrees(longitudeTag);
    if (longitude == null) return failure('Malformed GPSLongitude');

    if (hemisphere(tags[LATITUDE_REF_TAG], 'N') === 'S') latitude = -latitude;
    if (hemisphere(tags[LONGITUDE_REF_TAG], 'E') === 'W') longitude = -longitude;

    if (!isValidCoordinate(latitude, longitude)) {
        return failure(`Coordinate out of range: ${latitude}, ${longitude}`);
    }

    return { ok: true, coordinate: { latitude, longitude } };
}

/**
 * Extract a coordinate from a raw GPS tag map
 *
 * @returns Coordinate, or null when the tags carry no usable position
 */
export function extractCoordinate(tags: GpsTags | null | undefined): Coordinate | null {
    const result = parseGpsTags(tags);
    return result.ok ? result.coordinate : null;
}
