import type { Coordinate, CoordinateKey } from '@/shared/types/common.types';

/** Decimal places kept in cache keys (~0.1 m) */
export const COORDINATE_KEY_PRECISION = 6;

/** Maximum per-axis difference, in degrees, treated as the same place (~1 km at the equator) */
export const PROXIMITY_TOLERANCE_DEGREES = 0.01;

/**
 * Convert a sexagesimal (degrees, minutes, seconds) angle to decimal degrees
 */
export function toDecimalDegrees(degrees: number, minutes: number, seconds: number): number {
    return degrees + minutes / 60 + seconds / 3600;
}

function roundTo(value: number, decimals: number): number {
    const rounded = Number(value.toFixed(decimals));
    // Avoid "-0" keys
    return rounded === 0 ? 0 : rounded;
}

/**
 * Build the exact-match cache key for a coordinate
 *
 * @example
 * toCoordinateKey({ latitude: 48.85661234, longitude: 2.3522 }) // "48.856612,2.3522"
 */
export function toCoordinateKey(coordinate: Coordinate): CoordinateKey {
    const latitude = roundTo(coordinate.latitude, COORDINATE_KEY_PRECISION);
    const longitude = roundTo(coordinate.longitude, COORDINATE_KEY_PRECISION);
    return `${latitude},${longitude}`;
}

/**
 * Parse a cache key back into a coordinate
 *
 * @returns Coordinate, or null when the key is malformed
 */
export function parseCoordinateKey(key: string): Coordinate | null {
    const parts = key.split(',');
    if (parts.length !== 2) return null;

    const [latText = '', lonText = ''] = parts;
    if (latText.trim() === '' || lonText.trim() === '') return null;

    const latitude = Number(latText);
    const longitude = Number(lonText);
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;

    return { latitude, longitude };
}

const KEY_SCALE = 10 ** COORDINATE_KEY_PRECISION;

function toKeyUnits(degrees: number): number {
    return Math.round(degrees * KEY_SCALE);
}

/**
 * Whether two coordinates differ by less than `tolerance` degrees on both axes
 *
 * Compared in whole key units (micro-degrees) so that decimal inputs exactly
 * `tolerance` apart are never accepted through float subtraction error.
 */
export function isWithinTolerance(
    a: Coordinate,
    b: Coordinate,
    tolerance: number = PROXIMITY_TOLERANCE_DEGREES
): boolean {
    const limit = toKeyUnits(tolerance);
    return Math.abs(toKeyUnits(a.latitude) - toKeyUnits(b.latitude)) < limit
        && Math.abs(toKeyUnits(a.longitude) - toKeyUnits(b.longitude)) < limit;
}
