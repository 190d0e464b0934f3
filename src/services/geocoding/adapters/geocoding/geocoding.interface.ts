import type { Coordinate, LocationRecord } from '@/shared/types/common.types';

/**
 * Geocoding Adapter Interface
 *
 * Defines the contract for reverse geocoding services that convert GPS
 * coordinates to an administrative place (city / state / country)
 *
 * Implementations: Nominatim
 */
export interface GeocodingAdapter {
    /**
     * Resolve a coordinate to a place
     *
     * Issues exactly one request to the service. Never throws: any transport,
     * status or parse failure is logged and reported as `null`.
     *
     * @returns Resolved location, or null when the lookup failed
     */
    reverseGeocode(coordinate: Coordinate): Promise<LocationRecord | null>;
}
