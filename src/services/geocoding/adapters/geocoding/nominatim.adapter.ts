import ky, { HTTPError, TimeoutError, type KyInstance } from 'ky';
import type { GeocodingAdapter } from './geocoding.interface';
import type { Coordinate, LocationRecord } from '@/shared/types/common.types';
import { nominatimResponseSchema, type NominatimResponse } from '@/shared/utils/validators';
import { logger, logLocationLookup } from '@/shared/utils/logger';
import { withSpan, addSpanAttributes, setSpanStatus } from '@/shared/utils/tracing-utils';

/**
 * Address fields tried, in priority order, for each part of the location
 */
const CITY_FIELDS = ['city', 'town', 'village', 'hamlet', 'municipality'] as const;
const STATE_FIELDS = ['state', 'region', 'province', 'county'] as const;

/** Administrative detail level requested from Nominatim (city) */
const ZOOM_LEVEL = '10';

type NominatimAddress = NonNullable<NominatimResponse['address']>;

export interface NominatimAdapterOptions {
    baseUrl: string;
    /** Descriptive application identifier required by the Nominatim usage policy */
    userAgent: string;
    timeoutMs: number;
    email?: string | undefined;
    acceptLanguage?: string | undefined;
    /** Alternative fetch implementation */
    fetch?: typeof fetch | undefined;
}

function firstPresent(address: NominatimAddress | undefined, fields: readonly (keyof NominatimAddress)[]): string | null {
    if (!address) return null;
    for (const field of fields) {
        const value = address[field];
        if (value) return value;
    }
    return null;
}

/**
 * Map a Nominatim reverse geocoding response to a location record
 */
export function toLocationRecord(response: NominatimResponse): LocationRecord {
    return {
        city: firstPresent(response.address, CITY_FIELDS),
        state: firstPresent(response.address, STATE_FIELDS),
        country: response.address?.country || null,
        displayName: response.display_name || null,
    };
}

/**
 * Nominatim Adapter
 *
 * Reverse geocoding through the OpenStreetMap Nominatim API
 * API Docs: https://nominatim.org/release-docs/latest/api/Reverse/
 *
 * Requests are never retried; pacing between calls is the caller's job.
 */
export class NominatimAdapter implements GeocodingAdapter {
    private client: KyInstance;
    private email: string | undefined;
    private acceptLanguage: string | undefined;

    constructor(options: NominatimAdapterOptions) {
        this.email = options.email;
        this.acceptLanguage = options.acceptLanguage;
        this.client = ky.create({
            prefixUrl: options.baseUrl,
            timeout: options.timeoutMs,
            retry: 0,
            headers: {
                'User-Agent': options.userAgent,
                Accept: 'application/json',
            },
            ...(options.fetch ? { fetch: options.fetch } : {}),
        });
    }

    async reverseGeocode(coordinate: Coordinate): Promise<LocationRecord | null> {
        const { latitude, longitude } = coordinate;

        return withSpan<LocationRecord | null>('geocode.reverse', async (span) => {
            try {
                logger.debug({
                    event: 'geocoding.request',
                    latitude,
                    longitude,
                }, 'Requesting reverse geocoding');

                const body = await this.client
                    .get('reverse', { searchParams: this.buildSearchParams(coordinate) })
                    .json<unknown>();

                const parsed = nominatimResponseSchema.safeParse(body);
                if (!parsed.success) {
                    throw new Error('Unexpected response body from Nominatim');
                }

                if (parsed.data.error) {
                    // Nothing at this position (open sea, polar ice...): still a completed lookup
                    logger.debug({
                        event: 'geocoding.no_result',
                        latitude,
                        longitude,
                        reason: parsed.data.error,
                    }, 'Nominatim returned no place for coordinate');
                }

                const location = toLocationRecord(parsed.data);

                logLocationLookup({
                    latitude,
                    longitude,
                    location: location.displayName ?? undefined,
                });
                addSpanAttributes(span, {
                    'location.city': location.city,
                    'location.country': location.country,
                });
                setSpanStatus(span, true);

                return location;
            } catch (error) {
                const status = error instanceof HTTPError ? error.response.status : undefined;
                const message = error instanceof TimeoutError
                    ? 'Request timed out'
                    : error instanceof Error ? error.message : 'Unknown error';

                logLocationLookup({
                    latitude,
                    longitude,
                    status,
                    error: message,
                });
                addSpanAttributes(span, { 'http.status_code': status });
                setSpanStatus(span, false, message);

                // Don't throw - the photo simply stays without a location
                return null;
            }
        }, {
            'location.latitude': latitude,
            'location.longitude': longitude,
        });
    }

    private buildSearchParams(coordinate: Coordinate): Record<string, string> {
        const params: Record<string, string> = {
            format: 'json',
            lat: coordinate.latitude.toString(),
            lon: coordinate.longitude.toString(),
            zoom: ZOOM_LEVEL,
            addressdetails: '1',
        };
        if (this.acceptLanguage) params['accept-language'] = this.acceptLanguage;
        if (this.email) params.email = this.email;
        return params;
    }
}
