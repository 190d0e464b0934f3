import { z } from 'zod';

/**
 * Environment variables validation schema
 */
export const envSchema = z.object({
    // Runtime
    NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

    // Scanning
    PHOTOS_DIR: z.string().min(1).default('./photos'),
    OUTPUT_DIR: z.string().min(1).default('./output'),
    GEOCODE_CACHE_FILE: z.string().min(1).default('./output/geocode-cache.json'),

    // Nominatim
    NOMINATIM_BASE_URL: z.string().url('Nominatim base URL must be a valid URL').default('https://nominatim.openstreetmap.org'),
    NOMINATIM_USER_AGENT: z.string().min(1, 'A descriptive User-Agent is required').default('photo-location-scanner/1.0'),
    NOMINATIM_EMAIL: z.string().email().optional(),
    NOMINATIM_ACCEPT_LANGUAGE: z.string().min(1).optional(),
    GEOCODE_TIMEOUT_MS: z.string().default('10000').transform(Number).pipe(z.number().int().positive()),
    GEOCODE_RATE_LIMIT_MS: z.string().default('1000').transform(Number).pipe(z.number().int().nonnegative()),

    // Tracing (Optional)
    OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
    OTEL_SERVICE_NAME: z.string().min(1).default('photo-location-scanner'),
});

/**
 * Coordinates validation schema
 */
export const coordinatesSchema = z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
});

/**
 * Persisted cache entry, stored with the geocoder's snake_case field names
 */
export const cachedLocationSchema = z.object({
    city: z.string().nullable().default(null),
    state: z.string().nullable().default(null),
    country: z.string().nullable().default(null),
    display_name: z.string().nullable().default(null),
});

/**
 * Persisted geocode cache document
 */
export const cacheDocumentSchema = z.record(z.string(), cachedLocationSchema);

const optionalName = z.string().optional().catch(undefined);

/**
 * Nominatim reverse geocoding response
 *
 * Unknown address fields are ignored, wrongly-typed ones are treated as absent.
 */
export const nominatimResponseSchema = z.object({
    display_name: optionalName,
    error: optionalName,
    address: z
        .object({
            city: optionalName,
            town: optionalName,
            village: optionalName,
            hamlet: optionalName,
            municipality: optionalName,
            state: optionalName,
            region: optionalName,
            province: optionalName,
            county: optionalName,
            country: optionalName,
        })
        .optional(),
});

/**
 * Validate environment variables
 */
export function validateEnv(env: NodeJS.ProcessEnv) {
    return envSchema.parse(env);
}

/**
 * Check that a coordinate lies within the valid latitude/longitude ranges
 */
export function isValidCoordinate(latitude: number, longitude: number): boolean {
    return coordinatesSchema.safeParse({ latitude, longitude }).success;
}

/**
 * Type exports for validated data
 */
export type ValidatedEnv = z.infer<typeof envSchema>;
export type CachedLocation = z.infer<typeof cachedLocationSchema>;
export type CacheDocument = z.infer<typeof cacheDocumentSchema>;
export type NominatimResponse = z.infer<typeof nominatimResponseSchema>;
