import { resolve } from 'path';
import { validateEnv, type ValidatedEnv } from '../utils/validators';
import { logger } from '../utils/logger';

/**
 * Load and validate environment variables
 */
function loadEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
    try {
        return validateEnv(source);
    } catch (error) {
        logger.error({
            event: 'config.invalid',
            error: error instanceof Error ? error.message : String(error),
        }, 'Failed to validate environment variables');
        throw new Error('Invalid environment configuration. Check .env file.');
    }
}

/**
 * Load the application configuration from the environment
 *
 * @throws Error when a variable is invalid
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
    const env = loadEnv(source);

    return {
        // Runtime
        runtime: {
            env: env.NODE_ENV,
            isDevelopment: env.NODE_ENV === 'development',
            isProduction: env.NODE_ENV === 'production',
        },

        // Logging
        logging: {
            level: env.LOG_LEVEL,
        },

        // Scanning & output
        scan: {
            photosDirectory: resolve(env.PHOTOS_DIR),
            outputDirectory: resolve(env.OUTPUT_DIR),
        },

        // Geocode cache
        cache: {
            filePath: resolve(env.GEOCODE_CACHE_FILE),
        },

        // Nominatim reverse geocoding
        nominatim: {
            baseUrl: env.NOMINATIM_BASE_URL,
            userAgent: env.NOMINATIM_USER_AGENT,
            email: env.NOMINATIM_EMAIL,
            acceptLanguage: env.NOMINATIM_ACCEPT_LANGUAGE,
            timeoutMs: env.GEOCODE_TIMEOUT_MS,
        },

        // Minimum pause after every request that reached the geocoder
        rateLimit: {
            delayMs: env.GEOCODE_RATE_LIMIT_MS,
        },

        // Tracing
        tracing: {
            endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT,
            serviceName: env.OTEL_SERVICE_NAME,
        },
    } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

/**
 * Log configuration summary
 */
export function logConfigSummary(config: AppConfig) {
    logger.info({
        runtime: {
            env: config.runtime.env,
        },
        logging: {
            level: config.logging.level,
        },
        scan: config.scan,
        cache: config.cache,
        nominatim: {
            baseUrl: config.nominatim.baseUrl,
            userAgent: config.nominatim.userAgent,
            acceptLanguage: config.nominatim.acceptLanguage,
            timeoutMs: config.nominatim.timeoutMs,
        },
        rateLimit: config.rateLimit,
        tracing: {
            enabled: Boolean(config.tracing.endpoint),
        },
    }, 'Configuration loaded');
}
