import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { trace } from '@opentelemetry/api';
import { logger } from './logger';

/**
 * OpenTelemetry Tracing Configuration
 *
 * Spans are created through `tracer` everywhere; they are no-ops until
 * `startTracing` registers the SDK with an OTLP exporter.
 */

const SERVICE_NAME = process.env.OTEL_SERVICE_NAME || 'photo-location-scanner';
const SERVICE_VERSION = process.env.npm_package_version || '1.0.0';

export interface TracingOptions {
    endpoint: string;
    serviceName: string;
}

/**
 * Start the OpenTelemetry SDK and export traces to `${endpoint}/v1/traces`
 *
 * @returns Function that flushes and stops the SDK
 */
export function startTracing(options: TracingOptions): () => Promise<void> {
    const traceExporter = new OTLPTraceExporter({
        url: `${options.endpoint}/v1/traces`,
        headers: {},
    });

    const sdk = new NodeSDK({
        serviceName: options.serviceName,
        traceExporter,
    });

    sdk.start();

    logger.info({
        event: 'tracing.started',
        serviceName: options.serviceName,
        endpoint: options.endpoint,
    }, 'Tracing initialized');

    return async () => {
        try {
            await sdk.shutdown();
            logger.debug({ event: 'tracing.stopped' }, 'Tracing terminated');
        } catch (error) {
            logger.error({
                event: 'tracing.shutdown.failed',
                error: error instanceof Error ? error.message : String(error),
            }, 'Error terminating tracing');
        }
    };
}

// Export tracer for manual instrumentation
export const tracer = trace.getTracer(SERVICE_NAME, SERVICE_VERSION);
